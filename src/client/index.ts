export * from './resource-client'
export * from './http-resource-client'
