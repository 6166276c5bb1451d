export * from './fetch-pipeline'
export * from './output-sequencer'
export * from './factory'
