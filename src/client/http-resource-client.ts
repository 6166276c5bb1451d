/**
 * HTTP Resource Client
 * JSON over HTTP through the global fetch, with a per-request timeout
 */

import { z } from 'zod'
import type { ResourceClient } from './resource-client'
import type { ClientConfig } from '../config/schema'
import { MAX_TIMEOUT_MS, type DetailRecord, type Ref } from '../types'
import { HTTPStatusError, NetworkError } from '../errors'

const DetailRecordSchema = z.object({ name: z.string() }).passthrough()

const RefListSchema = z.array(z.string())

export class HttpResourceClient implements ResourceClient {
  private readonly baseUrl: string

  constructor(private config: ClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '')
  }

  rootUrl(rootId: string): string {
    return `${this.baseUrl}${this.config.rootPath.replace('{id}', encodeURIComponent(rootId))}`
  }

  async getChildren(rootId: string): Promise<Ref[]> {
    const url = this.rootUrl(rootId)
    const body = await this.getJson(url)

    const field = this.config.childrenField
    const children = RefListSchema.safeParse(isRecord(body) ? body[field] : undefined)
    if (!children.success) {
      throw new NetworkError(`Response from ${url} has no string array "${field}"`, url, children.error)
    }
    return children.data
  }

  async getDetail(ref: Ref): Promise<DetailRecord> {
    const body = await this.getJson(ref)

    const detail = DetailRecordSchema.safeParse(body)
    if (!detail.success) {
      throw new NetworkError(`Response from ${ref} is not a detail record`, ref, detail.error)
    }
    return detail.data
  }

  private async getJson(url: string): Promise<unknown> {
    const controller = new AbortController()
    const timeoutId = setTimeout(() => controller.abort(), Math.min(this.config.requestTimeoutMs, MAX_TIMEOUT_MS))

    try {
      let response: Response
      try {
        response = await fetch(url, {
          method: 'GET',
          headers: { Accept: 'application/json' },
          signal: controller.signal,
        })
      } catch (error) {
        if (controller.signal.aborted) {
          throw new NetworkError(`Request to ${url} timed out after ${this.config.requestTimeoutMs}ms`, url, error)
        }
        throw new NetworkError(`Request to ${url} failed: ${error instanceof Error ? error.message : String(error)}`, url, error)
      }

      if (!response.ok) {
        throw new HTTPStatusError(response.status, url)
      }

      try {
        return await response.json()
      } catch (jsonError) {
        throw new NetworkError(`Invalid JSON response from ${url}`, url, jsonError)
      }
    } finally {
      clearTimeout(timeoutId)
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
