import type { DetailRecord, Ref } from '../types'

/**
 * ResourceClient - one network call per invocation against the remote service.
 *
 * Implementations fail with NetworkError or HTTPStatusError; retrying is the
 * caller's business.
 */
export interface ResourceClient {
  /**
   * Ordered child references of a root resource
   */
  getChildren(rootId: string): Promise<Ref[]>

  /**
   * Detail record of a single child
   */
  getDetail(ref: Ref): Promise<DetailRecord>
}
