import type { FetchPipeline } from './fetch-pipeline'
import type { DetailRecord, OutputMode } from '../types'

export type DetailFormatter = (detail: DetailRecord) => string

/**
 * OutputSequencer - turns pipeline results into output lines.
 *
 * eager waits for the whole run and returns every line at once; stream hands
 * lines out as the pipeline yields them. Both keep child-reference order.
 */
export class OutputSequencer {
  constructor(
    private pipeline: FetchPipeline,
    private format: DetailFormatter = detail => detail.name
  ) {}

  async eager(rootId: string): Promise<string[]> {
    const details = await this.pipeline.run(rootId)
    return details.map(this.format)
  }

  async *stream(rootId: string): AsyncGenerator<string, void, undefined> {
    for await (const detail of this.pipeline.stream(rootId)) {
      yield this.format(detail)
    }
  }

  /**
   * Write one line per result. Returns the number of lines written.
   */
  async emit(rootId: string, mode: OutputMode, write: (line: string) => void): Promise<number> {
    if (mode === 'eager') {
      const lines = await this.eager(rootId)
      lines.forEach(line => write(line))
      return lines.length
    }

    let count = 0
    for await (const line of this.stream(rootId)) {
      write(line)
      count++
    }
    return count
  }
}
