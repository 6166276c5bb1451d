import { v4 as uuidv4 } from 'uuid'

export type FetchTaskStatus = 'pending' | 'in-flight' | 'succeeded' | 'failed'

export type FetchTaskKind = 'children' | 'detail'

/**
 * FetchTask - one remote operation and its attempt history.
 * Created per call, discarded once it reaches a terminal status.
 */
export class FetchTask {
  readonly taskId: string = uuidv4()
  attemptCount = 0
  status: FetchTaskStatus = 'pending'
  lastError?: Error
  private readonly startedAt = Date.now()
  private finishedAt?: number

  constructor(
    readonly kind: FetchTaskKind,
    readonly target: string
  ) {}

  beginAttempt(): void {
    this.attemptCount++
    this.status = 'in-flight'
  }

  succeed(): void {
    this.status = 'succeeded'
    this.finishedAt = Date.now()
  }

  fail(error: Error): void {
    this.status = 'failed'
    this.lastError = error
    this.finishedAt = Date.now()
  }

  get settled(): boolean {
    return this.status === 'succeeded' || this.status === 'failed'
  }

  get duration(): number {
    return (this.finishedAt ?? Date.now()) - this.startedAt
  }
}
