import { FailureRecord } from 'dag-build-error'
import { banner } from 'misc'

/**
 * Accumulates the failures of a single run, in the order they occurred.
 */
export class MessageCollector {
  private readonly records: FailureRecord[] = []

  append(message: string, taskStr: string) {
    this.records.push({ taskStr, message })
  }

  get isEmpty(): boolean {
    return this.records.length === 0
  }

  get failures(): readonly FailureRecord[] {
    return [...this.records]
  }

  /**
   * One block per failure: a banner line carrying the task's identity, followed by the failure trace.
   */
  render(): string {
    return this.records.map(r => `${banner(r.taskStr)}\n${r.message}`).join('\n')
  }
}
