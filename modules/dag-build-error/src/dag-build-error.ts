/**
 * A single task failure captured during a run.
 */
export interface FailureRecord {
  /**
   * Human-readable identity of the task that failed.
   */
  readonly taskStr: string
  /**
   * The full failure trace.
   */
  readonly message: string
}

/**
 * Raised once, at the end of a run, when at least one task failed. The message enumerates every failure.
 */
export class DAGBuildError extends Error {
  constructor(m: string, readonly failures: readonly FailureRecord[] = []) {
    super(m)

    // Set the prototype explicitly.
    Object.setPrototypeOf(this, DAGBuildError.prototype)
  }
}
