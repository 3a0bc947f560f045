import { EntryPoint, TaskParams } from 'dag-protocol'
import { errorLike, formatTrace, Jsonable } from 'misc'
import { z } from 'zod'

export const WorkerRequest = z.object({
  entryPoint: EntryPoint,
  params: TaskParams,
})
export type WorkerRequest = z.infer<typeof WorkerRequest>

export const SerializedError = z.object({
  name: z.string(),
  message: z.string(),
  /**
   * What the failure is recorded as, computed in the worker exactly as it would be in the parent process.
   */
  trace: z.string(),
})
export type SerializedError = z.infer<typeof SerializedError>

export const WorkerReply = z.discriminatedUnion('outcome', [
  z.object({ outcome: z.literal('OK'), report: Jsonable }),
  z.object({ outcome: z.literal('FAILED'), error: SerializedError }),
])
export type WorkerReply = z.infer<typeof WorkerReply>

export function serializeError(err: unknown): SerializedError {
  const { name, message } = errorLike(err)
  return { name: name ?? 'Error', message: message ?? String(err), trace: formatTrace(err) }
}

/**
 * An error that was thrown inside an isolated worker, re-created in the parent process. Its stack is the worker-side
 * trace, verbatim.
 */
export class IsolatedTaskError extends Error {
  constructor(serialized: SerializedError) {
    super(serialized.message)
    Object.setPrototypeOf(this, IsolatedTaskError.prototype)

    this.name = serialized.name
    this.stack = serialized.trace
  }
}
