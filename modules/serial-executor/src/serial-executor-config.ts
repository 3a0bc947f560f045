import { LEVELS } from 'logger'
import { z } from 'zod'

export const SerialExecutorConfig = z.object({
  loggingDirectory: z
    .string()
    .optional()
    .describe('When set, every run writes a log file named after the DAG into this directory.'),
  loggingLevel: z.enum(LEVELS).default('info').describe('Severity threshold of the per-run log file.'),
  buildInSubprocess: z
    .boolean()
    .default(true)
    .describe(
      'Whether to build in-memory callables in a disposable worker process, one per task. Recommended when tasks load large objects: the memory is given back when the worker exits.',
    ),
})
export type SerialExecutorConfig = z.infer<typeof SerialExecutorConfig>
export type SerialExecutorConfigInput = z.input<typeof SerialExecutorConfig>
