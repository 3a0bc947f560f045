import { z } from 'zod'

/**
 * Points at a function exported by a module. Being plain data, it can be handed to another process, which loads the
 * module and calls the function there.
 */
export const EntryPoint = z.object({
  modulePath: z.string().min(1).describe('Absolute path (or resolvable module specifier) of the module.'),
  exportName: z.string().min(1).describe('Name of the exported build function.'),
})
export type EntryPoint = z.infer<typeof EntryPoint>

/**
 * Where a task's logic lives.
 *
 * IN_MEMORY_CALLABLE: a function that runs in the current process. Eligible for isolation, which runs the same
 * entry point in a disposable worker process instead.
 *
 * EXTERNAL_DELEGATE: the task hands its work to something that already runs out of process (a shell command, a remote
 * service). Never isolated.
 */
export type TaskSource =
  | { readonly kind: 'IN_MEMORY_CALLABLE'; readonly entryPoint: EntryPoint }
  | { readonly kind: 'EXTERNAL_DELEGATE'; readonly description: string }
