import { TaskStatus } from 'dag-protocol'
import * as fs from 'fs'
import * as JsoncParser from 'jsonc-parser'
import { errorLike } from 'misc'
import { z } from 'zod'

export const CallableSource = z.object({
  kind: z.literal('callable'),
  module: z.string().min(1).describe('A module specifier. Relative paths are resolved against the pipeline file.'),
  export: z.string().min(1).describe('The name of the exported build function.'),
})

export const ShellSource = z.object({
  kind: z.literal('shell'),
  command: z.string().min(1),
  cwd: z.string().optional().describe('Working directory of the command, relative to the pipeline file.'),
})

export const PipelineTask = z.object({
  name: z.string(),
  status: TaskStatus.optional().describe('The status the task enters the run with. Defaults to WAITING.'),
  source: z.discriminatedUnion('kind', [CallableSource, ShellSource]),
})
export type PipelineTask = z.infer<typeof PipelineTask>

export const PipelineFile = z.object({
  name: z.string().min(1),
  tasks: z.array(PipelineTask).describe('The tasks, in execution order.'),
})
export type PipelineFile = z.infer<typeof PipelineFile>

/**
 * Reads a pipeline file. The file is JSON with comments and trailing commas allowed.
 */
export function readPipelineFile(p: string): PipelineFile {
  try {
    const content = fs.readFileSync(p, 'utf-8')
    const errors: JsoncParser.ParseError[] = []
    const parsed: unknown = JsoncParser.parse(content, errors, { allowTrailingComma: true })
    const e = errors.at(0)
    if (e) {
      throw new Error(`Bad format: ${JsoncParser.printParseErrorCode(e.error)} at position ${e.offset}`)
    }
    return PipelineFile.parse(parsed)
  } catch (e) {
    throw new Error(`could not read pipeline file ${p} - ${errorLike(e).message}`)
  }
}
