import { Jsonable } from 'misc'

import { Report, TaskParams } from './task'
import { EntryPoint } from './task-source'

export type BuildFunction = (params: TaskParams) => unknown

function isBuildFunction(v: unknown): v is BuildFunction {
  return typeof v === 'function'
}

/**
 * Loads the module named by the entry point and returns the function it exports.
 */
export function loadEntryPoint(entryPoint: EntryPoint): BuildFunction {
  const { modulePath, exportName } = entryPoint
  // eslint-disable-next-line @typescript-eslint/no-var-requires
  const loaded: unknown = require(modulePath)
  if (typeof loaded !== 'object' || loaded === null) {
    throw new Error(`Module ${modulePath} did not evaluate to an object`)
  }
  const exported: unknown = Reflect.get(loaded, exportName)
  if (!isBuildFunction(exported)) {
    throw new Error(`Module ${modulePath} does not export a function named "${exportName}"`)
  }
  return exported
}

/**
 * Runs an entry point and turns its return value into a report: `undefined` becomes `null`, anything else must be a
 * JSON value. This is the one place where callable logic is executed, both in the current process and inside an
 * isolated worker.
 */
export async function invokeEntryPoint(entryPoint: EntryPoint, params: TaskParams): Promise<Report> {
  const f = loadEntryPoint(entryPoint)
  const returned = await f(params)
  if (returned === undefined) {
    return null
  }
  const parsed = Jsonable.safeParse(returned)
  if (!parsed.success) {
    throw new Error(
      `The value returned by ${entryPoint.exportName} (${entryPoint.modulePath}) is not a JSON value: ${parsed.error.message}`,
    )
  }
  return parsed.data
}
