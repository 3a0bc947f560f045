declare const Trademark: unique symbol
type Brand<BaseType, Name> = BaseType & { [Trademark]: Name }

/**
 * The identity of a task. Unique within a DAG.
 */
export type TaskName = Brand<string, 'TaskName'>

function validateTaskName(input: string): asserts input is TaskName {
  if (input.trim().length === 0 || /[\r\n]/.test(input)) {
    throw new Error(`Bad TaskName: <${input}>`)
  }
}

export const TaskName: (input: string) => TaskName = (input: string) => {
  validateTaskName(input)
  return input
}
