import { TaskName } from 'task-name'

import { Task } from './task'

/**
 * A shared resource (a connection, a file store handle) owned by the DAG.
 */
export interface Client {
  close(): void | Promise<void>
}

export interface Dag {
  readonly name: string
  /**
   * Tasks in execution order (already dependency-ordered).
   */
  readonly tasks: ReadonlyMap<TaskName, Task>
  readonly clients: ReadonlyMap<string, Client>
}

/**
 * A DAG whose execution order is the order in which tasks were added.
 */
export class OrderedDag implements Dag {
  private readonly taskMap = new Map<TaskName, Task>()
  private readonly clientMap = new Map<string, Client>()

  constructor(readonly name: string) {}

  get tasks(): ReadonlyMap<TaskName, Task> {
    return this.taskMap
  }

  get clients(): ReadonlyMap<string, Client> {
    return this.clientMap
  }

  addTask(task: Task): this {
    if (this.taskMap.has(task.name)) {
      throw new Error(`DAG "${this.name}" already has a task named "${task.name}"`)
    }
    this.taskMap.set(task.name, task)
    return this
  }

  addClient(name: string, client: Client): this {
    if (this.clientMap.has(name)) {
      throw new Error(`DAG "${this.name}" already has a client named "${name}"`)
    }
    this.clientMap.set(name, client)
    return this
  }
}
