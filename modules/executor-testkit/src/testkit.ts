import { Client, OrderedDag, Task } from 'dag-protocol'

export function dagOf(name: string, tasks: Task[], clients: Record<string, Client> = {}): OrderedDag {
  const dag = new OrderedDag(name)
  for (const t of tasks) {
    dag.addTask(t)
  }
  for (const [clientName, client] of Object.entries(clients)) {
    dag.addClient(clientName, client)
  }
  return dag
}
