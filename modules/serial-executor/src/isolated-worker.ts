// Entry point of a process forked by ForkedProcessIsolation. Serves exactly one request and then disconnects.
import { invokeEntryPoint } from 'dag-protocol'
import { failMe } from 'misc'

import { serializeError, WorkerReply, WorkerRequest } from './worker-protocol'

async function serve(raw: unknown): Promise<WorkerReply> {
  try {
    const request = WorkerRequest.parse(raw)
    const report = await invokeEntryPoint(request.entryPoint, request.params)
    return { outcome: 'OK', report }
  } catch (e) {
    return { outcome: 'FAILED', error: serializeError(e) }
  }
}

const send = process.send?.bind(process) ?? failMe('the isolated worker must be started with an IPC channel')

process.once('message', (raw: unknown) => {
  serve(raw)
    .then(reply => {
      send(reply, undefined, {}, () => process.disconnect())
    })
    .catch(e => {
      process.exitCode = 1
      console.error(e)
      process.disconnect()
    })
})
