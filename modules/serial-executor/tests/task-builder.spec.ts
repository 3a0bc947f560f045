import { FakeTask, InProcessIsolation, RecordingLogger } from 'executor-testkit'
import * as path from 'path'

import { TaskBuilder } from '../src/task-builder'

const modulePath = path.join(__dirname, 'fixtures', 'isolated-functions')

describe('TaskBuilder', () => {
  test('builds an in-memory callable through the isolation strategy', async () => {
    const isolation = new InProcessIsolation()
    const builder = new TaskBuilder(new RecordingLogger(), isolation)
    const t = new FakeTask('a', { entryPoint: { modulePath, exportName: 'echoParams' } })

    expect(await builder.build(t, { x: 1 })).toEqual({ received: { x: 1 } })
    expect(t.numBuilds).toEqual(0)
    expect(isolation.events).toEqual(['acquire', 'submit:echoParams', 'release'])
  })
  test('builds an external delegate in-process even when isolation is available', async () => {
    const isolation = new InProcessIsolation()
    const builder = new TaskBuilder(new RecordingLogger(), isolation)
    const t = new FakeTask('a', { report: 'external report' })

    expect(await builder.build(t, {})).toEqual('external report')
    expect(t.numBuilds).toEqual(1)
    expect(isolation.events).toEqual([])
  })
  test('builds an in-memory callable in-process when there is no isolation', async () => {
    const builder = new TaskBuilder(new RecordingLogger(), undefined)
    const t = new FakeTask('a', { report: 'in-process report', entryPoint: { modulePath, exportName: 'echoParams' } })

    expect(await builder.build(t, {})).toEqual('in-process report')
    expect(t.numBuilds).toEqual(1)
  })
  test('propagates a failure of the isolated call', async () => {
    const isolation = new InProcessIsolation()
    const builder = new TaskBuilder(new RecordingLogger(), isolation)
    const t = new FakeTask('a', { entryPoint: { modulePath, exportName: 'explode' } })

    await expect(builder.build(t, {})).rejects.toThrowError('boom from task logic')
    expect(isolation.events).toEqual(['acquire', 'submit:explode', 'release'])
  })
})
