import { TaskName } from '../src/task-name'

describe('task-name', () => {
  test('constructs a new TaskName value', () => {
    const v: TaskName = TaskName('load-orders')
    expect(v).toEqual('load-orders')
  })
  test('yells if the input is empty or blank', () => {
    expect(() => TaskName('')).toThrowError('Bad TaskName: <>')
    expect(() => TaskName('  ')).toThrowError('Bad TaskName: <  >')
  })
  test('yells if the input spans several lines', () => {
    expect(() => TaskName('a\nb')).toThrowError('Bad TaskName: <a\nb>')
  })
})
