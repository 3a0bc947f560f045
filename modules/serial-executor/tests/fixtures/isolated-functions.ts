import { TaskParams } from 'dag-protocol'

export function reportPid() {
  return { pid: process.pid }
}

export function echoParams(params: TaskParams) {
  return { received: params }
}

export function explode(): never {
  throw new Error('boom from task logic')
}

export function throwString(): never {
  throw 'not an error object'
}

export function exitAbruptly(): never {
  process.exit(7)
}

export function returnDate() {
  return { when: new Date(0) }
}

export function returnInfinity() {
  return { ratio: Infinity }
}
