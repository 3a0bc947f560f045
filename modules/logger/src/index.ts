export { Level, LEVELS } from './formats'
export * from './logger'
export * from './run-log-sink'
