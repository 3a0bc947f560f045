export * from './constructs'
export * from './json'
export * from './strings'
