export * from './dag-build-error'
