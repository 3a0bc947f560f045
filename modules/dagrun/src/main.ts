#!/usr/bin/env -S node --import tsx
import { main } from './dagrun-cli'

main().catch(e => {
  process.exitCode = 1
  console.error(e)
})
