#!/usr/bin/env node
import { main } from './cli'

main().then((code) => {
  process.exitCode = code
}).catch((e: unknown) => {
  console.error(e)
  process.exitCode = 1
})
