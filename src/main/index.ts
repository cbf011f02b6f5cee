#!/usr/bin/env node
import { run_cli } from './cli/commands'

run_cli(process.argv.slice(2)).then((code) => {
  process.exitCode = code
})
