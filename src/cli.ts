#!/usr/bin/env node
import { CommanderError } from 'commander'

import { runCli } from './run.js'

runCli(process.argv.slice(2), {
  env: process.env,
  stdout: process.stdout,
  stderr: process.stderr,
}).catch((error: unknown) => {
  // commander already printed its own message.
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode || 1
    return
  }
  const message = error instanceof Error ? error.message : String(error)
  process.stderr.write(`${message}\n`)
  process.exitCode = 1
})
