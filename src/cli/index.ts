#!/usr/bin/env node

/**
 * fanout CLI
 *
 * Entry point for the fanout command
 */

import { runCli } from './run'

runCli(process.argv.slice(2), {
  out: text => process.stdout.write(text),
  err: text => process.stderr.write(text),
  env: process.env,
  cwd: process.cwd(),
})
  .then(code => {
    process.exitCode = code
  })
  .catch((error: unknown) => {
    console.error(error)
    process.exitCode = 1
  })
