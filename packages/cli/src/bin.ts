#!/usr/bin/env node
/**
 * CLI entry point for lockbox.
 *
 * @internal
 */

import { run } from './main.js'

run(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((err: unknown) => {
    process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`)
    process.exitCode = 1
  })
