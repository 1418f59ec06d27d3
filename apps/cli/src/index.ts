#!/usr/bin/env node
import { run } from './run.js'

process.exitCode = await run(process.argv.slice(2), process.env, {
  stdout: (line) => {
    process.stdout.write(line)
  },
  stderr: (line) => {
    process.stderr.write(line)
  },
})
