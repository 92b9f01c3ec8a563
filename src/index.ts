#!/usr/bin/env node
import { createProgram } from './cli'

// Parse arguments; each subcommand reports its own errors and exit code
createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    console.error(error)
    process.exit(1)
  })
