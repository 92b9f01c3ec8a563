// File: src/cli.ts
// Builds the Commander program: global options shared by every subcommand

import { Command, Option } from 'commander'
import { registerCommands } from './commands'
import { collectValues } from './utils'
import { APP_NAME, APP_DESCRIPTION, APP_VERSION, DEFAULT_OUTPUT_FORMAT, OUTPUT_FORMATS } from './config/constants'

export function createProgram(): Command {
  const program = new Command()

  // Setup version and description
  program.name(APP_NAME).description(APP_DESCRIPTION).version(APP_VERSION)

  program
    .option('-a, --account <account>', 'Account profile to search, replaces the configured list', collectValues, [])
    .option('-r, --region <region>', 'Region to search, replaces the configured list', collectValues, [])
    .option('-v, --verbose', 'Log diagnostics to stderr and show extra columns')
    .addOption(
      new Option('-o, --output <format>', 'Output format').choices(OUTPUT_FORMATS).default(DEFAULT_OUTPUT_FORMAT),
    )
    .option('-c, --config <path>', 'Configuration file (defaults to ~/.aws-search.yml)')

  // Register all commands
  registerCommands(program)

  return program
}
