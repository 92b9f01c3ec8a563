// File: src/commands/search.ts
// The search pipeline behind the ec2 and elb subcommands:
// configuration → account/region fan-out → filter → table

import { Command } from 'commander'
import { loadConfig, resolveTargets } from '../config/loader'
import { collectResources, CollectOptions } from '../services/search'
import { filterRows } from '../services/filter'
import { formatOutput, selectColumns } from '../utils/formatter'
import { ArgumentError, errorMessage } from '../utils/errors'
import { logger, setVerbose } from '../utils/logger'
import { GlobalCommandOptions, ResourceDefinition, ResourceRow, SearchCriterion } from '../types'

/**
 * Run one search and return the rendered result
 *
 * @param resource - Fetcher and columns of the resource kind searched
 * @param criteria - Filter criteria built from the subcommand options
 * @param options - Global options (overrides, verbosity, output format, config path)
 * @param collectOptions - Pool size and session factory, for tests
 */
export async function runResourceSearch<R extends ResourceRow>(
  resource: ResourceDefinition<R>,
  criteria: SearchCriterion<R>[],
  options: GlobalCommandOptions,
  collectOptions: CollectOptions = {},
): Promise<string> {
  const config = await loadConfig(options.config)
  const { accounts, regions } = resolveTargets(config, { accounts: options.account, regions: options.region })

  logger.debug(`Searching ${resource.kind} in ${accounts.length} accounts and ${regions.length} regions`)

  const { rows, failures } = await collectResources(resource.fetch, accounts, regions, collectOptions)
  const matches = filterRows(rows, criteria)

  logger.debug(`${matches.length} of ${rows.length} ${resource.kind} resources matched`)
  if (failures.length > 0) {
    logger.warn(`Results are incomplete: ${failures.length} account/region pairs could not be queried`)
  }

  return formatOutput(matches, selectColumns(resource.columns, options.verbose), options.output, {
    colors: process.stdout.isTTY === true,
  })
}

/**
 * Action body shared by the subcommands: print the result or report the error and exit
 *
 * Criteria are built inside so that option values rejected after parsing are reported
 * like any other argument error.
 */
export async function executeSearch<R extends ResourceRow>(
  resource: ResourceDefinition<R>,
  buildCriteria: () => SearchCriterion<R>[],
  command: Command,
): Promise<void> {
  const options = command.optsWithGlobals<GlobalCommandOptions>()
  setVerbose(options.verbose === true)

  try {
    const output = await runResourceSearch(resource, buildCriteria(), options)
    console.log(output)
  } catch (error) {
    if (error instanceof ArgumentError) {
      command.outputHelp({ error: true })
      command.error(`error: ${error.message}`, { exitCode: 2, code: 'awssearch.invalidArgument' })
    }

    logger.debug({ err: error }, 'Search failed')
    console.error(`Error: ${errorMessage(error)}`)
    process.exit(1)
  }
}
