// File: src/commands/elb.ts
// This file implements the 'elb' command, which searches Classic Load Balancers across the
// configured accounts and regions by DNS name or load balancer name.

import { Command } from 'commander'
import { ELBCommandOptions, ELBRow, ResourceDefinition } from '../types'
import { buildELBCriteria, fetchLoadBalancers } from '../services'
import { ELB_COLUMNS } from '../templates'
import { executeSearch } from './search'

export const elbResource: ResourceDefinition<ELBRow> = {
  kind: 'elb',
  fetch: fetchLoadBalancers,
  columns: ELB_COLUMNS,
}

/**
 * Register the 'elb' command with the CLI program
 *
 * @param program The Commander program instance to register the command with
 */
export function registerELBCommands(program: Command): void {
  program
    .command('elb')
    .description('Search for Classic Elastic Load Balancers')
    .option('--dns <substring>', 'Match load balancers whose DNS name contains this text')
    .option('-n, --name <substring>', 'Match load balancers whose name contains this text')
    .action(async (options: ELBCommandOptions, command: Command) => {
      await executeSearch(elbResource, () => buildELBCriteria(options), command)
    })
}
