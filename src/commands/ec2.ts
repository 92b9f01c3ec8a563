// File: src/commands/ec2.ts
// This file implements the 'ec2' command, which searches EC2 instances across the configured
// accounts and regions by name, instance id, IP address and tags.

import { Command, Option } from 'commander'
import { EC2CommandOptions, EC2InstanceRow, ResourceDefinition } from '../types'
import { buildEC2Criteria, fetchEC2Instances } from '../services'
import { EC2_COLUMNS } from '../templates'
import { executeSearch } from './search'
import { DEFAULT_INSTANCE_STATE, EC2_INSTANCE_STATES } from '../config/constants'

/**
 * Resource definition for EC2 instances in the given state
 */
export function ec2Resource(state: EC2CommandOptions['state']): ResourceDefinition<EC2InstanceRow> {
  return {
    kind: 'ec2',
    fetch: (session, region) => fetchEC2Instances(session, region, { state }),
    columns: EC2_COLUMNS,
  }
}

/**
 * Register the 'ec2' command with the CLI program
 *
 * @param program The Commander program instance to register the command with
 */
export function registerEC2Commands(program: Command): void {
  program
    .command('ec2')
    .description('Search for EC2 instances')
    .option('-n, --name <substring>', 'Match instances whose Name tag contains this text')
    .option('-i, --instance-id <substring>', 'Match instances whose id contains this text')
    .option('--ip <substring>', 'Match instances whose private or public IP contains this text')
    .option('-t, --tags <fragments>', 'Comma separated key:value fragments, each must match one tag')
    .addOption(
      new Option('-s, --state <state>', 'Instance state to list')
        .choices(EC2_INSTANCE_STATES)
        .default(DEFAULT_INSTANCE_STATE),
    )
    .action(async (options: EC2CommandOptions, command: Command) => {
      await executeSearch(ec2Resource(options.state), () => buildEC2Criteria(options), command)
    })
}
