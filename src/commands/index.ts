// File: src/commands/index.ts
// Central registry for all CLI commands in the application

import { Command } from 'commander'
import { registerEC2Commands } from './ec2'
import { registerELBCommands } from './elb'

/**
 * Register all commands with the CLI program
 *
 * To add a resource kind, create a command module exposing a register function
 * and call it here.
 *
 * @param program - The Commander program object to register commands with
 */
export function registerCommands(program: Command): void {
  // EC2 instance search
  registerEC2Commands(program)

  // Classic Load Balancer search
  registerELBCommands(program)
}
