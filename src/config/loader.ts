// File: src/config/loader.ts
// Loads the account and region lists from ~/.aws-search.yml

import { readFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { join } from 'node:path'
import yaml from 'js-yaml'
import { z } from 'zod'
import { CONFIG_FILE_NAME } from './constants'
import { ConfigError, errorMessage } from '../utils/errors'
import { logger } from '../utils/logger'
import { SearchConfig } from '../types'

// Profiles are sometimes named after numeric account ids, which YAML reads as numbers
const AccountSchema = z.union([z.string().min(1), z.number()]).transform((value) => String(value))

const ConfigFileSchema = z.object({
  aws_accounts: z.array(AccountSchema).nullish(),
  aws_regions: z.array(z.string().min(1)).nullish(),
})

export interface TargetOverrides {
  accounts?: string[]
  regions?: string[]
}

export function defaultConfigPath(): string {
  return join(homedir(), CONFIG_FILE_NAME)
}

/**
 * Read and validate the configuration file
 *
 * Both lists are optional in the file; whether they are needed depends on the
 * command line overrides, which resolveTargets checks.
 */
export async function loadConfig(path = defaultConfigPath()): Promise<SearchConfig> {
  let content: string
  try {
    content = await readFile(path, 'utf8')
  } catch (error) {
    throw new ConfigError(`please configure ${path} (${errorMessage(error)})`, path, error)
  }

  let document: unknown
  try {
    document = yaml.load(content)
  } catch (error) {
    throw new ConfigError(`${path} is not valid YAML: ${errorMessage(error)}`, path, error)
  }

  // An empty file loads as undefined
  const parsed = ConfigFileSchema.safeParse(document ?? {})
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ')
    throw new ConfigError(`${path} is invalid: ${problems}`, path, parsed.error)
  }

  logger.debug({ path }, 'Loaded configuration')

  return {
    accounts: parsed.data.aws_accounts ?? [],
    regions: parsed.data.aws_regions ?? [],
  }
}

function unique(values: string[]): string[] {
  return [...new Set(values)]
}

/**
 * Apply command line overrides to the configured lists
 *
 * A non-empty override replaces the configured list entirely.
 */
export function resolveTargets(config: SearchConfig, overrides: TargetOverrides = {}): SearchConfig {
  const accounts = unique(overrides.accounts && overrides.accounts.length > 0 ? overrides.accounts : config.accounts)
  const regions = unique(overrides.regions && overrides.regions.length > 0 ? overrides.regions : config.regions)

  if (accounts.length === 0) {
    throw new ConfigError('No accounts to search: set aws_accounts in the configuration file or pass --account')
  }
  if (regions.length === 0) {
    throw new ConfigError('No regions to search: set aws_regions in the configuration file or pass --region')
  }

  logger.debug({ accounts, regions }, 'Resolved search targets')

  return { accounts, regions }
}
