// File: src/types/index.ts
// Central location for shared types
import { fromIni } from '@aws-sdk/credential-providers'
import { EC2_INSTANCE_STATES, OUTPUT_FORMATS } from '../config/constants'

// An account is addressed by the name of its local credential profile
export type Account = string

// AWS region code, e.g. us-east-1
export type Region = string

export interface AccountRegionPair {
  account: Account
  region: Region
}

/**
 * Credentials for one account, resolved once and shared by every region queried in it
 */
export interface AccountSession {
  account: Account
  credentials: ReturnType<typeof fromIni>
}

// Lists read from ~/.aws-search.yml
export interface SearchConfig {
  accounts: Account[]
  regions: Region[]
}

export type OutputFormat = (typeof OUTPUT_FORMATS)[number]

export type EC2InstanceState = (typeof EC2_INSTANCE_STATES)[number]

// EC2 instance row
export interface EC2InstanceRow {
  kind: 'ec2'
  account: Account
  region: Region
  name: string
  instanceId: string
  instanceType: string
  state: string
  availabilityZone: string
  privateIp?: string
  publicIp?: string
  tags: Record<string, string> // Name tag excluded, it is carried by `name`
  securityGroups: string[]
  launchTime?: Date
}

// Classic load balancer row
export interface ELBRow {
  kind: 'elb'
  account: Account
  region: Region
  name: string
  dnsName: string
  instanceIds: string[]
  securityGroups: string[]
  createdTime?: Date
}

export type ResourceRow = EC2InstanceRow | ELBRow

/**
 * Fetch every resource of one kind for a single (account, region) pair
 */
export type ResourceFetcher<R extends ResourceRow> = (session: AccountSession, region: Region) => Promise<R[]>

// A predicate a row has to satisfy to be kept by the filter
export type SearchCriterion<R extends ResourceRow> = (row: R) => boolean

export interface ColumnSpec<R extends ResourceRow> {
  name: string
  title: string
  value: (row: R) => string
  verbose?: boolean // Only shown with --verbose
}

/**
 * Everything the search pipeline needs to know about one resource kind
 */
export interface ResourceDefinition<R extends ResourceRow> {
  kind: R['kind']
  fetch: ResourceFetcher<R>
  columns: ColumnSpec<R>[]
}

// Options shared by every subcommand (declared on the root program)
export type GlobalCommandOptions = {
  account: string[]
  region: string[]
  verbose?: boolean
  output: OutputFormat
  config?: string
}

export interface EC2CommandOptions {
  name?: string
  instanceId?: string
  ip?: string
  tags?: string
  state: EC2InstanceState
}

export interface ELBCommandOptions {
  dns?: string
  name?: string
}
