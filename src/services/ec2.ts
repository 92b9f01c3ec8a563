// File: src/services/ec2.ts
/**
 * EC2 Service Module
 *
 * Describes the EC2 instances of one account in one region and normalizes them into
 * EC2InstanceRow objects. Also builds the filter criteria of the ec2 subcommand.
 */

import { Instance, Tag, paginateDescribeInstances } from '@aws-sdk/client-ec2'
import { DEFAULT_INSTANCE_STATE } from '../config/constants'
import { createEC2Client } from '../utils/clients'
import { ArgumentError, NormalizationError } from '../utils/errors'
import { matchesSubstring } from './filter'
import { Account, AccountSession, EC2InstanceRow, EC2InstanceState, Region, SearchCriterion } from '../types'

export interface EC2Query {
  state?: EC2InstanceState
}

export interface EC2SearchFilter {
  name?: string
  instanceId?: string
  ip?: string
  tags?: string
}

function findTag(tags: Tag[] | undefined, key: string): string | undefined {
  return tags?.find((tag) => tag.Key === key)?.Value
}

/**
 * Format a security group the way it is displayed and matched
 */
export function formatSecurityGroup(name: string | undefined, id: string | undefined): string {
  return `${name ?? 'unknown'} - ${id ?? 'unknown'}`
}

/**
 * Map a raw EC2 instance onto an EC2InstanceRow
 *
 * @throws NormalizationError when the instance id, Name tag or availability zone is missing
 */
export function normalizeInstance(instance: Instance, account: Account, region: Region): EC2InstanceRow {
  const instanceId = instance.InstanceId
  if (!instanceId) {
    throw new NormalizationError('EC2 instance', 'InstanceId')
  }

  const name = findTag(instance.Tags, 'Name')
  if (name === undefined) {
    throw new NormalizationError('EC2 instance', 'Tags.Name', instanceId)
  }

  const availabilityZone = instance.Placement?.AvailabilityZone
  if (!availabilityZone) {
    throw new NormalizationError('EC2 instance', 'Placement.AvailabilityZone', instanceId)
  }

  const tags: Record<string, string> = {}
  for (const tag of instance.Tags ?? []) {
    if (tag.Key && tag.Key !== 'Name') {
      tags[tag.Key] = tag.Value ?? ''
    }
  }

  return {
    kind: 'ec2',
    account,
    region,
    name,
    instanceId,
    instanceType: instance.InstanceType ?? 'unknown',
    state: instance.State?.Name ?? 'unknown',
    availabilityZone,
    privateIp: instance.PrivateIpAddress,
    publicIp: instance.PublicIpAddress,
    tags,
    securityGroups: (instance.SecurityGroups ?? []).map((group) => formatSecurityGroup(group.GroupName, group.GroupId)),
    launchTime: instance.LaunchTime,
  }
}

/**
 * Get the named EC2 instances of one account in one region
 *
 * Only instances in the requested state (running by default) that carry a Name tag
 * are returned; both conditions are applied server side. The SDK paginator follows
 * NextToken.
 *
 * @param session - Credentials of the account to query
 * @param region - AWS region to query
 * @param query - Instance state to ask for
 */
export async function fetchEC2Instances(
  session: AccountSession,
  region: Region,
  query: EC2Query = {},
): Promise<EC2InstanceRow[]> {
  const client = createEC2Client(session, region)
  const rows: EC2InstanceRow[] = []

  const pages = paginateDescribeInstances(
    { client },
    {
      Filters: [
        { Name: 'instance-state-name', Values: [query.state ?? DEFAULT_INSTANCE_STATE] },
        { Name: 'tag:Name', Values: ['*'] },
      ],
    },
  )

  for await (const page of pages) {
    for (const reservation of page.Reservations ?? []) {
      for (const instance of reservation.Instances ?? []) {
        rows.push(normalizeInstance(instance, session.account, region))
      }
    }
  }

  return rows
}

/**
 * Tag strings as shown in the Tags column, e.g. "env:prod"
 */
export function tagStrings(row: EC2InstanceRow): string[] {
  return Object.entries(row.tags).map(([key, value]) => `${key}:${value}`)
}

/**
 * Split the --tags value into the fragments that must all match
 *
 * @throws ArgumentError when no fragment is left after trimming
 */
export function parseTagTerms(value: string): string[] {
  const terms = value
    .split(',')
    .map((term) => term.trim())
    .filter((term) => term.length > 0)

  if (terms.length === 0) {
    throw new ArgumentError(`--tags expects comma separated key:value fragments, got "${value}"`, 'tags')
  }
  return terms
}

/**
 * Turn the ec2 subcommand options into filter criteria
 */
export function buildEC2Criteria(filter: EC2SearchFilter): SearchCriterion<EC2InstanceRow>[] {
  const criteria: SearchCriterion<EC2InstanceRow>[] = []

  const { name, instanceId, ip, tags } = filter
  if (name !== undefined) {
    criteria.push((row) => matchesSubstring(row.name, name))
  }
  if (instanceId !== undefined) {
    criteria.push((row) => matchesSubstring(row.instanceId, instanceId))
  }
  if (ip !== undefined) {
    criteria.push((row) => matchesSubstring(row.privateIp, ip) || matchesSubstring(row.publicIp, ip))
  }
  if (tags !== undefined) {
    const terms = parseTagTerms(tags)
    criteria.push((row) => {
      const rowTags = tagStrings(row)
      return terms.every((term) => rowTags.some((tag) => matchesSubstring(tag, term)))
    })
  }

  return criteria
}
