// File: src/services/elb.ts
/**
 * Elastic Load Balancer (ELB) Service Module
 *
 * Describes the Classic Load Balancers of one account in one region, together with
 * the EC2 instances registered with them.
 */

import { LoadBalancerDescription, paginateDescribeLoadBalancers } from '@aws-sdk/client-elastic-load-balancing'
import { createELBClient } from '../utils/clients'
import { NormalizationError } from '../utils/errors'
import { matchesSubstring } from './filter'
import { Account, AccountSession, ELBRow, Region, SearchCriterion } from '../types'

export interface ELBSearchFilter {
  dns?: string
  name?: string
}

/**
 * Map a Classic ELB description onto an ELBRow
 *
 * @throws NormalizationError when the name or DNS name is missing
 */
export function normalizeLoadBalancer(description: LoadBalancerDescription, account: Account, region: Region): ELBRow {
  const name = description.LoadBalancerName
  if (!name) {
    throw new NormalizationError('Load balancer', 'LoadBalancerName')
  }

  const dnsName = description.DNSName
  if (!dnsName) {
    throw new NormalizationError('Load balancer', 'DNSName', name)
  }

  const instanceIds: string[] = []
  for (const instance of description.Instances ?? []) {
    if (instance.InstanceId) {
      instanceIds.push(instance.InstanceId)
    }
  }

  return {
    kind: 'elb',
    account,
    region,
    name,
    dnsName,
    instanceIds,
    securityGroups: description.SecurityGroups ?? [],
    createdTime: description.CreatedTime,
  }
}

/**
 * Get Classic ELBs (v1) of one account in one region
 *
 * @param session - Credentials of the account to query
 * @param region - AWS region to query
 */
export async function fetchLoadBalancers(session: AccountSession, region: Region): Promise<ELBRow[]> {
  const client = createELBClient(session, region)
  const rows: ELBRow[] = []

  for await (const page of paginateDescribeLoadBalancers({ client }, {})) {
    for (const description of page.LoadBalancerDescriptions ?? []) {
      rows.push(normalizeLoadBalancer(description, session.account, region))
    }
  }

  return rows
}

/**
 * Turn the elb subcommand options into filter criteria
 */
export function buildELBCriteria(filter: ELBSearchFilter): SearchCriterion<ELBRow>[] {
  const criteria: SearchCriterion<ELBRow>[] = []

  const { dns, name } = filter
  if (dns !== undefined) {
    criteria.push((row) => matchesSubstring(row.dnsName, dns))
  }
  if (name !== undefined) {
    criteria.push((row) => matchesSubstring(row.name, name))
  }

  return criteria
}
