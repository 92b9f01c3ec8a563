// File: src/utils/clients.ts
// Client creation utilities

import { EC2Client } from '@aws-sdk/client-ec2'
import { ElasticLoadBalancingClient } from '@aws-sdk/client-elastic-load-balancing'
import { fromIni } from '@aws-sdk/credential-providers'
import { Account, AccountSession, Region } from '../types'

/**
 * Resolve the credential profile named after an account
 *
 * The provider is lazy: the profile is only read when the first call is signed,
 * so a misconfigured profile fails that account's describe calls and nothing else.
 */
export function createAccountSession(account: Account): AccountSession {
  return {
    account,
    credentials: fromIni({ profile: account }),
  }
}

/**
 * Create an EC2 client
 * @param session Credentials of the account to query
 * @param region AWS region
 */
export function createEC2Client(session: AccountSession, region: Region): EC2Client {
  return new EC2Client({ region, credentials: session.credentials })
}

/**
 * Create an ELB client (Classic ELB - v1)
 * @param session Credentials of the account to query
 * @param region AWS region
 */
export function createELBClient(session: AccountSession, region: Region): ElasticLoadBalancingClient {
  return new ElasticLoadBalancingClient({ region, credentials: session.credentials })
}
