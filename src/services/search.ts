// File: src/services/search.ts
/**
 * Multi-account search
 *
 * Fans describe calls out over every (account, region) pair on a bounded pool and
 * gathers the rows back in account-major order. A pair that fails is reported and
 * skipped; the run only fails when no pair could be queried at all.
 */

import pLimit from 'p-limit'
import { FETCH_CONCURRENCY } from '../config/constants'
import { createAccountSession } from '../utils/clients'
import { FetchError, errorMessage } from '../utils/errors'
import { logger } from '../utils/logger'
import { Account, AccountRegionPair, AccountSession, Region, ResourceFetcher, ResourceRow } from '../types'

export interface CollectOptions {
  concurrency?: number
  createSession?: (account: Account) => AccountSession
}

export interface CollectResult<R extends ResourceRow> {
  rows: R[]
  failures: FetchError[]
}

/**
 * Every (account, region) pair, accounts in the outer loop
 */
export function* accountRegionPairs(accounts: Account[], regions: Region[]): Generator<AccountRegionPair> {
  for (const account of accounts) {
    for (const region of regions) {
      yield { account, region }
    }
  }
}

type PairOutcome<R> = { ok: true; rows: R[] } | { ok: false; error: FetchError }

/**
 * Fetch rows for every pair and concatenate them in pair order
 *
 * @param fetcher - Describe-and-normalize function for one resource kind
 * @param accounts - Accounts to query, in output order
 * @param regions - Regions to query in each account, in output order
 */
export async function collectResources<R extends ResourceRow>(
  fetcher: ResourceFetcher<R>,
  accounts: Account[],
  regions: Region[],
  options: CollectOptions = {},
): Promise<CollectResult<R>> {
  const createSession = options.createSession ?? createAccountSession
  const limit = pLimit(options.concurrency ?? FETCH_CONCURRENCY)

  // One session per account, shared by all its regions
  const sessions = new Map<Account, AccountSession>(accounts.map((account) => [account, createSession(account)]))

  const tasks = Array.from(accountRegionPairs(accounts, regions), ({ account, region }) =>
    limit(async (): Promise<PairOutcome<R>> => {
      const session = sessions.get(account) ?? createSession(account)
      logger.debug({ account, region }, 'Querying')
      try {
        const rows = await fetcher(session, region)
        logger.debug({ account, region, count: rows.length }, 'Fetched resources')
        return { ok: true, rows }
      } catch (error) {
        return {
          ok: false,
          error: new FetchError(
            `Failed to query account ${account} in ${region}: ${errorMessage(error)}`,
            account,
            region,
            error,
          ),
        }
      }
    }),
  )

  // Promise.all keeps task order, so rows come back in pair order whatever finishes first
  const outcomes = await Promise.all(tasks)

  const rows: R[] = []
  const failures: FetchError[] = []
  for (const outcome of outcomes) {
    if (outcome.ok) {
      rows.push(...outcome.rows)
    } else {
      logger.warn({ account: outcome.error.account, region: outcome.error.region }, outcome.error.message)
      failures.push(outcome.error)
    }
  }

  if (outcomes.length > 0 && failures.length === outcomes.length) {
    throw new FetchError(`Every account and region failed to respond (${failures.length} of ${outcomes.length})`)
  }

  return { rows, failures }
}
