// File: src/utils/errors.ts
// Error types raised while searching

import { Account, Region } from '../types'

/**
 * Base class for all errors raised by the tool
 *
 * Carries a stable error code and structured metadata for logging.
 */
export abstract class BaseError extends Error {
  public readonly code: string
  public readonly metadata: Record<string, unknown>

  constructor(message: string, code: string, metadata: Record<string, unknown> = {}) {
    super(message)
    this.name = this.constructor.name
    this.code = code
    this.metadata = metadata

    Object.setPrototypeOf(this, new.target.prototype)
  }
}

/**
 * The configuration file is missing, unreadable or invalid, or resolves to no targets
 */
export class ConfigError extends BaseError {
  constructor(message: string, path?: string, cause?: unknown) {
    super(message, 'CONFIG_ERROR', { path, cause })
  }
}

/**
 * An option value was accepted by the parser but cannot be used
 */
export class ArgumentError extends BaseError {
  constructor(message: string, option: string) {
    super(message, 'ARGUMENT_ERROR', { option })
  }
}

/**
 * A describe call for one (account, region) pair failed
 */
export class FetchError extends BaseError {
  public readonly account?: Account
  public readonly region?: Region

  constructor(message: string, account?: Account, region?: Region, cause?: unknown) {
    super(message, 'FETCH_ERROR', { account, region, cause })
    this.account = account
    this.region = region
  }
}

/**
 * An API item lacked a field every row of its kind must have
 */
export class NormalizationError extends BaseError {
  constructor(resource: string, field: string, identifier?: string) {
    super(
      `${resource}${identifier ? ` ${identifier}` : ''} is missing required field ${field}`,
      'NORMALIZATION_ERROR',
      { resource, field, identifier },
    )
  }
}

/**
 * Extract a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
