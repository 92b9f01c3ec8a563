// File: src/config/constants.ts
// Configuration constants for the application

/**
 * Name of the YAML file, in the user's home directory, listing accounts and regions
 */
export const CONFIG_FILE_NAME = '.aws-search.yml'

/**
 * Supported output formats for search results
 */
export const OUTPUT_FORMATS = ['table', 'json'] as const

/**
 * Default output format for search results
 */
export const DEFAULT_OUTPUT_FORMAT = 'table'

/**
 * EC2 instance states accepted by the ec2 --state option
 */
export const EC2_INSTANCE_STATES = ['pending', 'running', 'shutting-down', 'terminated', 'stopping', 'stopped'] as const

/**
 * Only running instances are listed unless another state is asked for
 */
export const DEFAULT_INSTANCE_STATE = 'running'

/**
 * Maximum number of (account, region) describe calls in flight at once
 */
export const FETCH_CONCURRENCY = 4

/**
 * Application name and version information
 */
export const APP_NAME = 'awssearch'
export const APP_DESCRIPTION = 'Search AWS inventory across accounts and regions'
export const APP_VERSION = '0.3.0'
