// File: src/utils/index.ts
// Export all utilities

export * from './formatter'
export * from './clients'
export * from './errors'
export * from './logger'

/**
 * Helper to collect repeatable options such as --account and --region
 */
export function collectValues(val: string, previous: string[]): string[] {
  return [...previous, val]
}
