/**
 * Check if running in test environment.
 * Detects both NODE_ENV=test and the Vitest runner.
 */
export function isTest(): boolean {
  return process.env.NODE_ENV === 'test' || process.env.VITEST === 'true';
}
