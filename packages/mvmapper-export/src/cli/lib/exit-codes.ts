/**
 * Process exit codes
 */

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
