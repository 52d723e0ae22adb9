/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  FAILED: 1,
  NO_MATCH: 2,
  INVALID_ARGS: 3,
  INTEGRITY_FAILED: 4,
  RETRYABLE_FAILURE: 10,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

/** Map a command error code onto the process exit code. */
export function exitCodeFor(code: string): ExitCode {
  switch (code) {
    case "NO_MATCH":
      return EXIT.NO_MATCH;
    case "INTEGRITY_ERROR":
      return EXIT.INTEGRITY_FAILED;
    case "NETWORK_ERROR":
      return EXIT.RETRYABLE_FAILURE;
    case "CONFIG_INVALID":
    case "UNKNOWN_DISTRO":
    case "INVALID_ARGS":
      return EXIT.INVALID_ARGS;
    default:
      return EXIT.FAILED;
  }
}
