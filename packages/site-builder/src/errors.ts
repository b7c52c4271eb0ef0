/**
 * Build errors and CLI exit codes
 */

export type SiteBuildErrorCode =
  | "INPUT_NOT_FOUND"
  | "INVALID_CONFIG"
  | "UNSAFE_OUTPUT"
  | "READ_FAILED"
  | "WRITE_FAILED";

export const EXIT_CODES = {
  SUCCESS: 0,
  BUILD_ERROR: 1,
  CONFIG_ERROR: 2,
} as const;

export class SiteBuildError extends Error {
  readonly code: SiteBuildErrorCode;
  /** File or directory the failure is about, when there is one */
  readonly path?: string;

  constructor(
    code: SiteBuildErrorCode,
    message: string,
    options: { path?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "SiteBuildError";
    this.code = code;
    this.path = options.path;
  }
}

/**
 * Safely extract an error message from an unknown thrown value.
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Map a failure to the process exit code
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof SiteBuildError) {
    switch (error.code) {
      case "INPUT_NOT_FOUND":
      case "INVALID_CONFIG":
      case "UNSAFE_OUTPUT":
        return EXIT_CODES.CONFIG_ERROR;
      case "READ_FAILED":
      case "WRITE_FAILED":
        return EXIT_CODES.BUILD_ERROR;
    }
  }
  return EXIT_CODES.BUILD_ERROR;
}
