/**
 * Custom Error Classes
 */

/**
 * Thrown when a path resolves outside the sandbox root
 */
export class SandboxViolationError extends Error {
  public readonly requestedPath: string;
  public readonly sandboxRoot: string;

  constructor(requestedPath: string, sandboxRoot: string) {
    super(`Access denied: ${requestedPath} is outside sandbox ${sandboxRoot}`);
    this.name = 'SandboxViolationError';
    this.requestedPath = requestedPath;
    this.sandboxRoot = sandboxRoot;

    // Maintains proper stack trace for where error was thrown (only in V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SandboxViolationError);
    }
  }
}

/**
 * Thrown at startup when the configuration cannot drive a run
 */
export class ConfigurationError extends Error {
  public readonly problems: string[];

  constructor(problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigurationError';
    this.problems = problems;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
