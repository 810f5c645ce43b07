const EXIT_CODE_OPERATIONAL_FAILURE = 1;
const EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE = 2;

interface LauncherErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

export class LauncherError extends Error {
  readonly code: string;
  readonly exitCode: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, exitCode: number, options: LauncherErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.code = code;
    this.exitCode = exitCode;
    if (options.details !== undefined) {
      this.details = options.details;
    }
  }
}

export class UserInputError extends LauncherError {
  constructor(message: string, options: LauncherErrorOptions = {}) {
    super(message, "USER_INPUT", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class ConfigError extends LauncherError {
  constructor(message: string, options: LauncherErrorOptions = {}) {
    super(message, "CONFIG", EXIT_CODE_CONTRACT_OR_CONFIG_FAILURE, options);
  }
}

export class ExecutionError extends LauncherError {
  constructor(message: string, options: LauncherErrorOptions = {}) {
    super(message, "EXECUTION", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

/** No interpreter from the preference list could be found on PATH. */
export class EnvironmentMissingError extends LauncherError {
  constructor(message: string, options: LauncherErrorOptions = {}) {
    super(message, "ENVIRONMENT_MISSING", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

/**
 * The child was not alive once the grace delay elapsed. A port that stayed
 * busy after reclaim also ends here, with `details.portWasBusy` set.
 */
export class StartupFailedError extends LauncherError {
  constructor(message: string, options: LauncherErrorOptions = {}) {
    super(message, "STARTUP_FAILED", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

export class ChildExitedError extends LauncherError {
  constructor(message: string, options: LauncherErrorOptions = {}) {
    super(message, "CHILD_EXITED", EXIT_CODE_OPERATIONAL_FAILURE, options);
  }
}

function isCommanderErrorLike(error: unknown): error is { code?: unknown; message?: unknown } {
  if (!error || typeof error !== "object") return false;
  if (!("code" in error)) return false;
  return typeof error.code === "string";
}

export function normalizeError(error: unknown): LauncherError {
  if (error instanceof LauncherError) return error;
  if (isCommanderErrorLike(error) && String(error.code).startsWith("commander.")) {
    const message = error instanceof Error ? error.message : String(error.message ?? error.code);
    return new UserInputError(message, {
      cause: error,
      details: {
        commanderCode: String(error.code)
      }
    });
  }
  if (error instanceof Error) {
    return new ExecutionError(error.message, { cause: error });
  }
  return new ExecutionError(String(error));
}

export function formatErrorLine(error: LauncherError): string {
  return `${error.code}: ${error.message}`;
}
