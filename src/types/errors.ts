/**
 * Error taxonomy for report generation.
 *
 * Offline probes and failed speedtests are not errors: they are carried as
 * NetworkResult / ThroughputResult values and rendered like any other result.
 */

export class SysTrackError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Host metrics could not be read; no partial snapshot is produced. */
export class CollectionError extends SysTrackError {
  constructor(detail: string, cause?: unknown) {
    super(`Failed to collect system information: ${detail}`, 'collect', { cause });
  }
}

/** The ping utility is missing from the host. */
export class ProbeUnavailableError extends SysTrackError {
  constructor(
    public readonly host: string,
    cause?: unknown
  ) {
    super(`ping command not found while probing ${host}. Network diagnostics unavailable.`, 'checkReachability', { cause });
  }
}

export class PersistenceError extends SysTrackError {
  constructor(
    operation: 'saveText' | 'saveJSON',
    public readonly path: string,
    cause?: unknown
  ) {
    const kind = operation === 'saveText' ? 'text' : 'JSON';
    super(`Failed to save ${kind} report to ${path}: ${describeError(cause)}`, operation, { cause });
  }
}

export class ConfigError extends SysTrackError {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message, 'loadConfig');
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  return 'Unknown error';
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
