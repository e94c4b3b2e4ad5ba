import type { ConfiguratorStep, SshService } from '../types.js';

export type FailureKind =
  | 'unexpected'
  | 'configuration'
  | 'connection'
  | 'timeout'
  | 'authentication'
  | 'device-rejection';

/**
 * Base class for every failure the configurator reports. `step` is filled in
 * by the configurator once it knows which remote call was running.
 */
export class CipherConfiguratorError extends Error {
  readonly kind: FailureKind = 'unexpected';
  step?: ConfiguratorStep;

  constructor(message: string, options?: { cause?: unknown; step?: ConfiguratorStep }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'CipherConfiguratorError';
    this.step = options?.step;
  }
}

export class ConfigurationLoadError extends CipherConfiguratorError {
  override readonly kind = 'configuration';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigurationLoadError';
  }
}

export class ConnectionError extends CipherConfiguratorError {
  override readonly kind: FailureKind = 'connection';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

export class RequestTimeoutError extends ConnectionError {
  override readonly kind: FailureKind = 'timeout';

  constructor(readonly timeoutMs: number, what: string) {
    super(`${what} timed out after ${timeoutMs} ms`);
    this.name = 'RequestTimeoutError';
  }
}

export class AuthenticationError extends CipherConfiguratorError {
  override readonly kind = 'authentication';

  constructor(message: string) {
    super(message);
    this.name = 'AuthenticationError';
  }
}

/** The device answered with `status="error"`. */
export class DeviceApiError extends CipherConfiguratorError {
  override readonly kind: FailureKind = 'device-rejection';

  constructor(message: string, readonly code?: number) {
    super(message);
    this.name = 'DeviceApiError';
  }
}

export class InvalidConfigurationError extends DeviceApiError {
  constructor(message: string, code?: number) {
    super(message, code);
    this.name = 'InvalidConfigurationError';
  }
}

export class InvalidCipherSuiteError extends InvalidConfigurationError {
  constructor(readonly service: SshService, readonly suite: string[], detail: string, code?: number) {
    super(`Device rejected cipher suite [${suite.join(', ')}] for ${service}: ${detail}`, code);
    this.name = 'InvalidCipherSuiteError';
  }
}

export class CommitError extends DeviceApiError {
  constructor(message: string, code?: number) {
    super(message, code);
    this.name = 'CommitError';
  }
}

/** The device accepted the commit but the job did not finish in time. */
export class CommitTimeoutError extends CommitError {
  override readonly kind: FailureKind = 'timeout';

  constructor(readonly jobId: number, readonly timeoutMs: number) {
    super(`Commit job ${jobId} did not finish within ${timeoutMs} ms`);
    this.name = 'CommitTimeoutError';
  }
}

export class RestartError extends DeviceApiError {
  constructor(message: string, code?: number) {
    super(message, code);
    this.name = 'RestartError';
  }
}

const EXIT_CODES: Record<FailureKind, number> = {
  unexpected: 1,
  configuration: 2,
  connection: 3,
  timeout: 3,
  authentication: 4,
  'device-rejection': 5,
};

const FAILURE_LABELS: Record<FailureKind, string> = {
  unexpected: 'Unexpected failure',
  configuration: 'Configuration load failed',
  connection: 'Could not reach the firewall',
  timeout: 'Timed out waiting for the firewall',
  authentication: 'Authentication failed',
  'device-rejection': 'Device rejected the request',
};

export function exitCodeFor(error: unknown): number {
  return error instanceof CipherConfiguratorError ? EXIT_CODES[error.kind] : EXIT_CODES.unexpected;
}

export function describeFailure(error: unknown): string {
  if (!(error instanceof CipherConfiguratorError)) {
    const message = error instanceof Error ? error.message : String(error);
    return `${FAILURE_LABELS.unexpected}: ${message}`;
  }

  const label = FAILURE_LABELS[error.kind];
  return error.step
    ? `${label} at step "${error.step}": ${error.message}`
    : `${label}: ${error.message}`;
}
