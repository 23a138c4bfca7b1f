/**
 * @module @plugin-host/plugin-contracts/errors
 *
 * Error taxonomy of the plugin host.
 *
 * None of these errors is fatal to the host: a failure is always contained to
 * one manifest, one plugin start or one bridge call.
 */

export type PluginHostErrorCode =
  | 'MANIFEST_ERROR'
  | 'SANDBOX_ERROR'
  | 'CHANNEL_DECODE_ERROR'
  | 'UNSUPPORTED_REQUEST'
  | 'LOCK_CONTENTION'
  | 'CONFIG_ERROR'
  | 'UNKNOWN_ERROR';

const KNOWN_ERROR_CODES: ReadonlySet<string> = new Set<PluginHostErrorCode>([
  'MANIFEST_ERROR',
  'SANDBOX_ERROR',
  'CHANNEL_DECODE_ERROR',
  'UNSUPPORTED_REQUEST',
  'LOCK_CONTENTION',
  'CONFIG_ERROR',
  'UNKNOWN_ERROR',
]);

/**
 * Type guard for PluginHostErrorCode.
 */
export function isKnownErrorCode(code: unknown): code is PluginHostErrorCode {
  return typeof code === 'string' && KNOWN_ERROR_CODES.has(code);
}

/**
 * Serialized error shape (for logs and RPC payloads)
 */
export interface SerializedError {
  name: string;
  message: string;
  code: PluginHostErrorCode;
  details?: Record<string, unknown>;
  stack?: string;
}

/**
 * Base plugin host error class
 */
export class PluginHostError extends Error {
  public readonly code: PluginHostErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: PluginHostErrorCode = 'UNKNOWN_ERROR',
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'PluginHostError';
    this.code = code;
    this.details = details;

    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
      stack: this.stack,
    };
  }
}

/**
 * Type guard for PluginHostError.
 */
export function isPluginHostError(error: unknown): error is PluginHostError {
  return error instanceof PluginHostError;
}

/**
 * Manifest could not be read, parsed, or its exec_path does not resolve.
 */
export class ManifestError extends PluginHostError {
  readonly manifestPath: string;

  constructor(manifestPath: string, message: string, options?: { cause?: unknown }) {
    super(`${message} (${manifestPath})`, 'MANIFEST_ERROR', { manifestPath }, options);
    this.name = 'ManifestError';
    this.manifestPath = manifestPath;
  }
}

/**
 * Step of sandbox startup that failed.
 */
export type SandboxStage = 'compile' | 'environment' | 'instantiate' | 'handshake';

/**
 * Sandboxed plugin failed to compile, instantiate or initialize.
 */
export class SandboxError extends PluginHostError {
  readonly pluginName: string;
  readonly stage: SandboxStage;

  constructor(
    pluginName: string,
    stage: SandboxStage,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(`Plugin "${pluginName}" failed at ${stage}: ${message}`, 'SANDBOX_ERROR', { pluginName, stage }, options);
    this.name = 'SandboxError';
    this.pluginName = pluginName;
    this.stage = stage;
  }
}

/**
 * Guest-to-host payload is not a well-formed message.
 */
export class ChannelDecodeError extends PluginHostError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CHANNEL_DECODE_ERROR', details);
    this.name = 'ChannelDecodeError';
  }
}

/**
 * Legacy plugin sent a request; only notifications are handled.
 */
export class UnsupportedRequestError extends PluginHostError {
  readonly method: string;

  constructor(method: string) {
    super(`Unsupported request: ${method}`, 'UNSUPPORTED_REQUEST', { method });
    this.name = 'UnsupportedRequestError';
    this.method = method;
  }
}

/**
 * A guarded resource was acquired while already held.
 */
export class LockContentionError extends PluginHostError {
  constructor(resource: string) {
    super(`Resource "${resource}" is already locked`, 'LOCK_CONTENTION', { resource });
    this.name = 'LockContentionError';
  }
}

/**
 * Host configuration is invalid
 */
export class ConfigError extends PluginHostError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

/**
 * Normalize any thrown value to an Error instance.
 */
export function normalizeError(error: unknown): Error {
  if (error instanceof Error) {
    return error;
  }
  if (typeof error === 'string') {
    return new Error(error);
  }
  return new Error(String(error));
}
