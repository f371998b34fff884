export class GifBotError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    cause?: unknown,
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'GifBotError';
    Object.setPrototypeOf(this, GifBotError.prototype);
  }
}

/** The conversion binary could not be started on this host. */
export class ToolUnavailableError extends GifBotError {
  constructor(public readonly toolPath: string, cause?: unknown) {
    super(`Conversion tool not available at ${toolPath}`, 'TOOL_UNAVAILABLE', cause);
    this.name = 'ToolUnavailableError';
    Object.setPrototypeOf(this, ToolUnavailableError.prototype);
  }
}

/** The tool ran for a profile but left no usable output. */
export class ConversionFailedError extends GifBotError {
  constructor(public readonly profile: string, reason: string, cause?: unknown) {
    super(`Conversion with profile "${profile}" failed: ${reason}`, 'CONVERSION_FAILED', cause);
    this.name = 'ConversionFailedError';
    Object.setPrototypeOf(this, ConversionFailedError.prototype);
  }
}

export type ConversionError = ToolUnavailableError | ConversionFailedError;

export class EndpointFailedError extends GifBotError {
  constructor(public readonly endpoint: string, public readonly reason: string, cause?: unknown) {
    super(`Upload to ${endpoint} failed: ${reason}`, 'ENDPOINT_FAILED', cause);
    this.name = 'EndpointFailedError';
    Object.setPrototypeOf(this, EndpointFailedError.prototype);
  }
}

export class AllEndpointsExhaustedError extends GifBotError {
  constructor(public readonly failures: readonly EndpointFailedError[]) {
    super(
      `All upload endpoints failed (${failures.map((f) => `${f.endpoint}: ${f.reason}`).join('; ')})`,
      'ALL_ENDPOINTS_EXHAUSTED',
    );
    this.name = 'AllEndpointsExhaustedError';
    Object.setPrototypeOf(this, AllEndpointsExhaustedError.prototype);
  }
}

export class ConfigMissingError extends GifBotError {
  constructor(public readonly issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`, 'CONFIG_MISSING');
    this.name = 'ConfigMissingError';
    Object.setPrototypeOf(this, ConfigMissingError.prototype);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
