/**
 * Error types.
 *
 * ConfigError is fatal and only raised before anything starts.
 * UpstreamError is recoverable: the sub-exporter logs it and the next fetch
 * tick is the retry.
 */

/** Invalid or missing configuration (environment variable) */
export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string, options?: ErrorOptions) {
    super(`${variable}: ${message}`, options);
    this.name = "ConfigError";
    this.variable = variable;
  }
}

/** A request to an upstream API failed or returned unusable data */
export class UpstreamError extends Error {
  readonly url: string;
  /** HTTP status, when the server responded */
  readonly status: number | null;

  constructor(
    message: string,
    details: { url: string; status?: number; cause?: unknown },
  ) {
    super(message, { cause: details.cause });
    this.name = "UpstreamError";
    this.url = details.url;
    this.status = details.status ?? null;
  }
}
