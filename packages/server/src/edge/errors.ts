/**
 * Raised when the edge configuration cannot be loaded: credentials missing,
 * parameter store unreachable or returning an error, an unparsable response,
 * or required parameters absent. Never shown to viewers.
 */
export class ConfigUnavailableError extends Error {
  readonly invalidParameters: string[];

  constructor(message: string, options: { invalidParameters?: string[]; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'ConfigUnavailableError';
    this.invalidParameters = options.invalidParameters ?? [];
  }
}
