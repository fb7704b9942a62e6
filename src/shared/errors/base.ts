/**
 * Root of the treetrace error hierarchy
 *
 * Subclasses fix `code` for programmatic handling; `recoverable` marks
 * failures a caller may retry (busy database, unreachable server).
 */
export abstract class TreetraceError extends Error {
  abstract readonly code: string;

  readonly recoverable: boolean;

  constructor(message: string, options: { cause?: Error; recoverable?: boolean } = {}) {
    super(message, { cause: options.cause });
    this.name = this.constructor.name;
    this.recoverable = options.recoverable ?? false;
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * This error followed by each `cause` that is itself an Error
   */
  getErrorChain(): Error[] {
    const chain: Error[] = [this];
    for (let current: unknown = this.cause; current instanceof Error; current = current.cause) {
      chain.push(current);
    }
    return chain;
  }

  /**
   * Message with one "Caused by" line per wrapped error
   */
  getFullMessage(): string {
    const [self, ...causes] = this.getErrorChain();
    return [self.message, ...causes.map((cause) => `  Caused by: ${cause.message}`)].join('\n');
  }
}
