export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export class TerminalUnavailableError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TerminalUnavailableError';
  }
}

export class TerminalIoError extends Error {
  constructor(
    message: string,
    public readonly operation: 'draw' | 'read'
  ) {
    super(message);
    this.name = 'TerminalIoError';
  }

  static wrap(operation: 'draw' | 'read', error: unknown): TerminalIoError {
    if (error instanceof TerminalIoError) return error;
    const detail = error instanceof Error ? error.message : String(error);
    const wrapped = new TerminalIoError(`Terminal ${operation} failed: ${detail}`, operation);
    wrapped.cause = error;
    return wrapped;
  }
}
