// Inventory or catalog could not be loaded. Fatal for the run.
export class SourceUnavailable extends Error {
  constructor(
    public readonly source: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SourceUnavailable';
  }
}

// A single export could not be written. Earlier exports stay valid.
export class ExportWriteFailure extends Error {
  constructor(
    public readonly path: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ExportWriteFailure';
  }
}

// Malformed interactive or command-line selection; the caller re-prompts.
export class InvalidSelection extends Error {
  constructor(public readonly input: string, message: string) {
    super(message);
    this.name = 'InvalidSelection';
  }
}

export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
