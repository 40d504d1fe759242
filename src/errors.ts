export class PayrollError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends PayrollError {}

export class StoreConnectionError extends PayrollError {}

export class StoreQueryError extends PayrollError {}

export class ExportError extends PayrollError {}

export class InsertError extends PayrollError {}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
    return `${err.message}${cause}`;
  }
  return String(err);
}
