export class FetchError extends Error {
  constructor(
    message: string,
    readonly url: string,
    readonly statusCode?: number,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = "FetchError";
  }
}

export class ReconcileError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "ReconcileError";
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
