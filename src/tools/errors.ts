/**
 * Bad or missing arguments detected before any item is processed.
 * The CLI prints the message and exits with status 1.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
