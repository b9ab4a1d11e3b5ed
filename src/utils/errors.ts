/**
 * Base for errors the gateway raises on purpose. `code` is stable and is what
 * the dashboard and CLI switch on; the message is for humans.
 */
export class TwinError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends TwinError {
  constructor(
    readonly entity: string,
    readonly id: string,
  ) {
    super("not_found", `${entity} not found: ${id}`);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
