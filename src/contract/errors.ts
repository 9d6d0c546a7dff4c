/**
 * Raised locally when an event fails its schema. Never crosses the boundary.
 */
export class ValidationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid analytics event: ${message}`);
    this.name = "ValidationError";
    this.field = field;
  }
}

/**
 * Raised when the boundary call for a command fails, whatever the reason.
 * The original failure is kept as `cause`.
 */
export class TransportError extends Error {
  readonly command: string;

  constructor(command: string, cause: unknown) {
    super(`Command ${command} failed: ${describeCause(cause)}`, { cause });
    this.name = "TransportError";
    this.command = command;
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof Error) return cause.message;
  if (typeof cause === "string") return cause;
  try {
    return JSON.stringify(cause) ?? String(cause);
  } catch {
    return String(cause);
  }
}
