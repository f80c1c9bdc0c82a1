export type CommandErrorCode = "NOT_FOUND" | "INVALID_TASK" | "STATE_CONFLICT" | "REQUEST_ABORTED" | "BAD_REQUEST";

export class CommandError extends Error {
  constructor(
    message: string,
    readonly code: CommandErrorCode,
    readonly httpStatus: number,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class NotFoundError extends CommandError {
  constructor(readonly droneId: string) {
    super(`Unknown drone_id=${droneId}`, "NOT_FOUND", 404);
  }
}

export class InvalidTaskError extends CommandError {
  constructor(message: string) {
    super(message, "INVALID_TASK", 400);
  }
}

// Assignments never conflict under the single world lock; manual stepping of a running clock does.
export class StateConflictError extends CommandError {
  constructor(message: string) {
    super(message, "STATE_CONFLICT", 409);
  }
}

export class RequestAbortedError extends CommandError {
  constructor() {
    super("Request aborted before it was applied", "REQUEST_ABORTED", 499);
  }
}

// Malformed request envelope (not the task itself).
export class BadRequestError extends CommandError {
  constructor(message: string) {
    super(message, "BAD_REQUEST", 400);
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
