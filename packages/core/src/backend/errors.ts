/** Raised by a waiter whose reply did not arrive before its deadline. */
export class ReplyTimeoutError extends Error {
  constructor(
    public readonly correlationId: string,
    public readonly timeoutMs: number,
  ) {
    super(`No reply for ${correlationId} within ${timeoutMs}ms`);
    this.name = "ReplyTimeoutError";
  }
}

/** Delivered to every outstanding request when the backend socket goes away. */
export class BackendDisconnectedError extends Error {
  constructor(reason = "Backend connection closed") {
    super(reason);
    this.name = "BackendDisconnectedError";
  }
}
