export class HttpError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(status: number, url: string, body: string = "") {
    super(`HTTP ${status} from ${url}${body ? `: ${body.slice(0, 200)}` : ""}`);
    this.name = "HttpError";
    this.status = status;
    this.url = url;
  }
}

/** A cancel or create the venue refused. Never retried within a round. */
export class OrderMutationError extends Error {
  readonly operation: "cancel" | "create";
  readonly ref: string;

  constructor(operation: "cancel" | "create", ref: string, reason: string) {
    super(`${operation} ${ref} failed: ${reason}`);
    this.name = "OrderMutationError";
    this.operation = operation;
    this.ref = ref;
  }
}
