const HTTP_STATUS_REQUEST_TIMEOUT = 408;
const HTTP_STATUS_TOO_MANY_REQUESTS = 429;
const HTTP_STATUS_INTERNAL_SERVER_ERROR = 500;

export class VybeHttpError extends Error {
  public readonly retryable: boolean;

  public constructor(public readonly status: number) {
    super(`Vybe HTTP ${String(status)}`);
    this.name = VybeHttpError.name;
    this.retryable =
      status === HTTP_STATUS_REQUEST_TIMEOUT ||
      status === HTTP_STATUS_TOO_MANY_REQUESTS ||
      status >= HTTP_STATUS_INTERNAL_SERVER_ERROR;
  }
}

export class VybePayloadError extends Error {
  public constructor(operation: string, issueCount: number) {
    super(`Vybe payload rejected operation=${operation} issues=${String(issueCount)}`);
    this.name = VybePayloadError.name;
  }
}
