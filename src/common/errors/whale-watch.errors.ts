export enum WhaleWatchErrorCode {
  INVALID_ADDRESS = 'INVALID_ADDRESS',
  INVALID_THRESHOLD = 'INVALID_THRESHOLD',
  EMPTY_WHALE_TOKEN_LIST = 'EMPTY_WHALE_TOKEN_LIST',
  PROVIDER_UNAVAILABLE = 'PROVIDER_UNAVAILABLE',
  CONFIGURATION = 'CONFIGURATION',
  REGISTRY_INVARIANT_VIOLATION = 'REGISTRY_INVARIANT_VIOLATION',
}

export abstract class WhaleWatchError extends Error {
  public abstract readonly code: WhaleWatchErrorCode;

  protected constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidAddressError extends WhaleWatchError {
  public readonly code: WhaleWatchErrorCode = WhaleWatchErrorCode.INVALID_ADDRESS;

  public constructor(public readonly rawAddress: string) {
    super(`Invalid Solana address: ${rawAddress}`);
  }
}

export class InvalidThresholdError extends WhaleWatchError {
  public readonly code: WhaleWatchErrorCode = WhaleWatchErrorCode.INVALID_THRESHOLD;

  public constructor(public readonly thresholdAmount: number) {
    super(`Whale threshold must be a finite number >= 0, got ${String(thresholdAmount)}`);
  }
}

export class EmptyWhaleTokenListError extends WhaleWatchError {
  public readonly code: WhaleWatchErrorCode = WhaleWatchErrorCode.EMPTY_WHALE_TOKEN_LIST;

  public constructor(public readonly userId: string) {
    super(`An enabled whale alert needs at least one token mint userId=${userId}`);
  }
}

export class ProviderUnavailableError extends WhaleWatchError {
  public readonly code: WhaleWatchErrorCode = WhaleWatchErrorCode.PROVIDER_UNAVAILABLE;

  public constructor(
    public readonly operation: string,
    public readonly attempts: number,
    cause: unknown,
  ) {
    super(
      `Provider unavailable operation=${operation} attempts=${String(attempts)} reason=${describeCause(cause)}`,
      { cause },
    );
  }
}

export class ConfigurationError extends WhaleWatchError {
  public readonly code: WhaleWatchErrorCode = WhaleWatchErrorCode.CONFIGURATION;

  public constructor(message: string) {
    super(message);
  }
}

/** Raised on states the registry must never reach, e.g. duplicate subscriptions on restore. */
export class RegistryInvariantViolationError extends WhaleWatchError {
  public readonly code: WhaleWatchErrorCode = WhaleWatchErrorCode.REGISTRY_INVARIANT_VIOLATION;

  public constructor(message: string) {
    super(message);
  }
}

const describeCause = (cause: unknown): string =>
  cause instanceof Error ? cause.message : String(cause);
