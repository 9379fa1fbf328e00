/**
 * Base class for failures the sync loop knows how to classify.
 */
export class SyncError extends Error {
  public constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Remote session query or catalog call failed or timed out. Retried next cycle. */
export class TransientNetworkError extends SyncError {}

/** The player process could not be started. Retried next cycle. */
export class PlayerLaunchFailure extends SyncError {}

/** The player's control channel could not be reached or stopped answering. Retried next cycle. */
export class ControlChannelUnavailable extends SyncError {}

/** The player answered a request with an error status, e.g. a property with no value while idle. */
export class PlayerRequestRejected extends SyncError {}

/**
 * Missing or malformed settings. Fatal at startup.
 */
export class ConfigurationError extends SyncError {
  public constructor(public readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
  }
}

/**
 * Extracts a printable message from an unknown rejection value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
