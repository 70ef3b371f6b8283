export class DropwatchError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Source could not be fetched or its body could not be parsed */
export class TransientFetchError extends DropwatchError {}

/** Store unreachable or a store operation failed */
export class StoreError extends DropwatchError {}

/** Outbound notification could not be delivered */
export class NotificationError extends DropwatchError {}

/** Store unreachable at process start; the monitor must not start */
export class FatalStartupError extends DropwatchError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
