/**
 * Error kinds raised by the monitor.
 *
 * Only ConfigValidationError is fatal; the others are contained to the node,
 * notifier or remediation action that produced them.
 */

export class MonitorError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export type CollectionErrorKind =
  | 'timeout'
  | 'auth'
  | 'unreachable'
  | 'command'
  | 'cancelled'
  | 'config';

export class CollectionError extends MonitorError {
  constructor(
    readonly kind: CollectionErrorKind,
    message: string,
    readonly nodeName?: string,
  ) {
    super(message);
  }
}

export class ConfigValidationError extends MonitorError {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
  }
}

export class NotifierDeliveryError extends MonitorError {
  constructor(
    readonly notifier: string,
    message: string,
    readonly status?: number,
  ) {
    super(`${notifier}: ${message}`);
  }
}

export class RemediationDispatchError extends MonitorError {
  constructor(
    readonly nodeName: string,
    readonly triggerKey: string,
    message: string,
  ) {
    super(`${nodeName} ${triggerKey}: ${message}`);
  }
}

/** Normalise anything thrown into a CollectionError. */
export function toCollectionError(err: unknown, nodeName?: string): CollectionError {
  if (err instanceof CollectionError) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new CollectionError('command', message, nodeName);
}
