export type ConnectFailure = 'RelayUnreachable' | 'TargetUnreachable' | 'AuthRejected';
export type ConnectHop = 'relay' | 'target';
export type PlanningFailure = 'InvalidTask' | 'InvalidRange' | 'UnresolvedParameter' | 'DuplicateDevice';
export type IdentityFailure = 'NotFound' | 'Ambiguous' | 'LookupFailed';

export class DeviceRunnerError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  public constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DeviceRunnerError';
    this.code = code;
    this.details = details;
  }
}

/** Raised by SessionTransport.open before any command is sent. */
export class ConnectError extends DeviceRunnerError {
  public readonly reason: ConnectFailure;
  public readonly hop: ConnectHop;

  public constructor(reason: ConnectFailure, hop: ConnectHop, message: string, cause?: unknown) {
    super(reason, message, cause instanceof Error ? { cause: cause.message } : undefined);
    this.name = 'ConnectError';
    this.reason = reason;
    this.hop = hop;
  }
}

/** Raised at plan time; never reaches the network layer. */
export class PlanningError extends DeviceRunnerError {
  public readonly kind: PlanningFailure;

  public constructor(kind: PlanningFailure, message: string, details?: Record<string, unknown>) {
    super(kind, message, details);
    this.name = 'PlanningError';
    this.kind = kind;
  }
}

export class PersistFailedError extends DeviceRunnerError {
  public readonly deviceKey: string;
  public readonly attempts: number;

  public constructor(deviceKey: string, attempts: number, cause?: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('PersistFailed', `Persisting state for ${deviceKey} failed after ${attempts} attempt(s): ${detail}`);
    this.name = 'PersistFailedError';
    this.deviceKey = deviceKey;
    this.attempts = attempts;
  }
}

export class IdentityLookupError extends DeviceRunnerError {
  public readonly kind: IdentityFailure;

  public constructor(kind: IdentityFailure, message: string, details?: Record<string, unknown>) {
    super(kind, message, details);
    this.name = 'IdentityLookupError';
    this.kind = kind;
  }
}

export class SessionConflictError extends DeviceRunnerError {
  public constructor(deviceKey: string) {
    super('SessionConflict', `A session for ${deviceKey} is already open`, { deviceKey });
    this.name = 'SessionConflictError';
  }
}

export class ProfileCatalogError extends DeviceRunnerError {
  public constructor(message: string, details?: Record<string, unknown>) {
    super('ProfileCatalog', message, details);
    this.name = 'ProfileCatalogError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
