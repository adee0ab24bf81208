export type CallControlErrorCode =
  | 'InvalidDestination'
  | 'SessionBusy'
  | 'NoIncomingCall'
  | 'InvalidState'
  | 'InvalidDigits'
  | 'ResourceUnavailable'
  | 'NotFound'
  | 'Conflict'
  | 'ValidationFailed';

const HTTP_STATUS: Record<CallControlErrorCode, number> = {
  InvalidDestination: 400,
  InvalidDigits: 400,
  ValidationFailed: 400,
  NotFound: 404,
  SessionBusy: 409,
  NoIncomingCall: 409,
  InvalidState: 409,
  Conflict: 409,
  ResourceUnavailable: 503,
};

export class CallControlError extends Error {
  public readonly code: CallControlErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(code: CallControlErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'CallControlError';
    this.code = code;
    this.details = details;
  }

  public get httpStatus(): number {
    return HTTP_STATUS[this.code];
  }
}

export function isCallControlError(error: unknown): error is CallControlError {
  return error instanceof CallControlError;
}

export function hasErrorCode(error: unknown, code: CallControlErrorCode): boolean {
  return isCallControlError(error) && error.code === code;
}
