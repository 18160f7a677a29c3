/**
 * Error taxonomy for the ticket workflow.
 * Carries a kind so callers can branch without string matching.
 */
export enum TicketErrorKind {
  ALLOCATION_FAILURE = 'AllocationFailure',
  AUTHORIZATION_DENIED = 'AuthorizationDenied',
  PRECONDITION_FAILED = 'PreconditionFailed',
  TRANSPORT_FAILURE = 'TransportFailure',
  STATE_NOT_FOUND = 'StateNotFound'
}

export type TicketErrorContext = Readonly<Record<string, string | number | undefined>>;

export class TicketError extends Error {
  public readonly kind: TicketErrorKind;
  public readonly context: TicketErrorContext;

  constructor(kind: TicketErrorKind, message: string, context: TicketErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TicketError';
    this.kind = kind;
    this.context = context;
  }

  static allocationFailure(message: string, context?: TicketErrorContext, cause?: unknown): TicketError {
    return new TicketError(TicketErrorKind.ALLOCATION_FAILURE, message, context, { cause });
  }

  static denied(message: string, context?: TicketErrorContext): TicketError {
    return new TicketError(TicketErrorKind.AUTHORIZATION_DENIED, message, context);
  }

  static precondition(message: string, context?: TicketErrorContext): TicketError {
    return new TicketError(TicketErrorKind.PRECONDITION_FAILED, message, context);
  }

  static transport(message: string, context?: TicketErrorContext, cause?: unknown): TicketError {
    return new TicketError(TicketErrorKind.TRANSPORT_FAILURE, message, context, { cause });
  }

  static notFound(message: string, context?: TicketErrorContext): TicketError {
    return new TicketError(TicketErrorKind.STATE_NOT_FOUND, message, context);
  }
}
