/**
 * Custom application error class for operational errors
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode: number, isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = isOperational;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);

    // Keep subclass prototypes intact for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }

  static notFound(message = 'Resource not found'): AppError {
    return new AppError(message, 404);
  }
}

/**
 * Malformed input: tolerances, date ranges, periods, request bodies.
 * Never retried.
 */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }

  /**
   * A closed range whose start lies after its end.
   */
  static invalidRange(start: string, end: string): ValidationError {
    return new ValidationError(`Invalid date range: start ${start} is after end ${end}`);
  }
}

/**
 * Raised when a reconciliation match is asked to move along an edge the
 * state machine does not have (e.g. accepting a rejected match).
 */
export class InvalidStateTransitionError extends AppError {
  public readonly from: string;
  public readonly action: string;

  constructor(from: string, action: string) {
    super(`Cannot ${action} a match with status "${from}"`, 409);
    this.from = from;
    this.action = action;
  }
}

export default AppError;
