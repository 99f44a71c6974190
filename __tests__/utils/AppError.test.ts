import { AppError, InvalidStateTransitionError, ValidationError } from '../../src/utils/AppError';

describe('AppError', () => {
  describe('constructor', () => {
    it('should create an error with message and status code', () => {
      const error = new AppError('Test error', 400);

      expect(error.message).toBe('Test error');
      expect(error.statusCode).toBe(400);
      expect(error.isOperational).toBe(true);
    });

    it('should create a non-operational error', () => {
      const error = new AppError('Internal error', 500, false);

      expect(error.isOperational).toBe(false);
    });

    it('should be an instance of Error', () => {
      const error = new AppError('Test', 400);

      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(AppError);
    });

    it('should capture stack trace', () => {
      const error = new AppError('Test', 400);

      expect(error.stack).toBeDefined();
    });
  });

  describe('static methods', () => {
    it('should create not found error', () => {
      const error = AppError.notFound();

      expect(error.statusCode).toBe(404);
      expect(error.message).toBe('Resource not found');
    });

    it('should create not found error with custom message', () => {
      const error = AppError.notFound('Match not found');

      expect(error.statusCode).toBe(404);
      expect(error.message).toBe('Match not found');
    });
  });
});

describe('ValidationError', () => {
  it('should be a 400 operational AppError', () => {
    const error = new ValidationError('Bad tolerance');

    expect(error).toBeInstanceOf(AppError);
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.statusCode).toBe(400);
    expect(error.isOperational).toBe(true);
    expect(error.name).toBe('ValidationError');
  });

  it('should describe an inverted range', () => {
    const error = ValidationError.invalidRange('2024-03-31', '2024-03-01');

    expect(error.message).toBe('Invalid date range: start 2024-03-31 is after end 2024-03-01');
  });
});

describe('InvalidStateTransitionError', () => {
  it('should be a 409 naming the status and action', () => {
    const error = new InvalidStateTransitionError('rejected', 'accept');

    expect(error).toBeInstanceOf(AppError);
    expect(error.statusCode).toBe(409);
    expect(error.message).toBe('Cannot accept a match with status "rejected"');
    expect(error.from).toBe('rejected');
    expect(error.action).toBe('accept');
  });
});
