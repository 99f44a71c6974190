import { z } from 'zod';
import { commonSchemas, validateRequest } from '../../src/middlewares/validateRequest';
import { ValidationError } from '../../src/utils/AppError';

describe('validateRequest', () => {
  const schema = z.object({
    year: z.coerce.number().int().min(2000),
    label: z.string().optional(),
  });

  it('should return the parsed and coerced value', () => {
    expect(validateRequest(schema, { year: '2024' }, 'query')).toEqual({ year: 2024 });
  });

  it('should throw a ValidationError naming each field with its request part', () => {
    expect(() => validateRequest(schema, { year: '1999', label: 5 }, 'query')).toThrow(ValidationError);
    expect(() => validateRequest(schema, { year: '1999', label: 5 }, 'query')).toThrow(
      'Validation failed: [' +
        '{"field":"query.year","message":"Number must be greater than or equal to 2000"},' +
        '{"field":"query.label","message":"Expected string, received number"}]'
    );
  });

  it('should report a missing body at the part itself', () => {
    expect(() => validateRequest(schema, undefined, 'body')).toThrow(
      'Validation failed: [{"field":"body","message":"Required"}]'
    );
  });
});

describe('commonSchemas', () => {
  it('should accept only real calendar dates', () => {
    expect(commonSchemas.isoDate.safeParse('2024-02-29').success).toBe(true);
    expect(commonSchemas.isoDate.safeParse('2023-02-29').success).toBe(false);
  });

  it('should name the field in uuid errors', () => {
    const result = commonSchemas.uuid('match ID').safeParse('abc');

    expect(result.success).toBe(false);
    expect(result.error?.errors[0].message).toBe('Invalid match ID format');
  });
});
