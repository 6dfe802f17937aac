import { PipeTransform, UnprocessableEntityException } from '@nestjs/common';
import { z } from 'zod';

/**
 * Validates and coerces a request part (query or body) against a zod schema.
 * Failures answer 422 with the flattened field errors.
 */
export class ZodValidationPipe<S extends z.ZodTypeAny>
  implements PipeTransform<unknown, z.infer<S>>
{
  constructor(private readonly schema: S) {}

  transform(value: unknown): z.infer<S> {
    const result = this.schema.safeParse(value);
    if (result.success) {
      return result.data;
    }

    const { formErrors, fieldErrors } = result.error.flatten();
    throw new UnprocessableEntityException({
      message: 'Validation failed',
      errors: { ...fieldErrors, ...(formErrors.length ? { _: formErrors } : {}) },
    });
  }
}
