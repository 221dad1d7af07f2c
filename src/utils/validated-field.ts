import { z } from 'zod';

import { TypeMismatchError } from '../errors';

/**
 * A named value slot that checks every assignment against a zod schema.
 * Reusable wherever a field must keep its declared type after construction.
 */
export class ValidatedField<T> {
  private value: T;

  constructor(
    public readonly name: string,
    private readonly schema: z.ZodType<T>,
    public readonly expectedType: string,
    initial: unknown,
  ) {
    this.value = this.parse(initial);
  }

  get(): T {
    return this.value;
  }

  set(value: unknown): void {
    this.value = this.parse(value);
  }

  private parse(value: unknown): T {
    const result = this.schema.safeParse(value);
    if (!result.success) {
      throw new TypeMismatchError(this.name, this.expectedType);
    }
    return result.data;
  }
}
