import { type ArgumentMetadata, BadRequestException, type PipeTransform } from '@nestjs/common';
import type { z } from 'zod';

/**
 * Parses a request argument with a zod schema. Issues on a scalar route
 * parameter have no path, so they are reported under the parameter name.
 */
export class ZodValidationPipe<T> implements PipeTransform<unknown, T> {
  public constructor(private readonly schema: z.ZodType<T>) {}

  public transform(value: unknown, metadata?: ArgumentMetadata): T {
    const result = this.schema.safeParse(value);

    if (result.success) {
      return result.data;
    }

    const fallbackPath: string = metadata?.data ?? metadata?.type ?? 'value';
    const formatted: string = result.error.issues
      .map((issue): string => {
        const path: string = issue.path.length === 0 ? fallbackPath : issue.path.map(String).join('.');
        return `${path}: ${issue.message}`;
      })
      .join('; ');

    throw new BadRequestException(`Validation failed: ${formatted}`);
  }
}
