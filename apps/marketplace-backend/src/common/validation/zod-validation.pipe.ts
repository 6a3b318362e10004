import {
  BadRequestException,
  Injectable,
  type ArgumentMetadata,
  type PipeTransform,
} from '@nestjs/common';
import type { z } from 'zod';

type RequestLocation = 'body' | 'query' | 'params';

export type FieldError = {
  field: string;
  message: string;
};

export const formatZodIssues = (
  location: RequestLocation,
  issues: z.ZodIssue[],
): FieldError[] =>
  issues.map((issue) => {
    const suffix = issue.path.map(String).join('.');
    return {
      field: suffix ? `${location}.${suffix}` : location,
      message: issue.message,
    };
  });

@Injectable()
export class ZodValidationPipe<T> implements PipeTransform<unknown, T> {
  constructor(
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    private readonly location?: RequestLocation,
  ) {}

  transform(value: unknown, metadata: ArgumentMetadata): T {
    const result = this.schema.safeParse(value);
    if (result.success) {
      return result.data;
    }

    throw new BadRequestException({
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      errors: formatZodIssues(
        this.location ?? this.resolveLocation(metadata.type),
        result.error.issues,
      ),
    });
  }

  private resolveLocation(type: ArgumentMetadata['type']): RequestLocation {
    switch (type) {
      case 'query':
        return 'query';
      case 'param':
        return 'params';
      default:
        return 'body';
    }
  }
}
