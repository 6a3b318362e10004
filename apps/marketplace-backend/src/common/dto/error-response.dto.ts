import { ApiProperty } from '@nestjs/swagger';

export class ValidationErrorDetailDto {
  @ApiProperty()
  field!: string;

  @ApiProperty()
  message!: string;
}

export class ValidationErrorResponseDto {
  @ApiProperty({ example: 'VALIDATION_ERROR' })
  code!: string;

  @ApiProperty({ example: 'Validation failed' })
  message!: string;

  @ApiProperty({ type: [ValidationErrorDetailDto] })
  errors!: ValidationErrorDetailDto[];
}

export class ErrorResponseDto {
  @ApiProperty()
  code!: string;

  @ApiProperty()
  message!: string;

  @ApiProperty({ required: false, type: 'object', additionalProperties: true })
  details?: Record<string, unknown>;
}
