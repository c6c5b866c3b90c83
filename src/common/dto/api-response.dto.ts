// src/common/dto/api-response.dto.ts

import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { ErrorCode } from './standard-response.dto';

/**
 * Error body (Swagger only)
 */
export class ApiErrorDto {
  @ApiProperty({
    enum: ErrorCode,
    example: ErrorCode.NOT_FOUND,
  })
  code!: string;

  @ApiProperty({ example: 'No coordinates found for "Atlantis"' })
  message!: string;

  @ApiPropertyOptional({ type: Object, example: { kind: 'NOT_FOUND' } })
  details?: Record<string, unknown>;
}

/**
 * Success envelope (Swagger only)
 */
export class ApiSuccessResponseDto<T> {
  @ApiProperty({ enum: [true], example: true })
  success!: true;

  @ApiProperty()
  data!: T;
}

/**
 * Error envelope (Swagger only)
 */
export class ApiErrorResponseDto {
  @ApiProperty({ enum: [false], example: false })
  success!: false;

  @ApiProperty({ type: ApiErrorDto })
  error!: ApiErrorDto;
}
