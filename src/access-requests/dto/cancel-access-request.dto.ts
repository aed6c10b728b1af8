import { ApiProperty } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import { IsString, MaxLength, MinLength } from 'class-validator';
import {
  MAX_CANCELLATION_REASON_LENGTH,
  MIN_CANCELLATION_REASON_LENGTH,
} from '../domain/services/access-request-lifecycle.domain.service';

export class CancelAccessRequestDto {
  @ApiProperty({
    description: 'Why the access is no longer needed (10-200 characters)',
    example: 'Moved to the purchasing team',
    minLength: MIN_CANCELLATION_REASON_LENGTH,
    maxLength: MAX_CANCELLATION_REASON_LENGTH,
  })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsString()
  @MinLength(MIN_CANCELLATION_REASON_LENGTH)
  @MaxLength(MAX_CANCELLATION_REASON_LENGTH)
  reason!: string;
}
