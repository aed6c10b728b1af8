import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  ArrayUnique,
  IsArray,
  IsBoolean,
  IsInt,
  IsOptional,
  IsString,
  MaxLength,
  Min,
  MinLength,
} from 'class-validator';
import {
  MAX_JUSTIFICATION_LENGTH,
  MAX_MODULES_PER_REQUEST,
  MIN_JUSTIFICATION_LENGTH,
  MIN_MODULES_PER_REQUEST,
} from '../domain/services/access-request-lifecycle.domain.service';

export class CreateAccessRequestDto {
  @ApiProperty({
    description: 'Modules to activate (1-3, no repeats)',
    type: [Number],
    example: [1],
  })
  @IsArray()
  @ArrayMinSize(MIN_MODULES_PER_REQUEST)
  @ArrayMaxSize(MAX_MODULES_PER_REQUEST)
  @ArrayUnique()
  @IsInt({ each: true })
  @Min(1, { each: true })
  moduleIds!: number[];

  @ApiProperty({
    description: 'Business reason for the access (20-500 characters)',
    example: 'Monthly closing of the accounts payable ledger for the branch',
    minLength: MIN_JUSTIFICATION_LENGTH,
    maxLength: MAX_JUSTIFICATION_LENGTH,
  })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsString()
  @MinLength(MIN_JUSTIFICATION_LENGTH)
  @MaxLength(MAX_JUSTIFICATION_LENGTH)
  justification!: string;

  @ApiPropertyOptional({
    description: 'Flag the request as urgent',
    default: false,
  })
  @IsBoolean()
  @IsOptional()
  urgent?: boolean;
}
