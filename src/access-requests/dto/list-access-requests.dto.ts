import { ApiPropertyOptional } from '@nestjs/swagger';
import { Transform, Type } from 'class-transformer';
import {
  IsBoolean,
  IsEnum,
  IsInt,
  IsOptional,
  Max,
  Min,
} from 'class-validator';
import { AccessRequestStatus } from '../domain/enums/access-request-status.enum';

export class ListAccessRequestsDto {
  @ApiPropertyOptional({
    description: 'Filter by status',
    enum: AccessRequestStatus,
    example: AccessRequestStatus.ACTIVE,
  })
  @IsEnum(AccessRequestStatus)
  @IsOptional()
  status?: AccessRequestStatus;

  @ApiPropertyOptional({
    description: 'Only requests that include this module',
    example: 1,
  })
  @IsInt()
  @Type(() => Number)
  @Min(1)
  @IsOptional()
  moduleId?: number;

  @ApiPropertyOptional({
    description: 'Filter by urgency flag',
    example: true,
  })
  @Transform(({ value }) => {
    if (value === 'true') return true;
    if (value === 'false') return false;
    return value;
  })
  @IsBoolean()
  @IsOptional()
  urgent?: boolean;

  @ApiPropertyOptional({
    description: 'Page number (1-indexed)',
    example: 1,
    default: 1,
    minimum: 1,
  })
  @IsInt()
  @Type(() => Number)
  @Min(1)
  @IsOptional()
  page?: number;

  @ApiPropertyOptional({
    description: 'Items per page',
    example: 20,
    default: 20,
    minimum: 1,
    maximum: 100,
  })
  @IsInt()
  @Type(() => Number)
  @Min(1)
  @Max(100)
  @IsOptional()
  limit?: number;
}
