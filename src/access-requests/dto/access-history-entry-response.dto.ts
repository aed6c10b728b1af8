import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { AccessHistoryAction } from '../domain/enums/access-history-action.enum';

export class AccessHistoryEntryResponseDto {
  @ApiProperty({ example: 1 })
  @Expose()
  id!: number;

  @ApiProperty({ example: 1 })
  @Expose()
  accessRequestId!: number;

  @ApiProperty({
    enum: AccessHistoryAction,
    example: AccessHistoryAction.APPROVED,
  })
  @Expose()
  action!: AccessHistoryAction;

  @ApiProperty({
    example: 'Automatically approved; access expires 2025-07-19T10:00:00.000Z',
  })
  @Expose()
  description!: string;

  @ApiProperty({ example: '2025-01-20T10:00:00Z' })
  @Expose()
  occurredAt!: Date;
}
