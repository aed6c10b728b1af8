import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { DepartmentCode } from '../../catalog/domain/enums/department-code.enum';
import { AccessRequestStatus } from '../domain/enums/access-request-status.enum';

/**
 * Access Request Response DTO
 *
 * A DENIED request is a normal response carrying `denialReason`, not an error.
 */
export class AccessRequestResponseDto {
  @ApiProperty({ description: 'Access request ID', example: 1 })
  @Expose()
  id!: number;

  @ApiProperty({
    description: 'Protocol, PREFIX-YYYYMMDD-NNNN',
    example: 'SOL-20250120-0001',
  })
  @Expose()
  protocol!: string;

  @ApiProperty({ description: 'Requester ID', example: 'employee-42' })
  @Expose()
  requesterId!: string;

  @ApiProperty({
    description: 'Requester department at request time',
    enum: DepartmentCode,
    example: DepartmentCode.FINANCE,
  })
  @Expose()
  department!: DepartmentCode;

  @ApiProperty({ description: 'Requested modules', type: [Number], example: [1] })
  @Expose()
  moduleIds!: number[];

  @ApiProperty({
    description: 'Business reason given by the requester',
    example: 'Monthly closing of the accounts payable ledger for the branch',
  })
  @Expose()
  justification!: string;

  @ApiProperty({ example: false })
  @Expose()
  urgent!: boolean;

  @ApiProperty({
    description: 'Request status',
    enum: AccessRequestStatus,
    example: AccessRequestStatus.ACTIVE,
  })
  @Expose()
  status!: AccessRequestStatus;

  @ApiPropertyOptional({
    description: 'Why the rule engine denied the request',
    example: "Module 'Inventory Control' is not available to the FINANCE department",
  })
  @Expose()
  denialReason?: string;

  @ApiPropertyOptional({
    description: 'Reason given on cancellation',
    example: 'Moved to the purchasing team',
  })
  @Expose()
  cancellationReason?: string;

  @ApiProperty({ example: '2025-01-20T10:00:00Z' })
  @Expose()
  requestedAt!: Date;

  @ApiPropertyOptional({ example: '2025-01-20T10:00:00Z' })
  @Expose()
  approvedAt?: Date;

  @ApiPropertyOptional({
    description: 'End of access; fixed at approval',
    example: '2025-07-19T10:00:00Z',
  })
  @Expose()
  expiresAt?: Date;

  @ApiPropertyOptional({ example: '2025-02-01T08:30:00Z' })
  @Expose()
  cancelledAt?: Date;

  @ApiPropertyOptional({
    description: 'ID of the request this one renews',
    example: 7,
  })
  @Expose()
  renewedFrom?: number;
}
