import { DepartmentCode } from '../../../catalog/domain/enums/department-code.enum';
import { AccessRequestStatus } from '../enums/access-request-status.enum';

/**
 * Domain entity for AccessRequest
 *
 * Created once, at decision time, as either ACTIVE or DENIED. There is no
 * pending state.
 *
 * Field presence by status:
 * - ACTIVE: approvedAt, expiresAt
 * - DENIED: denialReason
 * - CANCELLED: approvedAt, expiresAt, cancelledAt, cancellationReason
 *
 * `expiresAt` never changes once set. Renewal creates a new request whose
 * `renewedFrom` points at the one it renews.
 */
export interface AccessRequest {
  id: number;
  protocol: string; // PREFIX-YYYYMMDD-NNNN
  requesterId: string;
  department: DepartmentCode; // captured at request time
  moduleIds: number[];
  justification: string;
  urgent: boolean;
  status: AccessRequestStatus;
  denialReason?: string;
  cancellationReason?: string;
  requestedAt: Date;
  approvedAt?: Date;
  expiresAt?: Date;
  cancelledAt?: Date;
  renewedFrom?: number;
}

export type NewAccessRequest = Omit<AccessRequest, 'id'>;
