import {
  AccessRequest,
  NewAccessRequest,
} from '../../../../domain/entities/access-request.entity';
import { AccessRequestEntity } from '../entities/access-request.entity';

export class AccessRequestMapper {
  static toDomain(entity: AccessRequestEntity): AccessRequest {
    return {
      id: entity.id,
      protocol: entity.protocol,
      requesterId: entity.requesterId,
      department: entity.department,
      moduleIds: [...entity.moduleIds],
      justification: entity.justification,
      urgent: entity.urgent,
      status: entity.status,
      denialReason: entity.denialReason ?? undefined,
      cancellationReason: entity.cancellationReason ?? undefined,
      requestedAt: entity.requestedAt,
      approvedAt: entity.approvedAt ?? undefined,
      expiresAt: entity.expiresAt ?? undefined,
      cancelledAt: entity.cancelledAt ?? undefined,
      renewedFrom: entity.renewedFromId ?? undefined,
    };
  }

  static toPersistence(domain: NewAccessRequest): AccessRequestEntity {
    const entity = new AccessRequestEntity();
    entity.protocol = domain.protocol;
    entity.requesterId = domain.requesterId;
    entity.department = domain.department;
    entity.moduleIds = [...domain.moduleIds];
    entity.justification = domain.justification;
    entity.urgent = domain.urgent;
    entity.status = domain.status;
    entity.denialReason = domain.denialReason ?? null;
    entity.cancellationReason = domain.cancellationReason ?? null;
    entity.requestedAt = domain.requestedAt;
    entity.approvedAt = domain.approvedAt ?? null;
    entity.expiresAt = domain.expiresAt ?? null;
    entity.cancelledAt = domain.cancelledAt ?? null;
    entity.renewedFromId = domain.renewedFrom ?? null;
    return entity;
  }
}
