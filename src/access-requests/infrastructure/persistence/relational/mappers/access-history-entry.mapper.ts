import {
  AccessHistoryDraft,
  AccessHistoryEntry,
} from '../../../../domain/entities/access-history-entry.entity';
import { AccessHistoryEntryEntity } from '../entities/access-history-entry.entity';

export class AccessHistoryEntryMapper {
  static toDomain(entity: AccessHistoryEntryEntity): AccessHistoryEntry {
    return {
      id: entity.id,
      accessRequestId: entity.accessRequestId,
      action: entity.action,
      description: entity.description,
      occurredAt: entity.occurredAt,
    };
  }

  static toPersistence(
    draft: AccessHistoryDraft,
    accessRequestId: number,
  ): AccessHistoryEntryEntity {
    const entity = new AccessHistoryEntryEntity();
    entity.accessRequestId = accessRequestId;
    entity.action = draft.action;
    entity.description = draft.description;
    entity.occurredAt = draft.occurredAt;
    return entity;
  }
}
