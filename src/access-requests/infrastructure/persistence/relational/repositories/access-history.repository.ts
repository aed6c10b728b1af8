import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { AccessHistoryRepositoryPort } from '../../../../domain/repositories/access-history.repository.port';
import {
  AccessHistoryDraft,
  AccessHistoryEntry,
} from '../../../../domain/entities/access-history-entry.entity';
import { AccessHistoryEntryEntity } from '../entities/access-history-entry.entity';
import { AccessHistoryEntryMapper } from '../mappers/access-history-entry.mapper';

@Injectable()
export class AccessHistoryRelationalRepository extends AccessHistoryRepositoryPort {
  constructor(
    @InjectRepository(AccessHistoryEntryEntity)
    private readonly repository: Repository<AccessHistoryEntryEntity>,
  ) {
    super();
  }

  async append(
    entry: AccessHistoryDraft & { accessRequestId: number },
  ): Promise<AccessHistoryEntry> {
    const saved = await this.repository.save(
      AccessHistoryEntryMapper.toPersistence(entry, entry.accessRequestId),
    );
    return AccessHistoryEntryMapper.toDomain(saved);
  }

  async findByAccessRequestId(
    accessRequestId: number,
  ): Promise<AccessHistoryEntry[]> {
    const entities = await this.repository.find({
      where: { accessRequestId },
      order: { occurredAt: 'ASC', id: 'ASC' },
    });
    return entities.map((entity) => AccessHistoryEntryMapper.toDomain(entity));
  }
}
