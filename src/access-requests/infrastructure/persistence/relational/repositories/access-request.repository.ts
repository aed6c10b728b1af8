import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { DataSource, EntityManager, Repository } from 'typeorm';
import { QueryDeepPartialEntity } from 'typeorm/query-builder/QueryPartialEntity';
import {
  AccessRequestFilters,
  AccessRequestRepositoryPort,
  AccessRequestStatusChange,
  RequesterWriteScope,
} from '../../../../domain/repositories/access-request.repository.port';
import {
  AccessRequest,
  NewAccessRequest,
} from '../../../../domain/entities/access-request.entity';
import { AccessHistoryDraft } from '../../../../domain/entities/access-history-entry.entity';
import { AccessRequestStatus } from '../../../../domain/enums/access-request-status.enum';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { IPaginationOptions } from '../../../../../utils/types/pagination-options';
import { AccessRequestEntity } from '../entities/access-request.entity';
import { AccessHistoryEntryEntity } from '../entities/access-history-entry.entity';
import { AccessRequestMapper } from '../mappers/access-request.mapper';
import { AccessHistoryEntryMapper } from '../mappers/access-history-entry.mapper';
import { ProtocolSequenceRelationalCounter } from './protocol-sequence.counter';

@Injectable()
export class AccessRequestRelationalRepository extends AccessRequestRepositoryPort {
  constructor(
    @InjectRepository(AccessRequestEntity)
    private readonly repository: Repository<AccessRequestEntity>,
    private readonly dataSource: DataSource,
  ) {
    super();
  }

  /**
   * One transaction holding a transaction-scoped advisory lock on the
   * requester. Other instances block on the same lock until this one commits
   * or rolls back; they then read the footprint it left behind.
   */
  async runExclusiveForRequester<T>(
    requesterId: string,
    work: (scope: RequesterWriteScope) => Promise<T>,
  ): Promise<T> {
    return this.dataSource.transaction(async (manager) => {
      await manager.query('SELECT pg_advisory_xact_lock(hashtext($1))', [
        requesterId,
      ]);

      return work({
        findActive: () => this.findActiveByRequester(manager, requesterId),
        findActiveRenewalsOf: (requestId) =>
          this.findActiveRenewalsOf(manager, requestId),
        protocolCounter: new ProtocolSequenceRelationalCounter(manager),
        create: (request, history) => this.insert(manager, request, history),
      });
    });
  }

  async findById(id: number): Promise<NullableType<AccessRequest>> {
    const entity = await this.repository.findOne({ where: { id } });
    return entity ? AccessRequestMapper.toDomain(entity) : null;
  }

  async findByProtocol(
    protocol: string,
  ): Promise<NullableType<AccessRequest>> {
    const entity = await this.repository.findOne({ where: { protocol } });
    return entity ? AccessRequestMapper.toDomain(entity) : null;
  }

  async findByRequester(
    requesterId: string,
    filters: AccessRequestFilters,
    pagination: IPaginationOptions,
  ): Promise<AccessRequest[]> {
    const query = this.repository
      .createQueryBuilder('request')
      .where('request.requesterId = :requesterId', { requesterId });

    if (filters.status) {
      query.andWhere('request.status = :status', { status: filters.status });
    }
    if (filters.moduleId !== undefined) {
      query.andWhere(':moduleId = ANY(request.module_ids)', {
        moduleId: filters.moduleId,
      });
    }
    if (filters.urgent !== undefined) {
      query.andWhere('request.urgent = :urgent', { urgent: filters.urgent });
    }

    const entities = await query
      .orderBy('request.requestedAt', 'DESC')
      .addOrderBy('request.id', 'DESC')
      .skip((pagination.page - 1) * pagination.limit)
      .take(pagination.limit + 1)
      .getMany();

    return entities.map((entity) => AccessRequestMapper.toDomain(entity));
  }

  async transitionStatus(
    id: number,
    expectedStatus: AccessRequestStatus,
    changes: AccessRequestStatusChange,
    history: AccessHistoryDraft[],
  ): Promise<NullableType<AccessRequest>> {
    return this.dataSource.transaction(async (manager) => {
      const values: QueryDeepPartialEntity<AccessRequestEntity> = {};
      if (changes.status !== undefined) {
        values.status = changes.status;
      }
      if (changes.cancelledAt !== undefined) {
        values.cancelledAt = changes.cancelledAt;
      }
      if (changes.cancellationReason !== undefined) {
        values.cancellationReason = changes.cancellationReason;
      }

      // UPDATE ... WHERE id = :id AND status = :expectedStatus
      const result = await manager.update(
        AccessRequestEntity,
        { id, status: expectedStatus },
        values,
      );
      if (!result.affected) {
        return null;
      }

      await manager.save(
        AccessHistoryEntryEntity,
        history.map((draft) =>
          AccessHistoryEntryMapper.toPersistence(
            draft,
            draft.accessRequestId ?? id,
          ),
        ),
      );

      const updated = await manager.findOneOrFail(AccessRequestEntity, {
        where: { id },
      });
      return AccessRequestMapper.toDomain(updated);
    });
  }

  private async insert(
    manager: EntityManager,
    request: NewAccessRequest,
    history: AccessHistoryDraft[],
  ): Promise<AccessRequest> {
    const saved = await manager.save(
      AccessRequestEntity,
      AccessRequestMapper.toPersistence(request),
    );

    // Drafts without a request ID belong to the row just inserted
    await manager.save(
      AccessHistoryEntryEntity,
      history.map((draft) =>
        AccessHistoryEntryMapper.toPersistence(
          draft,
          draft.accessRequestId ?? saved.id,
        ),
      ),
    );

    return AccessRequestMapper.toDomain(saved);
  }

  private async findActiveByRequester(
    manager: EntityManager,
    requesterId: string,
  ): Promise<AccessRequest[]> {
    const entities = await manager.find(AccessRequestEntity, {
      where: { requesterId, status: AccessRequestStatus.ACTIVE },
      order: { requestedAt: 'ASC', id: 'ASC' },
    });
    return entities.map((entity) => AccessRequestMapper.toDomain(entity));
  }

  private async findActiveRenewalsOf(
    manager: EntityManager,
    requestId: number,
  ): Promise<AccessRequest[]> {
    const entities = await manager.find(AccessRequestEntity, {
      where: { renewedFromId: requestId, status: AccessRequestStatus.ACTIVE },
      order: { id: 'ASC' },
    });
    return entities.map((entity) => AccessRequestMapper.toDomain(entity));
  }
}
