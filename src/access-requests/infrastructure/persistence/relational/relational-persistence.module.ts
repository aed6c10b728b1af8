import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AccessRequestRepositoryPort } from '../../../domain/repositories/access-request.repository.port';
import { AccessHistoryRepositoryPort } from '../../../domain/repositories/access-history.repository.port';
import { AccessRequestEntity } from './entities/access-request.entity';
import { AccessHistoryEntryEntity } from './entities/access-history-entry.entity';
import { ProtocolSequenceEntity } from './entities/protocol-sequence.entity';
import { AccessRequestRelationalRepository } from './repositories/access-request.repository';
import { AccessHistoryRelationalRepository } from './repositories/access-history.repository';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      AccessRequestEntity,
      AccessHistoryEntryEntity,
      ProtocolSequenceEntity,
    ]),
  ],
  providers: [
    {
      provide: AccessRequestRepositoryPort,
      useClass: AccessRequestRelationalRepository,
    },
    {
      provide: AccessHistoryRepositoryPort,
      useClass: AccessHistoryRelationalRepository,
    },
  ],
  exports: [
    AccessRequestRepositoryPort,
    AccessHistoryRepositoryPort,
  ],
})
export class RelationalAccessRequestPersistenceModule {}
