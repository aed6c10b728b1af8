import { Module } from '@nestjs/common';
import { AuditModule } from '../audit/audit.module';
import { CatalogModule } from '../catalog/catalog.module';
import { RelationalAccessRequestPersistenceModule } from './infrastructure/persistence/relational/relational-persistence.module';
import { AccessRequestLifecycleDomainService } from './domain/services/access-request-lifecycle.domain.service';
import { AccessHistoryDomainService } from './domain/services/access-history.domain.service';
import { ProtocolSequencerDomainService } from './domain/services/protocol-sequencer.domain.service';
import { RuleEngineDomainService } from './domain/services/rule-engine.domain.service';
import { AccessRequestsService } from './access-requests.service';
import { AccessRequestsController } from './access-requests.controller';

@Module({
  imports: [RelationalAccessRequestPersistenceModule, CatalogModule, AuditModule],
  providers: [
    RuleEngineDomainService,
    ProtocolSequencerDomainService,
    AccessHistoryDomainService,
    AccessRequestLifecycleDomainService,
    AccessRequestsService,
  ],
  controllers: [AccessRequestsController],
  exports: [AccessRequestLifecycleDomainService],
})
export class AccessRequestsModule {}
