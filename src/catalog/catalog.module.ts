import { Module } from '@nestjs/common';
import { RelationalCatalogPersistenceModule } from './infrastructure/persistence/relational/relational-persistence.module';
import { CatalogDomainService } from './domain/services/catalog.domain.service';
import { CatalogController } from './catalog.controller';

@Module({
  imports: [RelationalCatalogPersistenceModule],
  providers: [CatalogDomainService],
  controllers: [CatalogController],
  exports: [CatalogDomainService],
})
export class CatalogModule {}
