import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CatalogRepositoryPort } from '../../../domain/repositories/catalog.repository.port';
import { CatalogRelationalRepository } from './repositories/catalog.repository';
import { DepartmentEntity } from './entities/department.entity';
import { ModuleIncompatibilityEntity } from './entities/module-incompatibility.entity';
import { SoftwareModuleEntity } from './entities/software-module.entity';

@Module({
  imports: [
    TypeOrmModule.forFeature([
      SoftwareModuleEntity,
      ModuleIncompatibilityEntity,
      DepartmentEntity,
    ]),
  ],
  providers: [
    {
      provide: CatalogRepositoryPort,
      useClass: CatalogRelationalRepository,
    },
  ],
  exports: [CatalogRepositoryPort],
})
export class RelationalCatalogPersistenceModule {}
