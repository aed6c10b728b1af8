import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { In, Repository } from 'typeorm';
import { CatalogRepositoryPort } from '../../../../domain/repositories/catalog.repository.port';
import { Department } from '../../../../domain/entities/department.entity';
import { ModuleIncompatibility } from '../../../../domain/entities/module-incompatibility.entity';
import { SoftwareModule } from '../../../../domain/entities/software-module.entity';
import { DepartmentCode } from '../../../../domain/enums/department-code.enum';
import { NullableType } from '../../../../../utils/types/nullable.type';
import { DepartmentEntity } from '../entities/department.entity';
import { ModuleIncompatibilityEntity } from '../entities/module-incompatibility.entity';
import { SoftwareModuleEntity } from '../entities/software-module.entity';

@Injectable()
export class CatalogRelationalRepository extends CatalogRepositoryPort {
  constructor(
    @InjectRepository(SoftwareModuleEntity)
    private readonly moduleRepository: Repository<SoftwareModuleEntity>,
    @InjectRepository(ModuleIncompatibilityEntity)
    private readonly incompatibilityRepository: Repository<ModuleIncompatibilityEntity>,
    @InjectRepository(DepartmentEntity)
    private readonly departmentRepository: Repository<DepartmentEntity>,
  ) {
    super();
  }

  async findModulesByIds(ids: number[]): Promise<SoftwareModule[]> {
    if (ids.length === 0) {
      return [];
    }
    const entities = await this.moduleRepository.find({
      where: { id: In(ids) },
    });
    return entities.map((entity) => this.toModuleDomain(entity));
  }

  async findAllModules(): Promise<SoftwareModule[]> {
    const entities = await this.moduleRepository.find({
      order: { name: 'ASC' },
    });
    return entities.map((entity) => this.toModuleDomain(entity));
  }

  async findIncompatibilitiesFor(
    moduleIds: number[],
  ): Promise<ModuleIncompatibility[]> {
    if (moduleIds.length === 0) {
      return [];
    }
    // Either side may match: the relation is symmetric
    const entities = await this.incompatibilityRepository.find({
      where: [{ moduleAId: In(moduleIds) }, { moduleBId: In(moduleIds) }],
    });
    return entities.map((entity) => ({
      moduleAId: entity.moduleAId,
      moduleBId: entity.moduleBId,
      reason: entity.reason ?? undefined,
    }));
  }

  async findDepartment(
    code: DepartmentCode,
  ): Promise<NullableType<Department>> {
    const entity = await this.departmentRepository.findOne({
      where: { code },
    });
    return entity ? this.toDepartmentDomain(entity) : null;
  }

  async findAllDepartments(): Promise<Department[]> {
    const entities = await this.departmentRepository.find({
      order: { code: 'ASC' },
    });
    return entities.map((entity) => this.toDepartmentDomain(entity));
  }

  private toModuleDomain(entity: SoftwareModuleEntity): SoftwareModule {
    return {
      id: entity.id,
      name: entity.name,
      description: entity.description ?? undefined,
      active: entity.active,
      allowedDepartments: entity.allowedDepartments ?? [],
    };
  }

  private toDepartmentDomain(entity: DepartmentEntity): Department {
    return {
      code: entity.code,
      name: entity.name,
      moduleQuota: entity.moduleQuota,
    };
  }
}
