import { Injectable } from '@nestjs/common';
import { CatalogRepositoryPort } from '../repositories/catalog.repository.port';
import { CatalogSnapshot } from '../catalog-snapshot';
import { Department } from '../entities/department.entity';
import { SoftwareModule } from '../entities/software-module.entity';
import { DepartmentCode } from '../enums/department-code.enum';
import { DepartmentNotFoundException } from '../errors/catalog.errors';

/**
 * Catalog Domain Service
 *
 * Loads the module/department data one decision needs into a
 * `CatalogSnapshot`. All lookups for a decision go through the same snapshot, so a
 * module cannot change activity halfway through an evaluation.
 */
@Injectable()
export class CatalogDomainService {
  constructor(private readonly catalogRepository: CatalogRepositoryPort) {}

  /**
   * @param moduleIds - requested modules plus any modules already held, so
   * incompatibility messages can name either side
   * @param department - requester's department; must exist
   */
  async loadSnapshot(
    moduleIds: number[],
    department: DepartmentCode,
  ): Promise<CatalogSnapshot> {
    const ids = [...new Set(moduleIds)];

    const [modules, incompatibilities, found] = await Promise.all([
      this.catalogRepository.findModulesByIds(ids),
      this.catalogRepository.findIncompatibilitiesFor(ids),
      this.catalogRepository.findDepartment(department),
    ]);

    if (!found) {
      throw new DepartmentNotFoundException(department);
    }

    return new CatalogSnapshot(modules, incompatibilities, [found]);
  }

  async listModules(): Promise<SoftwareModule[]> {
    return this.catalogRepository.findAllModules();
  }

  async listDepartments(): Promise<Department[]> {
    return this.catalogRepository.findAllDepartments();
  }
}
