import { NullableType } from '../../../utils/types/nullable.type';
import { Department } from '../entities/department.entity';
import { ModuleIncompatibility } from '../entities/module-incompatibility.entity';
import { SoftwareModule } from '../entities/software-module.entity';
import { DepartmentCode } from '../enums/department-code.enum';

/**
 * Repository Port for the module catalog (Hexagonal Architecture)
 *
 * Read-only from the access-request engine's point of view. Catalog
 * maintenance happens elsewhere.
 */
export abstract class CatalogRepositoryPort {
  /**
   * Find modules by ID. Unknown IDs are simply absent from the result.
   */
  abstract findModulesByIds(ids: number[]): Promise<SoftwareModule[]>;

  /**
   * All modules ordered by name
   */
  abstract findAllModules(): Promise<SoftwareModule[]>;

  /**
   * Every incompatibility pair that has at least one side in `moduleIds`
   */
  abstract findIncompatibilitiesFor(
    moduleIds: number[],
  ): Promise<ModuleIncompatibility[]>;

  abstract findDepartment(
    code: DepartmentCode,
  ): Promise<NullableType<Department>>;

  abstract findAllDepartments(): Promise<Department[]>;
}
