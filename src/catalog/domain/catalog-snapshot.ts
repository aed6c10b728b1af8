import { Department } from './entities/department.entity';
import { ModuleIncompatibility } from './entities/module-incompatibility.entity';
import { SoftwareModule } from './entities/software-module.entity';
import { DepartmentCode } from './enums/department-code.enum';
import {
  DepartmentNotFoundException,
  ModuleNotFoundException,
} from './errors/catalog.errors';

function pairKey(a: number, b: number): string {
  return a < b ? `${a}:${b}` : `${b}:${a}`;
}

/**
 * Immutable view of the catalog taken once per decision.
 *
 * Incompatibilities are kept as unordered pair keys, so `areIncompatible(a, b)`
 * and `areIncompatible(b, a)` always agree no matter which direction was stored.
 */
export class CatalogSnapshot {
  private readonly modulesById: ReadonlyMap<number, SoftwareModule>;
  private readonly incompatibleKeys: ReadonlySet<string>;
  private readonly departments: ReadonlyMap<DepartmentCode, Department>;

  constructor(
    modules: SoftwareModule[],
    incompatibilities: ModuleIncompatibility[],
    departments: Department[],
  ) {
    this.modulesById = new Map(
      modules.map((module) => [module.id, Object.freeze({ ...module })]),
    );
    this.incompatibleKeys = new Set(
      incompatibilities.map((pair) => pairKey(pair.moduleAId, pair.moduleBId)),
    );
    this.departments = new Map(
      departments.map((department) => [department.code, department]),
    );
  }

  /**
   * Resolve IDs in the given order.
   *
   * @throws ModuleNotFoundException listing every unknown ID
   */
  resolveModules(ids: number[]): SoftwareModule[] {
    const missing = ids.filter((id) => !this.modulesById.has(id));
    if (missing.length > 0) {
      throw new ModuleNotFoundException(missing);
    }
    return ids.flatMap((id) => {
      const module = this.modulesById.get(id);
      return module ? [module] : [];
    });
  }

  isActive(module: SoftwareModule): boolean {
    return this.modulesById.get(module.id)?.active ?? false;
  }

  quotaFor(department: DepartmentCode): number {
    const found = this.departments.get(department);
    if (!found) {
      throw new DepartmentNotFoundException(department);
    }
    return found.moduleQuota;
  }

  areIncompatible(a: number, b: number): boolean {
    return a !== b && this.incompatibleKeys.has(pairKey(a, b));
  }

  /**
   * Every incompatible pair among `modules`, each pair reported once in input order.
   */
  incompatiblePairs(
    modules: SoftwareModule[],
  ): Array<[SoftwareModule, SoftwareModule]> {
    const pairs: Array<[SoftwareModule, SoftwareModule]> = [];
    modules.forEach((first, index) => {
      modules.slice(index + 1).forEach((second) => {
        if (this.areIncompatible(first.id, second.id)) {
          pairs.push([first, second]);
        }
      });
    });
    return pairs;
  }

  /**
   * Display name for messages; modules outside the snapshot render as `#id`.
   */
  moduleName(id: number): string {
    return this.modulesById.get(id)?.name ?? `#${id}`;
  }
}
