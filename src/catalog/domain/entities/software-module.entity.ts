import { DepartmentCode } from '../enums/department-code.enum';

/**
 * Domain entity for a requestable software module.
 *
 * Inactive modules stay in the catalog (existing requests reference them) but
 * cannot be requested.
 */
export interface SoftwareModule {
  id: number;
  name: string;
  description?: string;
  active: boolean;
  allowedDepartments: DepartmentCode[];
}
