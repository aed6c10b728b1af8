import { DepartmentCode } from '../enums/department-code.enum';

/**
 * Reference data: a department and how many modules its members may hold
 * active at the same time.
 */
export interface Department {
  code: DepartmentCode;
  name: string;
  moduleQuota: number;
}
