export enum DepartmentCode {
  IT = 'IT',
  FINANCE = 'FINANCE',
  HR = 'HR',
  OPERATIONS = 'OPERATIONS',
  OTHER = 'OTHER',
}

/**
 * The IT department may request every module regardless of the module's
 * allowed-department set.
 */
export const UNRESTRICTED_DEPARTMENT = DepartmentCode.IT;

export function isDepartmentCode(value: unknown): value is DepartmentCode {
  return (
    typeof value === 'string' &&
    Object.values(DepartmentCode).some((candidate) => candidate === value)
  );
}
