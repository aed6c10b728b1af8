/**
 * Rules of the decision pipeline, in evaluation order.
 */
export enum AccessRule {
  DUPLICATE_REQUEST = 'DUPLICATE_REQUEST',
  EXISTING_ACCESS = 'EXISTING_ACCESS',
  JUSTIFICATION_QUALITY = 'JUSTIFICATION_QUALITY',
  MODULE_INACTIVE = 'MODULE_INACTIVE',
  DEPARTMENT_INCOMPATIBLE = 'DEPARTMENT_INCOMPATIBLE',
  MUTUALLY_EXCLUSIVE = 'MUTUALLY_EXCLUSIVE',
  QUOTA_EXCEEDED = 'QUOTA_EXCEEDED',
}
