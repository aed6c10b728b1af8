import { DepartmentCode } from '../../../catalog/domain/enums/department-code.enum';

/**
 * Already-authenticated employee on whose behalf the engine acts.
 *
 * Identity is resolved upstream; the engine trusts `id` and `department`.
 */
export interface Requester {
  id: string;
  department: DepartmentCode;
}
