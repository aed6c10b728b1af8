import { Department } from '../../src/catalog/domain/entities/department.entity';
import { ModuleIncompatibility } from '../../src/catalog/domain/entities/module-incompatibility.entity';
import { SoftwareModule } from '../../src/catalog/domain/entities/software-module.entity';
import { DepartmentCode } from '../../src/catalog/domain/enums/department-code.enum';

export enum ModuleId {
  FINANCIAL_MANAGEMENT = 1,
  FINANCIAL_APPROVER = 2,
  FINANCIAL_REQUESTER = 3,
  INVENTORY_CONTROL = 4,
  PURCHASING = 5,
  PAYROLL = 6,
  RECRUITMENT = 7,
  REPORTS_PORTAL = 8,
  LEGACY_TIME_TRACKING = 9,
}

export const FIXTURE_DEPARTMENTS: Department[] = [
  { code: DepartmentCode.IT, name: 'Information Technology', moduleQuota: 10 },
  { code: DepartmentCode.FINANCE, name: 'Finance', moduleQuota: 5 },
  { code: DepartmentCode.HR, name: 'Human Resources', moduleQuota: 5 },
  { code: DepartmentCode.OPERATIONS, name: 'Operations', moduleQuota: 5 },
  { code: DepartmentCode.OTHER, name: 'Other', moduleQuota: 5 },
];

export const FIXTURE_MODULES: SoftwareModule[] = [
  {
    id: ModuleId.FINANCIAL_MANAGEMENT,
    name: 'Financial Management',
    active: true,
    allowedDepartments: [DepartmentCode.FINANCE],
  },
  {
    id: ModuleId.FINANCIAL_APPROVER,
    name: 'Financial Approver',
    active: true,
    allowedDepartments: [DepartmentCode.FINANCE],
  },
  {
    id: ModuleId.FINANCIAL_REQUESTER,
    name: 'Financial Requester',
    active: true,
    allowedDepartments: [DepartmentCode.FINANCE, DepartmentCode.OPERATIONS],
  },
  {
    id: ModuleId.INVENTORY_CONTROL,
    name: 'Inventory Control',
    active: true,
    allowedDepartments: [DepartmentCode.OPERATIONS],
  },
  {
    id: ModuleId.PURCHASING,
    name: 'Purchasing',
    active: true,
    allowedDepartments: [DepartmentCode.OPERATIONS, DepartmentCode.FINANCE],
  },
  {
    id: ModuleId.PAYROLL,
    name: 'Payroll',
    active: true,
    allowedDepartments: [DepartmentCode.HR, DepartmentCode.FINANCE],
  },
  {
    id: ModuleId.RECRUITMENT,
    name: 'Recruitment',
    active: true,
    allowedDepartments: [DepartmentCode.HR],
  },
  {
    id: ModuleId.REPORTS_PORTAL,
    name: 'Reports Portal',
    active: true,
    allowedDepartments: [
      DepartmentCode.FINANCE,
      DepartmentCode.HR,
      DepartmentCode.OPERATIONS,
      DepartmentCode.OTHER,
    ],
  },
  {
    id: ModuleId.LEGACY_TIME_TRACKING,
    name: 'Legacy Time Tracking',
    active: false,
    allowedDepartments: [DepartmentCode.HR, DepartmentCode.OPERATIONS],
  },
];

// First pair stored in reverse order to exercise symmetric lookups
export const FIXTURE_INCOMPATIBILITIES: ModuleIncompatibility[] = [
  {
    moduleAId: ModuleId.FINANCIAL_REQUESTER,
    moduleBId: ModuleId.FINANCIAL_APPROVER,
  },
  { moduleAId: ModuleId.FINANCIAL_APPROVER, moduleBId: ModuleId.PURCHASING },
];
