import { CatalogSnapshot } from './catalog-snapshot';
import { SoftwareModule } from './entities/software-module.entity';
import { DepartmentCode } from './enums/department-code.enum';
import {
  DepartmentNotFoundException,
  ModuleNotFoundException,
} from './errors/catalog.errors';

describe('CatalogSnapshot', () => {
  const approver: SoftwareModule = {
    id: 2,
    name: 'Financial Approver',
    active: true,
    allowedDepartments: [DepartmentCode.FINANCE],
  };
  const requesterModule: SoftwareModule = {
    id: 3,
    name: 'Financial Requester',
    active: true,
    allowedDepartments: [DepartmentCode.FINANCE, DepartmentCode.OPERATIONS],
  };
  const legacy: SoftwareModule = {
    id: 9,
    name: 'Legacy Time Tracking',
    active: false,
    allowedDepartments: [DepartmentCode.HR],
  };

  let snapshot: CatalogSnapshot;

  beforeEach(() => {
    snapshot = new CatalogSnapshot(
      [approver, requesterModule, legacy],
      // Stored in the "reverse" direction on purpose
      [{ moduleAId: 3, moduleBId: 2 }],
      [{ code: DepartmentCode.FINANCE, name: 'Finance', moduleQuota: 5 }],
    );
  });

  describe('resolveModules', () => {
    it('should return modules in the requested order', () => {
      expect(snapshot.resolveModules([3, 2]).map((m) => m.name)).toEqual([
        'Financial Requester',
        'Financial Approver',
      ]);
    });

    it('should list every unknown id', () => {
      expect(() => snapshot.resolveModules([2, 40, 41])).toThrow(
        expect.objectContaining({ moduleIds: [40, 41] }),
      );
      expect(() => snapshot.resolveModules([40])).toThrow(
        ModuleNotFoundException,
      );
    });
  });

  describe('areIncompatible', () => {
    it('should be symmetric regardless of stored direction', () => {
      expect(snapshot.areIncompatible(2, 3)).toBe(true);
      expect(snapshot.areIncompatible(3, 2)).toBe(true);
    });

    it('should never report a module as incompatible with itself', () => {
      expect(snapshot.areIncompatible(2, 2)).toBe(false);
    });
  });

  describe('incompatiblePairs', () => {
    it('should report each conflicting pair once', () => {
      const pairs = snapshot.incompatiblePairs([approver, requesterModule, legacy]);

      expect(pairs).toHaveLength(1);
      expect(pairs[0].map((m) => m.id)).toEqual([2, 3]);
    });
  });

  it('should report activity from the snapshot', () => {
    expect(snapshot.isActive(approver)).toBe(true);
    expect(snapshot.isActive(legacy)).toBe(false);
  });

  it('should return the department quota', () => {
    expect(snapshot.quotaFor(DepartmentCode.FINANCE)).toBe(5);
    expect(() => snapshot.quotaFor(DepartmentCode.HR)).toThrow(
      DepartmentNotFoundException,
    );
  });

  it('should fall back to #id for modules outside the snapshot', () => {
    expect(snapshot.moduleName(2)).toBe('Financial Approver');
    expect(snapshot.moduleName(77)).toBe('#77');
  });
});
