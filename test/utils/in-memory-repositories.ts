import { CatalogRepositoryPort } from '../../src/catalog/domain/repositories/catalog.repository.port';
import { Department } from '../../src/catalog/domain/entities/department.entity';
import { ModuleIncompatibility } from '../../src/catalog/domain/entities/module-incompatibility.entity';
import { SoftwareModule } from '../../src/catalog/domain/entities/software-module.entity';
import { DepartmentCode } from '../../src/catalog/domain/enums/department-code.enum';
import {
  AccessRequestFilters,
  AccessRequestRepositoryPort,
  AccessRequestStatusChange,
  RequesterWriteScope,
} from '../../src/access-requests/domain/repositories/access-request.repository.port';
import { AccessHistoryRepositoryPort } from '../../src/access-requests/domain/repositories/access-history.repository.port';
import { ProtocolCounter } from '../../src/access-requests/domain/repositories/protocol-counter.port';
import {
  AccessRequest,
  NewAccessRequest,
} from '../../src/access-requests/domain/entities/access-request.entity';
import {
  AccessHistoryDraft,
  AccessHistoryEntry,
} from '../../src/access-requests/domain/entities/access-history-entry.entity';
import { AccessRequestStatus } from '../../src/access-requests/domain/enums/access-request-status.enum';
import { KeyedLock } from '../../src/utils/keyed-lock';
import { NullableType } from '../../src/utils/types/nullable.type';
import { IPaginationOptions } from '../../src/utils/types/pagination-options';
import {
  FIXTURE_DEPARTMENTS,
  FIXTURE_INCOMPATIBILITIES,
  FIXTURE_MODULES,
} from './catalog.fixture';

/**
 * Yield to the event loop the way a database round trip would, so that
 * concurrent callers interleave.
 */
const roundTrip = (): Promise<void> =>
  new Promise((resolve) => setImmediate(resolve));

const copyRequest = (request: AccessRequest): AccessRequest => ({
  ...request,
  moduleIds: [...request.moduleIds],
});

export class InMemoryCatalogRepository extends CatalogRepositoryPort {
  constructor(
    readonly modules: SoftwareModule[] = FIXTURE_MODULES,
    readonly incompatibilities: ModuleIncompatibility[] = FIXTURE_INCOMPATIBILITIES,
    readonly departments: Department[] = FIXTURE_DEPARTMENTS,
  ) {
    super();
  }

  async findModulesByIds(ids: number[]): Promise<SoftwareModule[]> {
    await roundTrip();
    return this.modules.filter((module) => ids.includes(module.id));
  }

  async findAllModules(): Promise<SoftwareModule[]> {
    await roundTrip();
    return [...this.modules].sort((a, b) => a.name.localeCompare(b.name));
  }

  async findIncompatibilitiesFor(
    moduleIds: number[],
  ): Promise<ModuleIncompatibility[]> {
    await roundTrip();
    return this.incompatibilities.filter(
      (pair) =>
        moduleIds.includes(pair.moduleAId) ||
        moduleIds.includes(pair.moduleBId),
    );
  }

  async findDepartment(
    code: DepartmentCode,
  ): Promise<NullableType<Department>> {
    await roundTrip();
    return this.departments.find((department) => department.code === code) ?? null;
  }

  async findAllDepartments(): Promise<Department[]> {
    await roundTrip();
    return [...this.departments].sort((a, b) => a.code.localeCompare(b.code));
  }
}

export class InMemoryAccessHistoryRepository extends AccessHistoryRepositoryPort {
  readonly entries: AccessHistoryEntry[] = [];
  private nextId = 1;

  async append(
    entry: AccessHistoryDraft & { accessRequestId: number },
  ): Promise<AccessHistoryEntry> {
    await roundTrip();
    return this.store(entry, entry.accessRequestId);
  }

  async findByAccessRequestId(
    accessRequestId: number,
  ): Promise<AccessHistoryEntry[]> {
    await roundTrip();
    return this.entries
      .filter((entry) => entry.accessRequestId === accessRequestId)
      .sort(
        (a, b) =>
          a.occurredAt.getTime() - b.occurredAt.getTime() || a.id - b.id,
      )
      .map((entry) => ({ ...entry }));
  }

  /**
   * Synchronous write used by the request repository inside its "transaction"
   */
  store(draft: AccessHistoryDraft, accessRequestId: number): AccessHistoryEntry {
    const entry: AccessHistoryEntry = {
      id: this.nextId++,
      accessRequestId,
      action: draft.action,
      description: draft.description,
      occurredAt: draft.occurredAt,
    };
    this.entries.push(entry);
    return { ...entry };
  }

  remove(ids: number[]): void {
    const removed = new Set(ids);
    const kept = this.entries.filter((entry) => !removed.has(entry.id));
    this.entries.splice(0, this.entries.length, ...kept);
  }
}

/**
 * Requester scopes mirror the relational adapter: one lock per requester,
 * protocol days locked from first increment until the scope ends, and
 * everything written through a failed scope undone.
 */
export class InMemoryAccessRequestRepository extends AccessRequestRepositoryPort {
  readonly requests: AccessRequest[] = [];
  private nextId = 1;
  private readonly requesterLocks = new KeyedLock();
  private readonly dayLocks = new KeyedLock();

  constructor(
    private readonly history: InMemoryAccessHistoryRepository,
    readonly sequences: InMemoryProtocolCounter = new InMemoryProtocolCounter(),
  ) {
    super();
  }

  async runExclusiveForRequester<T>(
    requesterId: string,
    work: (scope: RequesterWriteScope) => Promise<T>,
  ): Promise<T> {
    return this.requesterLocks.runExclusive(requesterId, async () => {
      const releases: Array<() => void> = [];
      const countersBefore = new Map<string, number>();
      const createdRequestIds: number[] = [];
      const storedEntryIds: number[] = [];

      const scope: RequesterWriteScope = {
        findActive: async () => {
          await roundTrip();
          return this.requests
            .filter(
              (request) =>
                request.requesterId === requesterId &&
                request.status === AccessRequestStatus.ACTIVE,
            )
            .map(copyRequest);
        },
        findActiveRenewalsOf: async (requestId) => {
          await roundTrip();
          return this.requests
            .filter(
              (request) =>
                request.renewedFrom === requestId &&
                request.status === AccessRequestStatus.ACTIVE,
            )
            .map(copyRequest);
        },
        protocolCounter: {
          increment: async (day) => {
            if (!countersBefore.has(day)) {
              releases.push(await this.dayLocks.acquire(day));
              countersBefore.set(day, this.sequences.get(day));
            }
            return this.sequences.increment(day);
          },
        },
        create: async (request, history) => {
          await roundTrip();
          const saved = this.insert(request);
          createdRequestIds.push(saved.id);
          history.forEach((draft) =>
            storedEntryIds.push(
              this.history.store(draft, draft.accessRequestId ?? saved.id).id,
            ),
          );
          return saved;
        },
      };

      try {
        return await work(scope);
      } catch (error) {
        countersBefore.forEach((value, day) => this.sequences.set(day, value));
        this.remove(createdRequestIds);
        this.history.remove(storedEntryIds);
        throw error;
      } finally {
        releases.forEach((release) => release());
      }
    });
  }

  async findById(id: number): Promise<NullableType<AccessRequest>> {
    await roundTrip();
    const found = this.requests.find((request) => request.id === id);
    return found ? copyRequest(found) : null;
  }

  async findByProtocol(
    protocol: string,
  ): Promise<NullableType<AccessRequest>> {
    await roundTrip();
    const found = this.requests.find(
      (request) => request.protocol === protocol,
    );
    return found ? copyRequest(found) : null;
  }

  async findByRequester(
    requesterId: string,
    filters: AccessRequestFilters,
    pagination: IPaginationOptions,
  ): Promise<AccessRequest[]> {
    await roundTrip();
    const offset = (pagination.page - 1) * pagination.limit;
    return this.requests
      .filter((request) => request.requesterId === requesterId)
      .filter((request) => !filters.status || request.status === filters.status)
      .filter(
        (request) =>
          filters.moduleId === undefined ||
          request.moduleIds.includes(filters.moduleId),
      )
      .filter(
        (request) =>
          filters.urgent === undefined || request.urgent === filters.urgent,
      )
      .sort(
        (a, b) =>
          b.requestedAt.getTime() - a.requestedAt.getTime() || b.id - a.id,
      )
      .slice(offset, offset + pagination.limit + 1)
      .map(copyRequest);
  }

  async transitionStatus(
    id: number,
    expectedStatus: AccessRequestStatus,
    changes: AccessRequestStatusChange,
    history: AccessHistoryDraft[],
  ): Promise<NullableType<AccessRequest>> {
    await roundTrip();
    const index = this.requests.findIndex((request) => request.id === id);
    if (index === -1 || this.requests[index].status !== expectedStatus) {
      return null;
    }
    const updated = { ...this.requests[index], ...changes };
    this.requests[index] = updated;
    history.forEach((draft) =>
      this.history.store(draft, draft.accessRequestId ?? id),
    );
    return copyRequest(updated);
  }

  /**
   * Seed a request directly, bypassing the rule engine
   */
  insert(request: NewAccessRequest): AccessRequest {
    const saved: AccessRequest = {
      ...request,
      id: this.nextId++,
      moduleIds: [...request.moduleIds],
    };
    this.requests.push(saved);
    return copyRequest(saved);
  }

  private remove(ids: number[]): void {
    const removed = new Set(ids);
    const kept = this.requests.filter((request) => !removed.has(request.id));
    this.requests.splice(0, this.requests.length, ...kept);
  }
}

export class InMemoryProtocolCounter implements ProtocolCounter {
  private readonly counters = new Map<string, number>();

  async increment(day: string): Promise<number> {
    await roundTrip();
    // Read and write without yielding in between
    const next = this.get(day) + 1;
    this.counters.set(day, next);
    return next;
  }

  get(day: string): number {
    return this.counters.get(day) ?? 0;
  }

  set(day: string, value: number): void {
    this.counters.set(day, value);
  }
}
