import { NullableType } from '../../../utils/types/nullable.type';
import { IPaginationOptions } from '../../../utils/types/pagination-options';
import {
  AccessRequest,
  NewAccessRequest,
} from '../entities/access-request.entity';
import { AccessHistoryDraft } from '../entities/access-history-entry.entity';
import { AccessRequestStatus } from '../enums/access-request-status.enum';
import { ProtocolCounter } from './protocol-counter.port';

export interface AccessRequestFilters {
  status?: AccessRequestStatus;
  moduleId?: number;
  urgent?: boolean;
}

export type AccessRequestStatusChange = Partial<
  Pick<
    AccessRequest,
    'status' | 'cancelledAt' | 'cancellationReason'
  >
>;

/**
 * Storage view handed to work that runs while a requester is locked.
 *
 * Everything done through one scope commits or rolls back together,
 * including protocol numbers taken from `protocolCounter`.
 */
export interface RequesterWriteScope {
  /**
   * All ACTIVE requests of the locked requester, expired or not
   */
  findActive(): Promise<AccessRequest[]>;

  /**
   * ACTIVE requests created as renewals of `requestId`
   */
  findActiveRenewalsOf(requestId: number): Promise<AccessRequest[]>;

  readonly protocolCounter: ProtocolCounter;

  /**
   * Insert a request and its history.
   */
  create(
    request: NewAccessRequest,
    history: AccessHistoryDraft[],
  ): Promise<AccessRequest>;
}

/**
 * Repository Port for AccessRequest (Hexagonal Architecture)
 *
 * Every write takes the history entries it produces and stores them in the
 * same transaction as the request row: a request never exists without its
 * history, and history never outlives a rolled-back request.
 */
export abstract class AccessRequestRepositoryPort {
  /**
   * Run `work` with the requester's footprint locked in storage.
   *
   * Calls for the same requester are serialized across every instance
   * sharing the database; the lock is released when `work` settles. A
   * rejection from `work` rolls back everything written through the scope.
   */
  abstract runExclusiveForRequester<T>(
    requesterId: string,
    work: (scope: RequesterWriteScope) => Promise<T>,
  ): Promise<T>;

  abstract findById(id: number): Promise<NullableType<AccessRequest>>;

  abstract findByProtocol(
    protocol: string,
  ): Promise<NullableType<AccessRequest>>;

  /**
   * Page through a requester's requests, most recent first (`requestedAt`
   * then `id`, both descending). Returns up to `limit + 1` rows so callers
   * can tell whether another page exists.
   */
  abstract findByRequester(
    requesterId: string,
    filters: AccessRequestFilters,
    pagination: IPaginationOptions,
  ): Promise<AccessRequest[]>;

  /**
   * Conditional transition: applies `changes` only while the row is still in
   * `expectedStatus`, appending `history` in the same transaction.
   *
   * @returns the updated request, or null when the status had already moved on
   */
  abstract transitionStatus(
    id: number,
    expectedStatus: AccessRequestStatus,
    changes: AccessRequestStatusChange,
    history: AccessHistoryDraft[],
  ): Promise<NullableType<AccessRequest>>;
}
