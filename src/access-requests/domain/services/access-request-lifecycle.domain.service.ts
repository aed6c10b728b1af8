import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import { AuditService, AccessEventType } from '../../../audit/audit.service';
import { CatalogDomainService } from '../../../catalog/domain/services/catalog.domain.service';
import { KeyedLock } from '../../../utils/keyed-lock';
import { IPaginationOptions } from '../../../utils/types/pagination-options';
import { DEFAULT_ACCESS_REQUESTS_CONFIG } from '../../config/access-requests.config';
import {
  AccessRequest,
  NewAccessRequest,
} from '../entities/access-request.entity';
import { AccessHistoryEntry } from '../entities/access-history-entry.entity';
import { Requester } from '../entities/requester.entity';
import { AccessRequestStatus } from '../enums/access-request-status.enum';
import {
  AccessRequestNotFoundException,
  AccessRequestValidationException,
  BusinessRuleException,
  InvalidRequestStateException,
  ProtocolSequenceExhaustedException,
  RenewalNotEligibleException,
} from '../errors/access-request.errors';
import {
  AccessRequestFilters,
  AccessRequestRepositoryPort,
  RequesterWriteScope,
} from '../repositories/access-request.repository.port';
import { parseProtocol } from '../utils/protocol.util';
import { AccessHistoryDomainService } from './access-history.domain.service';
import { ProtocolSequencerDomainService } from './protocol-sequencer.domain.service';
import { RuleEngineDomainService } from './rule-engine.domain.service';

export const MIN_MODULES_PER_REQUEST = 1;
export const MAX_MODULES_PER_REQUEST = 3;
export const MIN_JUSTIFICATION_LENGTH = 20;
export const MAX_JUSTIFICATION_LENGTH = 500;
export const MIN_CANCELLATION_REASON_LENGTH = 10;
export const MAX_CANCELLATION_REASON_LENGTH = 200;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CreateAccessRequestCommand {
  moduleIds: number[];
  justification: string;
  urgent: boolean;
}

function addDays(date: Date, days: number): Date {
  return new Date(date.getTime() + days * DAY_MS);
}

/**
 * Access Request Lifecycle Domain Service
 *
 * Orchestrates create, renew and cancel:
 * 1. Validate caller input (nothing is read or written on failure)
 * 2. Load the requester's footprint and a catalog snapshot
 * 3. Run the rule engine
 * 4. Mint a protocol and persist the request with its history in one write
 *
 * State Machine:
 * - (none) → ACTIVE | DENIED, decided at creation
 * - ACTIVE → CANCELLED (requester)
 * - DENIED/CANCELLED → (terminal)
 *
 * Renewal never changes the renewed request; it creates a new one whose
 * `renewedFrom` points back.
 *
 * Locking:
 * - create: storage-side requester lock around footprint read, evaluation,
 *   protocol and write (`runExclusiveForRequester`)
 * - renew: in-process request lock, then the storage-side requester lock
 * - cancel: in-process request lock plus a conditional status update
 * Requester locks are never held while waiting for a request lock.
 */
@Injectable()
export class AccessRequestLifecycleDomainService {
  private readonly logger = new Logger(AccessRequestLifecycleDomainService.name);
  private readonly requestLocks = new KeyedLock();
  private readonly validityDays: number;
  private readonly renewalWindowDays: number;

  constructor(
    private readonly accessRequestRepository: AccessRequestRepositoryPort,
    private readonly catalogService: CatalogDomainService,
    private readonly ruleEngine: RuleEngineDomainService,
    private readonly protocolSequencer: ProtocolSequencerDomainService,
    private readonly historyService: AccessHistoryDomainService,
    private readonly auditService: AuditService,
    configService: ConfigService<AllConfigType>,
  ) {
    this.validityDays =
      configService.get('accessRequests.validityDays', { infer: true }) ??
      DEFAULT_ACCESS_REQUESTS_CONFIG.validityDays;
    this.renewalWindowDays =
      configService.get('accessRequests.renewalWindowDays', { infer: true }) ??
      DEFAULT_ACCESS_REQUESTS_CONFIG.renewalWindowDays;
  }

  /**
   * Decide a new access request.
   *
   * A DENIED outcome is a successful call: the denied request is persisted
   * and returned.
   *
   * @throws AccessRequestValidationException on malformed input
   * @throws ModuleNotFoundException when a module ID is unknown
   * @throws BusinessRuleException on a hard rejection (nothing persisted)
   */
  async create(
    requester: Requester,
    command: CreateAccessRequestCommand,
  ): Promise<AccessRequest> {
    const moduleIds = this.validateModuleIds(command.moduleIds);
    const justification = this.validateJustification(command.justification);

    return this.accessRequestRepository.runExclusiveForRequester(
      requester.id,
      (scope) =>
        this.decide(scope, requester, {
          moduleIds,
          justification,
          urgent: command.urgent,
        }),
    );
  }

  /**
   * Renew an ACTIVE request inside its renewal window.
   *
   * Re-runs the full decision for the same modules. Duplicate and
   * existing-access checks are waived for the modules of the renewed request.
   *
   * @throws AccessRequestNotFoundException when missing or not owned
   * @throws InvalidRequestStateException when not ACTIVE or already renewed
   * @throws RenewalNotEligibleException outside the window or after expiry
   */
  async renew(requestId: number, requester: Requester): Promise<AccessRequest> {
    return this.requestLocks.runExclusive(String(requestId), () =>
      this.accessRequestRepository.runExclusiveForRequester(
        requester.id,
        async (scope) => {
          const now = new Date();

          // 1. Ownership and state
          const original = await this.findOwned(requestId, requester);
          if (original.status !== AccessRequestStatus.ACTIVE) {
            throw new InvalidRequestStateException(
              original.protocol,
              original.status,
            );
          }

          // 2. One live renewal per request
          const [renewal] = await scope.findActiveRenewalsOf(original.id);
          if (renewal) {
            throw new InvalidRequestStateException(
              original.protocol,
              original.status,
              `Access request ${original.protocol} has already been renewed by ${renewal.protocol}`,
            );
          }

          // 3. Eligibility window
          this.assertRenewable(original, now);

          // 4. Full decision with the renewal waiver
          return this.decide(
            scope,
            requester,
            {
              moduleIds: original.moduleIds,
              justification: original.justification,
              urgent: original.urgent,
            },
            original,
            now,
          );
        },
      ),
    );
  }

  /**
   * Cancel an ACTIVE request. Not idempotent.
   *
   * @throws AccessRequestValidationException when the reason is out of range
   * @throws AccessRequestNotFoundException when missing or not owned
   * @throws InvalidRequestStateException when not ACTIVE, including losing a race
   */
  async cancel(
    requestId: number,
    requester: Requester,
    reason: string,
  ): Promise<AccessRequest> {
    const cancellationReason = this.validateCancellationReason(reason);

    return this.requestLocks.runExclusive(String(requestId), async () => {
      const request = await this.findOwned(requestId, requester);
      if (request.status !== AccessRequestStatus.ACTIVE) {
        throw new InvalidRequestStateException(request.protocol, request.status);
      }

      const now = new Date();
      const updated = await this.accessRequestRepository.transitionStatus(
        request.id,
        AccessRequestStatus.ACTIVE,
        {
          status: AccessRequestStatus.CANCELLED,
          cancelledAt: now,
          cancellationReason,
        },
        [this.historyService.cancelled(cancellationReason, now)],
      );

      if (!updated) {
        // Moved on between read and update (another process)
        const current = await this.accessRequestRepository.findById(request.id);
        throw new InvalidRequestStateException(
          request.protocol,
          current?.status ?? AccessRequestStatus.CANCELLED,
        );
      }

      this.logger.log(`Access request ${updated.protocol} cancelled`);
      this.auditService.logAccessEvent({
        requesterId: requester.id,
        event: AccessEventType.ACCESS_REQUEST_CANCELLED,
        success: true,
        accessRequestId: updated.id,
        protocol: updated.protocol,
      });

      return updated;
    });
  }

  /**
   * Requester's own requests, most recent first. Returns up to `limit + 1`
   * rows; the extra row only signals that another page exists.
   */
  async list(
    requester: Requester,
    filters: AccessRequestFilters,
    pagination: IPaginationOptions,
  ): Promise<AccessRequest[]> {
    return this.accessRequestRepository.findByRequester(
      requester.id,
      filters,
      pagination,
    );
  }

  /**
   * Look a request up by numeric ID or by protocol.
   *
   * @throws AccessRequestNotFoundException when missing, malformed or not owned
   */
  async getRequest(
    idOrProtocol: string,
    requester: Requester,
  ): Promise<AccessRequest> {
    const reference = idOrProtocol.trim();

    if (/^\d+$/.test(reference)) {
      return this.findOwned(parseInt(reference, 10), requester);
    }

    if (!parseProtocol(reference)) {
      throw new AccessRequestNotFoundException(reference);
    }

    const request = await this.accessRequestRepository.findByProtocol(reference);
    if (!request || request.requesterId !== requester.id) {
      throw new AccessRequestNotFoundException(reference);
    }
    return request;
  }

  async getHistory(
    requestId: number,
    requester: Requester,
  ): Promise<AccessHistoryEntry[]> {
    const request = await this.findOwned(requestId, requester);
    return this.historyService.listForRequest(request.id);
  }

  /**
   * Footprint read, evaluation and write, all through the scope of the
   * requester lock.
   */
  private async decide(
    scope: RequesterWriteScope,
    requester: Requester,
    candidate: CreateAccessRequestCommand,
    renewing?: AccessRequest,
    now: Date = new Date(),
  ): Promise<AccessRequest> {
    // 1. Current footprint
    const footprint = this.currentFootprint(await scope.findActive(), now);

    // 2. Catalog snapshot covering requested and held modules
    const snapshot = await this.catalogService.loadSnapshot(
      [
        ...candidate.moduleIds,
        ...footprint.flatMap((request) => request.moduleIds),
      ],
      requester.department,
    );
    const modules = snapshot.resolveModules(candidate.moduleIds);

    // 3. Rules
    const verdict = this.ruleEngine.evaluate({
      department: requester.department,
      modules,
      justification: candidate.justification,
      footprint,
      snapshot,
      renewing,
    });

    if (verdict.outcome === 'HARD_REJECT') {
      this.logger.warn(
        `Access request rejected for requester ${requester.id}: ${verdict.rule}`,
      );
      this.auditService.logAccessEvent({
        requesterId: requester.id,
        event: AccessEventType.ACCESS_REQUEST_REJECTED,
        success: false,
        errorMessage: verdict.reason,
        metadata: {
          rule: verdict.rule,
          moduleIds: candidate.moduleIds,
          renewedFrom: renewing?.id ?? null,
        },
      });
      throw new BusinessRuleException(verdict.rule, verdict.reason);
    }

    // 4. Protocol is minted for both APPROVE and DENY
    const protocol = await this.mintProtocol(scope, requester, now);

    const base: NewAccessRequest = {
      protocol,
      requesterId: requester.id,
      department: requester.department,
      moduleIds: candidate.moduleIds,
      justification: candidate.justification,
      urgent: candidate.urgent,
      status: AccessRequestStatus.DENIED,
      requestedAt: now,
      ...(renewing ? { renewedFrom: renewing.id } : {}),
    };

    const created = this.historyService.created(
      modules.map((module) => module.name),
      candidate.urgent,
      now,
    );

    let newRequest: NewAccessRequest;
    const history = [created];
    if (verdict.outcome === 'APPROVE') {
      const expiresAt = addDays(now, this.validityDays);
      newRequest = {
        ...base,
        status: AccessRequestStatus.ACTIVE,
        approvedAt: now,
        expiresAt,
      };
      history.push(this.historyService.approved(expiresAt, now));
    } else {
      newRequest = { ...base, denialReason: verdict.reason };
      history.push(this.historyService.denied(verdict.reason, now));
    }

    if (renewing) {
      history.push(
        this.historyService.renewed(
          renewing.id,
          protocol,
          newRequest.status,
          now,
        ),
      );
    }

    // 5. Request and history in one write
    const saved = await scope.create(newRequest, history);

    this.logger.log(
      `Access request ${saved.protocol} ${saved.status}${renewing ? ` (renewal of ${renewing.protocol})` : ''}`,
    );
    this.auditService.logAccessEvent({
      requesterId: requester.id,
      event: this.decisionEvent(saved, renewing),
      success: saved.status === AccessRequestStatus.ACTIVE,
      accessRequestId: saved.id,
      protocol: saved.protocol,
      metadata: {
        moduleIds: saved.moduleIds,
        urgent: saved.urgent,
        rule: verdict.outcome === 'DENY' ? verdict.rule : null,
        renewedFrom: renewing?.id ?? null,
      },
    });

    return saved;
  }

  private decisionEvent(
    saved: AccessRequest,
    renewing?: AccessRequest,
  ): AccessEventType {
    if (saved.status === AccessRequestStatus.DENIED) {
      return AccessEventType.ACCESS_REQUEST_DENIED;
    }
    return renewing
      ? AccessEventType.ACCESS_REQUEST_RENEWED
      : AccessEventType.ACCESS_REQUEST_APPROVED;
  }

  private async mintProtocol(
    scope: RequesterWriteScope,
    requester: Requester,
    now: Date,
  ): Promise<string> {
    try {
      return await this.protocolSequencer.next(scope.protocolCounter, now);
    } catch (error) {
      if (error instanceof ProtocolSequenceExhaustedException) {
        this.auditService.logAccessEvent({
          requesterId: requester.id,
          event: AccessEventType.PROTOCOL_SEQUENCE_EXHAUSTED,
          success: false,
          errorMessage: error.message,
        });
      }
      throw error;
    }
  }

  private async findOwned(
    requestId: number,
    requester: Requester,
  ): Promise<AccessRequest> {
    const request = await this.accessRequestRepository.findById(requestId);
    if (!request || request.requesterId !== requester.id) {
      throw new AccessRequestNotFoundException(requestId);
    }
    return request;
  }

  /**
   * ACTIVE requests that still grant access. Expired ones no longer count,
   * and a request renewed by a live renewal is represented by that renewal
   * alone, so the modules of a renewal chain are held once.
   */
  private currentFootprint(
    active: AccessRequest[],
    now: Date,
  ): AccessRequest[] {
    const live = active.filter((request) => !this.isStale(request, now));
    const superseded = new Set(
      live.flatMap((request) =>
        request.renewedFrom !== undefined ? [request.renewedFrom] : [],
      ),
    );
    return live.filter((request) => !superseded.has(request.id));
  }

  private isStale(request: AccessRequest, now: Date): boolean {
    return (
      request.expiresAt !== undefined &&
      request.expiresAt.getTime() <= now.getTime()
    );
  }

  private assertRenewable(request: AccessRequest, now: Date): void {
    if (!request.expiresAt || this.isStale(request, now)) {
      throw new RenewalNotEligibleException(
        `Access request ${request.protocol} has expired; submit a new request instead`,
      );
    }

    const windowOpensAt = addDays(request.expiresAt, -this.renewalWindowDays);
    if (now.getTime() < windowOpensAt.getTime()) {
      throw new RenewalNotEligibleException(
        `Access request ${request.protocol} can be renewed from ${windowOpensAt.toISOString()}, ${this.renewalWindowDays} days before it expires`,
      );
    }
  }

  private validateModuleIds(moduleIds: number[]): number[] {
    if (
      !Array.isArray(moduleIds) ||
      moduleIds.length < MIN_MODULES_PER_REQUEST ||
      moduleIds.length > MAX_MODULES_PER_REQUEST
    ) {
      throw new AccessRequestValidationException(
        `Between ${MIN_MODULES_PER_REQUEST} and ${MAX_MODULES_PER_REQUEST} modules must be requested`,
      );
    }
    if (!moduleIds.every((id) => Number.isInteger(id) && id > 0)) {
      throw new AccessRequestValidationException(
        'Module IDs must be positive integers',
      );
    }
    if (new Set(moduleIds).size !== moduleIds.length) {
      throw new AccessRequestValidationException(
        'Module IDs must not repeat',
      );
    }
    return [...moduleIds];
  }

  private validateJustification(justification: string): string {
    const trimmed = justification.trim();
    if (
      trimmed.length < MIN_JUSTIFICATION_LENGTH ||
      trimmed.length > MAX_JUSTIFICATION_LENGTH
    ) {
      throw new AccessRequestValidationException(
        `Justification must be between ${MIN_JUSTIFICATION_LENGTH} and ${MAX_JUSTIFICATION_LENGTH} characters`,
      );
    }
    return trimmed;
  }

  private validateCancellationReason(reason: string): string {
    const trimmed = reason.trim();
    if (
      trimmed.length < MIN_CANCELLATION_REASON_LENGTH ||
      trimmed.length > MAX_CANCELLATION_REASON_LENGTH
    ) {
      throw new AccessRequestValidationException(
        `Cancellation reason must be between ${MIN_CANCELLATION_REASON_LENGTH} and ${MAX_CANCELLATION_REASON_LENGTH} characters`,
      );
    }
    return trimmed;
  }
}
