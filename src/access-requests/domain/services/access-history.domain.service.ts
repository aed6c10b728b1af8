import { Injectable } from '@nestjs/common';
import { AccessHistoryRepositoryPort } from '../repositories/access-history.repository.port';
import {
  AccessHistoryDraft,
  AccessHistoryEntry,
} from '../entities/access-history-entry.entity';
import { AccessHistoryAction } from '../enums/access-history-action.enum';
import { AccessRequestStatus } from '../enums/access-request-status.enum';
import { AccessRequestValidationException } from '../errors/access-request.errors';

function isHistoryAction(value: unknown): value is AccessHistoryAction {
  return (
    typeof value === 'string' &&
    Object.values(AccessHistoryAction).some((candidate) => candidate === value)
  );
}

/**
 * Access History Domain Service
 *
 * Append-only log of what happened to each access request. Entries produced
 * by create, renew and cancel are handed to the request repository as drafts
 * so they land in the same transaction as the request row; `record` covers
 * standalone appends.
 *
 * Entries are never updated or deleted.
 */
@Injectable()
export class AccessHistoryDomainService {
  constructor(private readonly historyRepository: AccessHistoryRepositoryPort) {}

  /**
   * Append one entry. Storage failures propagate to the caller.
   *
   * @throws AccessRequestValidationException when `action` is empty or unknown
   */
  async record(
    accessRequestId: number,
    action: string,
    description: string,
    occurredAt: Date = new Date(),
  ): Promise<AccessHistoryEntry> {
    const draft = this.draft(action, description, occurredAt);
    return this.historyRepository.append({ ...draft, accessRequestId });
  }

  async listForRequest(accessRequestId: number): Promise<AccessHistoryEntry[]> {
    return this.historyRepository.findByAccessRequestId(accessRequestId);
  }

  draft(
    action: string,
    description: string,
    occurredAt: Date,
    accessRequestId?: number,
  ): AccessHistoryDraft {
    if (!isHistoryAction(action)) {
      throw new AccessRequestValidationException(
        'History entry requires an action',
      );
    }
    return {
      ...(accessRequestId !== undefined ? { accessRequestId } : {}),
      action,
      description,
      occurredAt,
    };
  }

  created(
    moduleNames: string[],
    urgent: boolean,
    occurredAt: Date,
  ): AccessHistoryDraft {
    const suffix = urgent ? ' (urgent)' : '';
    return this.draft(
      AccessHistoryAction.CREATED,
      `Access requested for ${moduleNames.join(', ')}${suffix}`,
      occurredAt,
    );
  }

  approved(expiresAt: Date, occurredAt: Date): AccessHistoryDraft {
    return this.draft(
      AccessHistoryAction.APPROVED,
      `Automatically approved; access expires ${expiresAt.toISOString()}`,
      occurredAt,
    );
  }

  denied(reason: string, occurredAt: Date): AccessHistoryDraft {
    return this.draft(
      AccessHistoryAction.DENIED,
      `Automatically denied: ${reason}`,
      occurredAt,
    );
  }

  cancelled(reason: string, occurredAt: Date): AccessHistoryDraft {
    return this.draft(
      AccessHistoryAction.CANCELLED,
      `Cancelled by requester: ${reason}`,
      occurredAt,
    );
  }

  /**
   * Entry for the request being renewed, pointing at its successor.
   */
  renewed(
    originalRequestId: number,
    renewalProtocol: string,
    renewalStatus: AccessRequestStatus,
    occurredAt: Date,
  ): AccessHistoryDraft {
    return this.draft(
      AccessHistoryAction.RENEWED,
      `Renewal requested as ${renewalProtocol} (${renewalStatus})`,
      occurredAt,
      originalRequestId,
    );
  }
}
