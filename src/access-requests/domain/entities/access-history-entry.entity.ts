import { AccessHistoryAction } from '../enums/access-history-action.enum';

/**
 * Append-only audit trail row of an access request.
 */
export interface AccessHistoryEntry {
  id: number;
  accessRequestId: number;
  action: AccessHistoryAction;
  description: string;
  occurredAt: Date;
}

/**
 * History entry waiting to be written together with its request.
 *
 * Without `accessRequestId` the entry belongs to the request being created in
 * the same write.
 */
export interface AccessHistoryDraft {
  accessRequestId?: number;
  action: AccessHistoryAction;
  description: string;
  occurredAt: Date;
}
