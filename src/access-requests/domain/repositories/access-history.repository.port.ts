import {
  AccessHistoryDraft,
  AccessHistoryEntry,
} from '../entities/access-history-entry.entity';

export abstract class AccessHistoryRepositoryPort {
  /**
   * Append a single entry outside any request write
   */
  abstract append(
    entry: AccessHistoryDraft & { accessRequestId: number },
  ): Promise<AccessHistoryEntry>;

  /**
   * Entries of one request, oldest first
   */
  abstract findByAccessRequestId(
    accessRequestId: number,
  ): Promise<AccessHistoryEntry[]>;
}
