import { AccessHistoryDomainService } from './access-history.domain.service';
import { AccessHistoryAction } from '../enums/access-history-action.enum';
import { AccessRequestStatus } from '../enums/access-request-status.enum';
import { AccessRequestValidationException } from '../errors/access-request.errors';
import { InMemoryAccessHistoryRepository } from '../../../../test/utils/in-memory-repositories';

describe('AccessHistoryDomainService', () => {
  const occurredAt = new Date('2026-03-05T12:00:00.000Z');
  let repository: InMemoryAccessHistoryRepository;
  let service: AccessHistoryDomainService;

  beforeEach(() => {
    repository = new InMemoryAccessHistoryRepository();
    service = new AccessHistoryDomainService(repository);
  });

  describe('record', () => {
    it('should append an entry to the request', async () => {
      const entry = await service.record(
        3,
        AccessHistoryAction.CANCELLED,
        'Cancelled by requester: moved to another team',
        occurredAt,
      );

      expect(entry).toEqual({
        id: 1,
        accessRequestId: 3,
        action: AccessHistoryAction.CANCELLED,
        description: 'Cancelled by requester: moved to another team',
        occurredAt,
      });
      await expect(service.listForRequest(3)).resolves.toEqual([entry]);
    });

    it('should reject an empty action', async () => {
      await expect(
        service.record(3, '', 'no action', occurredAt),
      ).rejects.toBeInstanceOf(AccessRequestValidationException);
      await expect(service.listForRequest(3)).resolves.toEqual([]);
    });

    it('should propagate storage failures', async () => {
      jest
        .spyOn(repository, 'append')
        .mockRejectedValue(new Error('storage unavailable'));

      await expect(
        service.record(3, AccessHistoryAction.RENEWED, 'renewed', occurredAt),
      ).rejects.toThrow('storage unavailable');
    });
  });

  describe('drafts', () => {
    it('should describe a creation with module names and urgency', () => {
      expect(
        service.created(['Payroll', 'Reports Portal'], true, occurredAt),
      ).toEqual({
        action: AccessHistoryAction.CREATED,
        description: 'Access requested for Payroll, Reports Portal (urgent)',
        occurredAt,
      });
    });

    it('should carry the expiry on approval', () => {
      expect(
        service.approved(new Date('2026-09-01T12:00:00.000Z'), occurredAt)
          .description,
      ).toBe('Automatically approved; access expires 2026-09-01T12:00:00.000Z');
    });

    it('should point a renewal entry at the original request', () => {
      expect(
        service.renewed(
          7,
          'SOL-20260305-0009',
          AccessRequestStatus.ACTIVE,
          occurredAt,
        ),
      ).toEqual({
        accessRequestId: 7,
        action: AccessHistoryAction.RENEWED,
        description: 'Renewal requested as SOL-20260305-0009 (ACTIVE)',
        occurredAt,
      });
    });
  });
});
