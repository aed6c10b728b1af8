import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { ProtocolSequencerDomainService } from './protocol-sequencer.domain.service';
import { ProtocolCounter } from '../repositories/protocol-counter.port';
import { ProtocolSequenceExhaustedException } from '../errors/access-request.errors';
import { AllConfigType } from '../../../config/config.type';
import { InMemoryProtocolCounter } from '../../../../test/utils/in-memory-repositories';

describe('ProtocolSequencerDomainService', () => {
  const now = new Date('2026-03-05T12:00:00.000Z');
  let counter: InMemoryProtocolCounter;

  const createService = (config: Record<string, unknown> = {}) =>
    new ProtocolSequencerDomainService(
      new ConfigService<AllConfigType>(config),
    );

  beforeAll(() => {
    Logger.overrideLogger(false);
  });

  beforeEach(() => {
    counter = new InMemoryProtocolCounter();
  });

  it('should start each day at 0001 with the default prefix', async () => {
    const service = createService();

    await expect(service.next(counter, now)).resolves.toBe('SOL-20260305-0001');
    await expect(service.next(counter, now)).resolves.toBe('SOL-20260305-0002');
  });

  it('should reset the sequence on a new day', async () => {
    const service = createService();
    await service.next(counter, now);

    await expect(
      service.next(counter, new Date('2026-03-06T00:00:01.000Z')),
    ).resolves.toBe('SOL-20260306-0001');
  });

  it('should use the configured prefix', async () => {
    const service = createService({
      accessRequests: {
        protocolPrefix: 'ACC',
        validityDays: 180,
        renewalWindowDays: 30,
      },
    });

    await expect(service.next(counter, now)).resolves.toBe('ACC-20260305-0001');
  });

  it('should never issue the same protocol to concurrent callers', async () => {
    const service = createService();

    const protocols = await Promise.all(
      Array.from({ length: 25 }, () => service.next(counter, now)),
    );

    expect(new Set(protocols).size).toBe(25);
    const sequences = protocols
      .map((protocol) => Number(protocol.slice(-4)))
      .sort((a, b) => a - b);
    expect(sequences).toEqual(Array.from({ length: 25 }, (_, i) => i + 1));
  });

  it('should refuse to wrap past 9999', async () => {
    counter.set('20260305', 9999);
    const service = createService();

    await expect(service.next(counter, now)).rejects.toBeInstanceOf(
      ProtocolSequenceExhaustedException,
    );
  });

  it('should propagate storage failures', async () => {
    const failing: ProtocolCounter = {
      increment: jest.fn().mockRejectedValue(new Error('connection lost')),
    };
    const service = createService();

    await expect(service.next(failing, now)).rejects.toThrow('connection lost');
  });
});
