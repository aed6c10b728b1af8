import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import { ProtocolCounter } from '../repositories/protocol-counter.port';
import { ProtocolSequenceExhaustedException } from '../errors/access-request.errors';
import { DEFAULT_ACCESS_REQUESTS_CONFIG } from '../../config/access-requests.config';
import {
  formatProtocol,
  formatProtocolDay,
  MAX_PROTOCOL_SEQUENCE,
} from '../utils/protocol.util';

/**
 * Protocol Sequencer Domain Service
 *
 * Mints `PREFIX-YYYYMMDD-NNNN` identifiers. The counter lives in storage,
 * keyed by day, and is incremented atomically there; callers pass the counter
 * of the transaction the new request is written in. The clock is read once per
 * call, so a call that straddles midnight is counted against exactly one day.
 */
@Injectable()
export class ProtocolSequencerDomainService {
  private readonly logger = new Logger(ProtocolSequencerDomainService.name);
  private readonly prefix: string;

  constructor(configService: ConfigService<AllConfigType>) {
    this.prefix =
      configService.get('accessRequests.protocolPrefix', { infer: true }) ??
      DEFAULT_ACCESS_REQUESTS_CONFIG.protocolPrefix;
  }

  /**
   * @param now - decision time; defaults to the current instant
   * @throws ProtocolSequenceExhaustedException past 9999 protocols in one day
   */
  async next(
    counter: ProtocolCounter,
    now: Date = new Date(),
  ): Promise<string> {
    const day = formatProtocolDay(now);
    const sequence = await counter.increment(day);

    if (sequence > MAX_PROTOCOL_SEQUENCE) {
      this.logger.error(`Protocol sequence exhausted for ${day}`);
      throw new ProtocolSequenceExhaustedException(day);
    }

    return formatProtocol(this.prefix, day, sequence);
  }
}
