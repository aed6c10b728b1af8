import { EntityManager } from 'typeorm';
import { ProtocolCounter } from '../../../../domain/repositories/protocol-counter.port';

/**
 * Daily counter backed by `protocol_sequences`, bound to one transaction.
 *
 * Increment and read happen in one statement. The row lock taken by the
 * upsert is held until the surrounding transaction ends, so sequence numbers
 * of rolled-back requests are handed out again.
 */
export class ProtocolSequenceRelationalCounter implements ProtocolCounter {
  constructor(private readonly manager: EntityManager) {}

  async increment(day: string): Promise<number> {
    const rows: unknown = await this.manager.query(
      `INSERT INTO protocol_sequences (day, last_value)
       VALUES ($1, 1)
       ON CONFLICT (day)
       DO UPDATE SET last_value = protocol_sequences.last_value + 1
       RETURNING last_value`,
      [day],
    );
    return this.readLastValue(rows, day);
  }

  private readLastValue(rows: unknown, day: string): number {
    if (Array.isArray(rows)) {
      const [row]: unknown[] = rows;
      if (typeof row === 'object' && row !== null && 'last_value' in row) {
        const value = Number(row.last_value);
        if (Number.isInteger(value)) {
          return value;
        }
      }
    }
    throw new Error(`Protocol sequence upsert returned no value for ${day}`);
  }
}
