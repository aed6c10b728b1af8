import { Column, Entity, PrimaryColumn } from 'typeorm';

/**
 * One row per calendar day that has minted at least one protocol.
 */
@Entity({
  name: 'protocol_sequences',
})
export class ProtocolSequenceEntity {
  @PrimaryColumn({ type: 'varchar', length: 8 })
  day!: string; // YYYYMMDD

  @Column({ name: 'last_value', type: 'integer' })
  lastValue!: number;
}
