import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { AccessHistoryAction } from '../../../../domain/enums/access-history-action.enum';
import { AccessRequestEntity } from './access-request.entity';

@Entity({
  name: 'access_request_history',
})
export class AccessHistoryEntryEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @ManyToOne(() => AccessRequestEntity, { nullable: false })
  @JoinColumn({ name: 'access_request_id' })
  accessRequest?: AccessRequestEntity;

  @Column({ name: 'access_request_id', type: 'integer' })
  @Index()
  accessRequestId!: number;

  @Column({ type: 'varchar', length: 20 })
  action!: AccessHistoryAction;

  @Column({ type: 'text' })
  description!: string;

  @Column({ name: 'occurred_at', type: 'timestamptz' })
  occurredAt!: Date;
}
