import {
  Column,
  Entity,
  Index,
  JoinColumn,
  ManyToOne,
  PrimaryGeneratedColumn,
} from 'typeorm';
import { DepartmentCode } from '../../../../../catalog/domain/enums/department-code.enum';
import { AccessRequestStatus } from '../../../../domain/enums/access-request-status.enum';

@Entity({
  name: 'access_requests',
})
@Index(['requesterId', 'status'])
export class AccessRequestEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 30 })
  @Index({ unique: true })
  protocol!: string;

  @Column({ name: 'requester_id', type: 'varchar', length: 100 })
  requesterId!: string;

  @Column({ type: 'varchar', length: 20 })
  department!: DepartmentCode;

  @Column({ name: 'module_ids', type: 'integer', array: true })
  moduleIds!: number[];

  @Column({ type: 'text' })
  justification!: string;

  @Column({ type: 'boolean', default: false })
  urgent!: boolean;

  @Column({ type: 'varchar', length: 20 })
  status!: AccessRequestStatus;

  @Column({ name: 'denial_reason', type: 'text', nullable: true })
  denialReason?: string | null;

  @Column({
    name: 'cancellation_reason',
    type: 'varchar',
    length: 200,
    nullable: true,
  })
  cancellationReason?: string | null;

  @Column({ name: 'requested_at', type: 'timestamptz' })
  @Index()
  requestedAt!: Date;

  @Column({ name: 'approved_at', type: 'timestamptz', nullable: true })
  approvedAt?: Date | null;

  @Column({ name: 'expires_at', type: 'timestamptz', nullable: true })
  expiresAt?: Date | null;

  @Column({ name: 'cancelled_at', type: 'timestamptz', nullable: true })
  cancelledAt?: Date | null;

  @ManyToOne(() => AccessRequestEntity, { nullable: true })
  @JoinColumn({ name: 'renewed_from_id' })
  renewedFromRequest?: AccessRequestEntity | null;

  @Column({ name: 'renewed_from_id', type: 'integer', nullable: true })
  @Index()
  renewedFromId?: number | null;
}
