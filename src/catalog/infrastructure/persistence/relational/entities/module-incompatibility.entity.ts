import { Check, Column, Entity, Index, PrimaryColumn } from 'typeorm';

/**
 * One row per unordered pair; the check constraint keeps `(a, b)` and
 * `(b, a)` from both being stored.
 */
@Entity({
  name: 'module_incompatibilities',
})
@Check(`"module_a_id" < "module_b_id"`)
export class ModuleIncompatibilityEntity {
  @PrimaryColumn({ name: 'module_a_id', type: 'integer' })
  moduleAId!: number;

  @PrimaryColumn({ name: 'module_b_id', type: 'integer' })
  @Index()
  moduleBId!: number;

  @Column({ type: 'text', nullable: true })
  reason?: string | null;
}
