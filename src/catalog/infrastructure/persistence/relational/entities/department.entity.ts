import { Check, Column, Entity, PrimaryColumn } from 'typeorm';
import { DepartmentCode } from '../../../../domain/enums/department-code.enum';

@Entity({
  name: 'departments',
})
@Check(`"module_quota" >= 0`)
export class DepartmentEntity {
  @PrimaryColumn({ type: 'varchar', length: 20 })
  code!: DepartmentCode;

  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @Column({ name: 'module_quota', type: 'integer' })
  moduleQuota!: number;
}
