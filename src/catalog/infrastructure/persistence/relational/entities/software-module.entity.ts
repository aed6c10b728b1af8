import { Column, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';
import { DepartmentCode } from '../../../../domain/enums/department-code.enum';

@Entity({
  name: 'modules',
})
export class SoftwareModuleEntity {
  @PrimaryGeneratedColumn()
  id!: number;

  @Column({ type: 'varchar', length: 100 })
  @Index({ unique: true })
  name!: string;

  @Column({ type: 'text', nullable: true })
  description?: string | null;

  @Column({ type: 'boolean', default: true })
  active!: boolean;

  @Column({
    name: 'allowed_departments',
    type: 'varchar',
    length: 20,
    array: true,
    default: () => "'{}'",
  })
  allowedDepartments!: DepartmentCode[];
}
