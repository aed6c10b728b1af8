import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { DepartmentCode } from '../domain/enums/department-code.enum';

export class SoftwareModuleResponseDto {
  @ApiProperty({ description: 'Module ID', example: 1 })
  @Expose()
  id!: number;

  @ApiProperty({ description: 'Module name', example: 'Financial Management' })
  @Expose()
  name!: string;

  @ApiPropertyOptional({
    description: 'What the module gives access to',
    example: 'General ledger and accounts payable',
    nullable: true,
  })
  @Expose()
  description?: string | null;

  @ApiProperty({
    description: 'Inactive modules cannot be requested',
    example: true,
  })
  @Expose()
  active!: boolean;

  @ApiProperty({
    description: 'Departments allowed to request the module (IT may request any)',
    enum: DepartmentCode,
    isArray: true,
    example: [DepartmentCode.FINANCE],
  })
  @Expose()
  allowedDepartments!: DepartmentCode[];
}
