import { ApiProperty } from '@nestjs/swagger';
import { Expose } from 'class-transformer';
import { DepartmentCode } from '../domain/enums/department-code.enum';

export class DepartmentResponseDto {
  @ApiProperty({ enum: DepartmentCode, example: DepartmentCode.FINANCE })
  @Expose()
  code!: DepartmentCode;

  @ApiProperty({ example: 'Finance' })
  @Expose()
  name!: string;

  @ApiProperty({
    description: 'Maximum modules a member may hold active at once',
    example: 5,
  })
  @Expose()
  moduleQuota!: number;
}
