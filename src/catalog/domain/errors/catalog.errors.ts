import { HttpStatus, NotFoundException } from '@nestjs/common';

export class ModuleNotFoundException extends NotFoundException {
  readonly moduleIds: number[];

  constructor(moduleIds: number[]) {
    super({
      statusCode: HttpStatus.NOT_FOUND,
      code: 'MODULE_NOT_FOUND',
      message: `Unknown module id(s): ${moduleIds.join(', ')}`,
    });
    this.moduleIds = moduleIds;
  }
}

export class DepartmentNotFoundException extends NotFoundException {
  constructor(department: string) {
    super({
      statusCode: HttpStatus.NOT_FOUND,
      code: 'DEPARTMENT_NOT_FOUND',
      message: `Unknown department: ${department}`,
    });
  }
}
