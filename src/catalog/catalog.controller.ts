import { Controller, Get, UseGuards } from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import {
  ApiBearerAuth,
  ApiOkResponse,
  ApiOperation,
  ApiTags,
  ApiUnauthorizedResponse,
} from '@nestjs/swagger';
import { plainToClass } from 'class-transformer';
import { CatalogDomainService } from './domain/services/catalog.domain.service';
import { SoftwareModuleResponseDto } from './dto/software-module-response.dto';
import { DepartmentResponseDto } from './dto/department-response.dto';

/**
 * Catalog Controller
 *
 * Read-only listing of requestable modules and department quotas, so
 * clients can build a request form.
 */
@ApiTags('Catalog')
@Controller({ version: '1' })
@UseGuards(AuthGuard('jwt'))
@ApiBearerAuth()
export class CatalogController {
  constructor(private readonly catalogService: CatalogDomainService) {}

  @Get('modules')
  @ApiOperation({ summary: 'List Modules' })
  @ApiOkResponse({ type: [SoftwareModuleResponseDto] })
  @ApiUnauthorizedResponse({ description: 'Invalid or expired access token' })
  async listModules(): Promise<SoftwareModuleResponseDto[]> {
    const modules = await this.catalogService.listModules();
    return modules.map((module) =>
      plainToClass(
        SoftwareModuleResponseDto,
        { ...module, description: module.description ?? null },
        { excludeExtraneousValues: true },
      ),
    );
  }

  @Get('departments')
  @ApiOperation({ summary: 'List Departments and Quotas' })
  @ApiOkResponse({ type: [DepartmentResponseDto] })
  @ApiUnauthorizedResponse({ description: 'Invalid or expired access token' })
  async listDepartments(): Promise<DepartmentResponseDto[]> {
    const departments = await this.catalogService.listDepartments();
    return departments.map((department) =>
      plainToClass(DepartmentResponseDto, department, {
        excludeExtraneousValues: true,
      }),
    );
  }
}
