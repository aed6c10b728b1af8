import { Injectable } from '@nestjs/common';
import { plainToClass } from 'class-transformer';
import { AccessRequestLifecycleDomainService } from './domain/services/access-request-lifecycle.domain.service';
import { AccessRequest } from './domain/entities/access-request.entity';
import { AccessHistoryEntry } from './domain/entities/access-history-entry.entity';
import { Requester } from './domain/entities/requester.entity';
import { CreateAccessRequestDto } from './dto/create-access-request.dto';
import { ListAccessRequestsDto } from './dto/list-access-requests.dto';
import { AccessRequestResponseDto } from './dto/access-request-response.dto';
import { AccessHistoryEntryResponseDto } from './dto/access-history-entry-response.dto';
import { InfinityPaginationResponseDto } from '../utils/dto/infinity-pagination-response.dto';
import { infinityPagination } from '../utils/infinity-pagination';

/**
 * Access Requests Service (Application Layer)
 *
 * Thin facade over AccessRequestLifecycleDomainService that handles:
 * - DTO transformations (domain → response DTO)
 * - Pagination defaults and formatting
 *
 * Business logic lives in the domain services.
 */
@Injectable()
export class AccessRequestsService {
  constructor(
    private readonly lifecycleService: AccessRequestLifecycleDomainService,
  ) {}

  async create(
    requester: Requester,
    dto: CreateAccessRequestDto,
  ): Promise<AccessRequestResponseDto> {
    const request = await this.lifecycleService.create(requester, {
      moduleIds: dto.moduleIds,
      justification: dto.justification,
      urgent: dto.urgent ?? false,
    });
    return this.toResponseDto(request);
  }

  async list(
    requester: Requester,
    query: ListAccessRequestsDto,
  ): Promise<InfinityPaginationResponseDto<AccessRequestResponseDto>> {
    const pagination = {
      page: query.page ?? 1,
      limit: query.limit ?? 20,
    };

    const requests = await this.lifecycleService.list(
      requester,
      {
        status: query.status,
        moduleId: query.moduleId,
        urgent: query.urgent,
      },
      pagination,
    );

    return infinityPagination(
      requests.map((request) => this.toResponseDto(request)),
      pagination,
    );
  }

  async getRequest(
    idOrProtocol: string,
    requester: Requester,
  ): Promise<AccessRequestResponseDto> {
    const request = await this.lifecycleService.getRequest(
      idOrProtocol,
      requester,
    );
    return this.toResponseDto(request);
  }

  async getHistory(
    requestId: number,
    requester: Requester,
  ): Promise<AccessHistoryEntryResponseDto[]> {
    const entries = await this.lifecycleService.getHistory(requestId, requester);
    return entries.map((entry) => this.toHistoryResponseDto(entry));
  }

  async renew(
    requestId: number,
    requester: Requester,
  ): Promise<AccessRequestResponseDto> {
    const request = await this.lifecycleService.renew(requestId, requester);
    return this.toResponseDto(request);
  }

  async cancel(
    requestId: number,
    requester: Requester,
    reason: string,
  ): Promise<void> {
    await this.lifecycleService.cancel(requestId, requester, reason);
  }

  toResponseDto(request: AccessRequest): AccessRequestResponseDto {
    return plainToClass(AccessRequestResponseDto, request, {
      excludeExtraneousValues: true,
    });
  }

  private toHistoryResponseDto(
    entry: AccessHistoryEntry,
  ): AccessHistoryEntryResponseDto {
    return plainToClass(AccessHistoryEntryResponseDto, entry, {
      excludeExtraneousValues: true,
    });
  }
}
