import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
  Request,
  UseGuards,
} from '@nestjs/common';
import { AuthGuard } from '@nestjs/passport';
import { Throttle } from '@nestjs/throttler';
import {
  ApiBadRequestResponse,
  ApiBearerAuth,
  ApiConflictResponse,
  ApiCreatedResponse,
  ApiNoContentResponse,
  ApiNotFoundResponse,
  ApiOkResponse,
  ApiOperation,
  ApiParam,
  ApiServiceUnavailableResponse,
  ApiTags,
  ApiUnauthorizedResponse,
  ApiUnprocessableEntityResponse,
} from '@nestjs/swagger';
import { Request as ExpressRequest } from 'express';
import { AccessRequestsService } from './access-requests.service';
import { CreateAccessRequestDto } from './dto/create-access-request.dto';
import { CancelAccessRequestDto } from './dto/cancel-access-request.dto';
import { ListAccessRequestsDto } from './dto/list-access-requests.dto';
import { AccessRequestResponseDto } from './dto/access-request-response.dto';
import { AccessHistoryEntryResponseDto } from './dto/access-history-entry-response.dto';
import {
  InfinityPaginationResponse,
  InfinityPaginationResponseDto,
} from '../utils/dto/infinity-pagination-response.dto';
import { extractRequesterFromRequest } from '../auth/utils/requester-extractor.util';

/**
 * Access Requests Controller
 *
 * Every endpoint acts on behalf of the authenticated requester and only ever
 * sees that requester's own requests. Someone else's request is reported as
 * not found.
 *
 * Outcomes:
 * - Approved and denied requests are both 201 responses
 * - Hard rejections are 422 with the failing rule as `code`
 */
@ApiTags('Access Requests')
@Controller({ path: 'access-requests', version: '1' })
@UseGuards(AuthGuard('jwt'))
@ApiBearerAuth()
@ApiUnauthorizedResponse({ description: 'Invalid or expired access token' })
export class AccessRequestsController {
  constructor(private readonly accessRequestsService: AccessRequestsService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  @Throttle({ default: { limit: 10, ttl: 60000 } })
  @ApiOperation({
    summary: 'Request Module Access',
    description:
      'Submit an access request. The rule engine decides immediately: the request is stored as ACTIVE or DENIED, or rejected without being stored.',
  })
  @ApiCreatedResponse({
    description: 'Request decided (ACTIVE or DENIED)',
    type: AccessRequestResponseDto,
  })
  @ApiBadRequestResponse({ description: 'Invalid request data' })
  @ApiNotFoundResponse({ description: 'Unknown module' })
  @ApiUnprocessableEntityResponse({
    description: 'Duplicate, existing access, low-effort justification or inactive module',
  })
  @ApiServiceUnavailableResponse({
    description: 'Daily protocol sequence exhausted',
  })
  async create(
    @Request() req: ExpressRequest,
    @Body() dto: CreateAccessRequestDto,
  ): Promise<AccessRequestResponseDto> {
    const requester = extractRequesterFromRequest(req);
    return this.accessRequestsService.create(requester, dto);
  }

  @Get()
  @ApiOperation({
    summary: 'List My Access Requests',
    description: 'Most recent first, with optional filters',
  })
  @ApiOkResponse({
    description: 'Paginated list of access requests',
    type: InfinityPaginationResponse(AccessRequestResponseDto),
  })
  async list(
    @Request() req: ExpressRequest,
    @Query() query: ListAccessRequestsDto,
  ): Promise<InfinityPaginationResponseDto<AccessRequestResponseDto>> {
    const requester = extractRequesterFromRequest(req);
    return this.accessRequestsService.list(requester, query);
  }

  @Get(':idOrProtocol')
  @ApiOperation({ summary: 'Get Access Request by ID or Protocol' })
  @ApiParam({
    name: 'idOrProtocol',
    type: String,
    description: 'Numeric ID or protocol',
    example: 'SOL-20250120-0001',
  })
  @ApiOkResponse({ type: AccessRequestResponseDto })
  @ApiNotFoundResponse({ description: 'Access request not found' })
  async getRequest(
    @Request() req: ExpressRequest,
    @Param('idOrProtocol') idOrProtocol: string,
  ): Promise<AccessRequestResponseDto> {
    const requester = extractRequesterFromRequest(req);
    return this.accessRequestsService.getRequest(idOrProtocol, requester);
  }

  @Get(':id/history')
  @ApiOperation({ summary: 'Get Access Request History' })
  @ApiParam({ name: 'id', type: Number, example: 1 })
  @ApiOkResponse({ type: [AccessHistoryEntryResponseDto] })
  @ApiNotFoundResponse({ description: 'Access request not found' })
  async getHistory(
    @Request() req: ExpressRequest,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<AccessHistoryEntryResponseDto[]> {
    const requester = extractRequesterFromRequest(req);
    return this.accessRequestsService.getHistory(id, requester);
  }

  @Post(':id/renew')
  @HttpCode(HttpStatus.CREATED)
  @Throttle({ default: { limit: 10, ttl: 60000 } })
  @ApiOperation({
    summary: 'Renew Access Request',
    description:
      'Re-run the decision for the same modules. Allowed only within the renewal window before expiry.',
  })
  @ApiParam({ name: 'id', type: Number, example: 1 })
  @ApiCreatedResponse({
    description: 'Renewal decided (ACTIVE or DENIED)',
    type: AccessRequestResponseDto,
  })
  @ApiNotFoundResponse({ description: 'Access request not found' })
  @ApiConflictResponse({ description: 'Request is not ACTIVE or already renewed' })
  @ApiUnprocessableEntityResponse({
    description: 'Outside the renewal window, or a hard rejection',
  })
  async renew(
    @Request() req: ExpressRequest,
    @Param('id', ParseIntPipe) id: number,
  ): Promise<AccessRequestResponseDto> {
    const requester = extractRequesterFromRequest(req);
    return this.accessRequestsService.renew(id, requester);
  }

  @Post(':id/cancel')
  @HttpCode(HttpStatus.NO_CONTENT)
  @ApiOperation({ summary: 'Cancel Access Request' })
  @ApiParam({ name: 'id', type: Number, example: 1 })
  @ApiNoContentResponse({ description: 'Request cancelled' })
  @ApiBadRequestResponse({ description: 'Reason missing or out of range' })
  @ApiNotFoundResponse({ description: 'Access request not found' })
  @ApiConflictResponse({ description: 'Request is not ACTIVE' })
  async cancel(
    @Request() req: ExpressRequest,
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: CancelAccessRequestDto,
  ): Promise<void> {
    const requester = extractRequesterFromRequest(req);
    await this.accessRequestsService.cancel(id, requester, dto.reason);
  }
}
