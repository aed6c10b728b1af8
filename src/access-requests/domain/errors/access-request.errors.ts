import {
  BadRequestException,
  ConflictException,
  HttpStatus,
  NotFoundException,
  ServiceUnavailableException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { AccessRule } from '../enums/access-rule.enum';
import { AccessRequestStatus } from '../enums/access-request-status.enum';

/**
 * Malformed caller input (sizes, text lengths). Nothing is persisted.
 */
export class AccessRequestValidationException extends BadRequestException {
  constructor(message: string) {
    super({
      statusCode: HttpStatus.BAD_REQUEST,
      code: 'VALIDATION_FAILED',
      message,
    });
  }
}

/**
 * Hard rejection from the rule pipeline. Nothing is persisted.
 */
export class BusinessRuleException extends UnprocessableEntityException {
  readonly rule: AccessRule;

  constructor(rule: AccessRule, message: string) {
    super({
      statusCode: HttpStatus.UNPROCESSABLE_ENTITY,
      code: rule,
      message,
    });
    this.rule = rule;
  }
}

/**
 * Unknown request, or a request owned by someone else. The two cases are
 * indistinguishable to the caller.
 */
export class AccessRequestNotFoundException extends NotFoundException {
  constructor(reference: string | number) {
    super({
      statusCode: HttpStatus.NOT_FOUND,
      code: 'ACCESS_REQUEST_NOT_FOUND',
      message: `Access request ${reference} not found`,
    });
  }
}

export class InvalidRequestStateException extends ConflictException {
  readonly currentStatus: AccessRequestStatus;

  constructor(
    protocol: string,
    currentStatus: AccessRequestStatus,
    message = `Access request ${protocol} is ${currentStatus}; operation requires ${AccessRequestStatus.ACTIVE}`,
  ) {
    super({
      statusCode: HttpStatus.CONFLICT,
      code: 'INVALID_REQUEST_STATE',
      message,
    });
    this.currentStatus = currentStatus;
  }
}

export class RenewalNotEligibleException extends UnprocessableEntityException {
  constructor(message: string) {
    super({
      statusCode: HttpStatus.UNPROCESSABLE_ENTITY,
      code: 'RENEWAL_NOT_ELIGIBLE',
      message,
    });
  }
}

/**
 * More than 9999 protocols minted for one day. The counter never wraps.
 */
export class ProtocolSequenceExhaustedException extends ServiceUnavailableException {
  constructor(day: string) {
    super({
      statusCode: HttpStatus.SERVICE_UNAVAILABLE,
      code: 'PROTOCOL_SEQUENCE_EXHAUSTED',
      message: `Protocol sequence for ${day} is exhausted`,
    });
  }
}
