import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../config/config.type';

export enum AccessEventType {
  ACCESS_REQUEST_APPROVED = 'ACCESS_REQUEST_APPROVED',
  ACCESS_REQUEST_DENIED = 'ACCESS_REQUEST_DENIED',
  ACCESS_REQUEST_REJECTED = 'ACCESS_REQUEST_REJECTED',
  ACCESS_REQUEST_RENEWED = 'ACCESS_REQUEST_RENEWED',
  ACCESS_REQUEST_CANCELLED = 'ACCESS_REQUEST_CANCELLED',
  PROTOCOL_SEQUENCE_EXHAUSTED = 'PROTOCOL_SEQUENCE_EXHAUSTED',
  TOKEN_VALIDATION_FAILED = 'TOKEN_VALIDATION_FAILED',
}

export interface AccessEventData {
  requesterId: string;
  event: AccessEventType;
  success: boolean;
  accessRequestId?: number;
  protocol?: string;
  errorMessage?: string;
  metadata?: Record<string, string | number | boolean | number[] | null>;
}

/**
 * Audit Service
 *
 * Emits one structured JSON line per access decision or lifecycle transition.
 * Justification and cancellation texts are free text typed by employees and
 * are never logged; the history table is the place for them.
 */
@Injectable()
export class AuditService {
  constructor(private readonly configService: ConfigService<AllConfigType>) {}

  logAccessEvent(data: AccessEventData): void {
    const logEntry = {
      timestamp: new Date().toISOString(),
      service: this.configService.get('app.name', { infer: true }),
      component: 'access-requests',
      requesterId: data.requesterId,
      event: data.event,
      success: data.success,
      accessRequestId: data.accessRequestId,
      protocol: data.protocol,
      errorType: data.errorMessage
        ? this.sanitizeErrorMessage(data.errorMessage)
        : undefined,
      environment: this.configService.get('app.nodeEnv', { infer: true }),
      ...(data.metadata ? { metadata: data.metadata } : {}),
    };

    console.info(JSON.stringify(logEntry));
  }

  /**
   * Keep error text short and strip anything that looks like a bearer token
   * or an email address.
   */
  private sanitizeErrorMessage(error: string): string {
    return error
      .replace(
        /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g,
        '[EMAIL_REDACTED]',
      )
      .replace(/Bearer\s+[^\s]+/gi, 'Bearer [TOKEN_REDACTED]')
      .substring(0, 300);
  }
}
