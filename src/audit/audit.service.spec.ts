import { ConfigService } from '@nestjs/config';
import { AccessEventType, AuditService } from './audit.service';
import { AllConfigType } from '../config/config.type';

describe('AuditService', () => {
  let service: AuditService;
  let infoSpy: jest.SpyInstance;

  beforeEach(() => {
    const config = new ConfigService<AllConfigType>({
      app: { name: 'access-requests-test', nodeEnv: 'test' },
    });
    service = new AuditService(config);
    infoSpy = jest.spyOn(console, 'info').mockImplementation(() => undefined);
  });

  afterEach(() => {
    infoSpy.mockRestore();
  });

  it('should emit one JSON line per event', () => {
    service.logAccessEvent({
      requesterId: 'emp-1',
      event: AccessEventType.ACCESS_REQUEST_APPROVED,
      success: true,
      accessRequestId: 7,
      protocol: 'SOL-20261018-0001',
      metadata: { moduleIds: [1] },
    });

    expect(infoSpy).toHaveBeenCalledTimes(1);
    const entry = JSON.parse(String(infoSpy.mock.calls[0][0]));
    expect(entry).toMatchObject({
      service: 'access-requests-test',
      component: 'access-requests',
      requesterId: 'emp-1',
      event: 'ACCESS_REQUEST_APPROVED',
      success: true,
      accessRequestId: 7,
      protocol: 'SOL-20261018-0001',
      environment: 'test',
      metadata: { moduleIds: [1] },
    });
  });

  it('should redact tokens and emails from error messages', () => {
    service.logAccessEvent({
      requesterId: 'emp-1',
      event: AccessEventType.TOKEN_VALIDATION_FAILED,
      success: false,
      errorMessage: 'Bearer abc.def.ghi rejected for jane@example.com',
    });

    const entry = JSON.parse(String(infoSpy.mock.calls[0][0]));
    expect(entry.errorType).toBe(
      'Bearer [TOKEN_REDACTED] rejected for [EMAIL_REDACTED]',
    );
  });
});
