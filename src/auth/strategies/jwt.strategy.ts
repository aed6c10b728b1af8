import { ExtractJwt, Strategy } from 'passport-jwt';
import { Injectable, UnauthorizedException } from '@nestjs/common';
import { PassportStrategy } from '@nestjs/passport';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../config/config.type';
import { AccessEventType, AuditService } from '../../audit/audit.service';
import { isDepartmentCode } from '../../catalog/domain/enums/department-code.enum';
import { Requester } from '../../access-requests/domain/entities/requester.entity';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Bearer JWT strategy.
 *
 * Tokens are issued by the identity provider upstream; this service only
 * verifies the signature and turns `{ sub, department }` into a `Requester`.
 */
@Injectable()
export class JwtStrategy extends PassportStrategy(Strategy, 'jwt') {
  constructor(
    private readonly auditService: AuditService,
    configService: ConfigService<AllConfigType>,
  ) {
    super({
      jwtFromRequest: ExtractJwt.fromAuthHeaderAsBearerToken(),
      secretOrKey: configService.getOrThrow('auth.secret', { infer: true }),
      algorithms: ['HS256'],
    });
  }

  public validate(payload: unknown): Requester {
    const sub = isRecord(payload) ? payload.sub : undefined;
    const department = isRecord(payload) ? payload.department : undefined;

    if (typeof sub !== 'string' || sub.length === 0) {
      throw new UnauthorizedException();
    }

    if (!isDepartmentCode(department)) {
      this.auditService.logAccessEvent({
        requesterId: sub,
        event: AccessEventType.TOKEN_VALIDATION_FAILED,
        success: false,
        errorMessage: 'Token carries no valid department claim',
      });
      throw new UnauthorizedException();
    }

    return { id: sub, department };
  }
}
