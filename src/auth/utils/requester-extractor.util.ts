import { UnauthorizedException } from '@nestjs/common';
import { Request } from 'express';
import { Requester } from '../../access-requests/domain/entities/requester.entity';
import { isDepartmentCode } from '../../catalog/domain/enums/department-code.enum';

/**
 * Extract the requester placed on the request by `JwtStrategy`.
 *
 * @param req - Express request after `AuthGuard('jwt')`
 */
export function extractRequesterFromRequest(
  req: Request & { user?: unknown },
): Requester {
  const user = req.user;
  if (
    typeof user !== 'object' ||
    user === null ||
    !('id' in user) ||
    !('department' in user) ||
    typeof user.id !== 'string' ||
    !isDepartmentCode(user.department)
  ) {
    throw new UnauthorizedException('Requester identity not found on request');
  }

  return { id: user.id, department: user.department };
}
