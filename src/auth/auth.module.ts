import { Module } from '@nestjs/common';
import { PassportModule } from '@nestjs/passport';
import { AuditModule } from '../audit/audit.module';
import { JwtStrategy } from './strategies/jwt.strategy';

@Module({
  imports: [PassportModule, AuditModule],
  providers: [JwtStrategy],
  exports: [PassportModule],
})
export class AuthModule {}
