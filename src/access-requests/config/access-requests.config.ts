import { registerAs } from '@nestjs/config';
import { IsInt, IsOptional, Matches, Max, Min } from 'class-validator';
import { AccessRequestsConfig } from './access-requests-config.type';
import validateConfig from '../../utils/validate-config';

class EnvironmentVariablesValidator {
  @Matches(/^[A-Z]{2,10}$/, {
    message: 'PROTOCOL_PREFIX must be 2-10 uppercase letters',
  })
  @IsOptional()
  PROTOCOL_PREFIX?: string;

  @IsInt()
  @Min(1)
  @Max(3650)
  @IsOptional()
  ACCESS_VALIDITY_DAYS?: number;

  @IsInt()
  @Min(1)
  @Max(365)
  @IsOptional()
  RENEWAL_WINDOW_DAYS?: number;
}

export const DEFAULT_ACCESS_REQUESTS_CONFIG: AccessRequestsConfig = {
  protocolPrefix: 'SOL',
  validityDays: 180,
  renewalWindowDays: 30,
};

export default registerAs<AccessRequestsConfig>('accessRequests', () => {
  validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    protocolPrefix:
      process.env.PROTOCOL_PREFIX ||
      DEFAULT_ACCESS_REQUESTS_CONFIG.protocolPrefix,
    validityDays: process.env.ACCESS_VALIDITY_DAYS
      ? parseInt(process.env.ACCESS_VALIDITY_DAYS, 10)
      : DEFAULT_ACCESS_REQUESTS_CONFIG.validityDays,
    renewalWindowDays: process.env.RENEWAL_WINDOW_DAYS
      ? parseInt(process.env.RENEWAL_WINDOW_DAYS, 10)
      : DEFAULT_ACCESS_REQUESTS_CONFIG.renewalWindowDays,
  };
});
