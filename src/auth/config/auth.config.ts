import { registerAs } from '@nestjs/config';
import { IsString, MinLength } from 'class-validator';
import { AuthConfig } from './auth-config.type';
import validateConfig from '../../utils/validate-config';

class EnvironmentVariablesValidator {
  @IsString()
  @MinLength(8)
  AUTH_JWT_SECRET!: string;
}

export default registerAs<AuthConfig>('auth', () => {
  const validated = validateConfig(process.env, EnvironmentVariablesValidator);

  return {
    secret: validated.AUTH_JWT_SECRET,
  };
});
