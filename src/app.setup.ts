import {
  ClassSerializerInterceptor,
  INestApplication,
  ValidationPipe,
  VersioningType,
} from '@nestjs/common';
import { Reflector } from '@nestjs/core';
import validationOptions from './utils/validation-options';

/**
 * HTTP pipeline shared by the server and the in-process e2e tests:
 * global prefix, URI versioning, validation and response serialization.
 */
export function setupApp(app: INestApplication, apiPrefix: string): void {
  app.setGlobalPrefix(apiPrefix, {
    exclude: ['/'],
  });
  app.enableVersioning({
    type: VersioningType.URI,
  });
  app.useGlobalPipes(new ValidationPipe(validationOptions));
  app.useGlobalInterceptors(
    new ClassSerializerInterceptor(app.get(Reflector)),
  );
}
