import request from 'supertest';
import { INestApplication } from '@nestjs/common';
import { createTestApp, signToken } from '../utils/test-helpers';
import { DepartmentCode } from '../../src/catalog/domain/enums/department-code.enum';

describe('Access Request Rate Limiting (E2E)', () => {
  let app: INestApplication;
  const token = signToken('emp-throttled', DepartmentCode.FINANCE);

  beforeAll(async () => {
    ({ app } = await createTestApp({ throttle: true }));
  });

  afterAll(async () => {
    await app.close();
  });

  it('should allow 10 submissions per minute and refuse the 11th', async () => {
    for (let attempt = 0; attempt < 10; attempt++) {
      await request(app.getHttpServer())
        .post('/api/v1/access-requests')
        .auth(token, { type: 'bearer' })
        .send({})
        .expect(400);
    }

    await request(app.getHttpServer())
      .post('/api/v1/access-requests')
      .auth(token, { type: 'bearer' })
      .send({})
      .expect(429);
  });

  it('should not count submissions against the listing limit', async () => {
    await request(app.getHttpServer())
      .get('/api/v1/access-requests')
      .auth(token, { type: 'bearer' })
      .expect(200);
  });
});
