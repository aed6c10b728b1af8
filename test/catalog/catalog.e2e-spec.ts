import request from 'supertest';
import { INestApplication } from '@nestjs/common';
import { createTestApp, signToken } from '../utils/test-helpers';
import { DepartmentCode } from '../../src/catalog/domain/enums/department-code.enum';

describe('Catalog Endpoints (E2E)', () => {
  let app: INestApplication;
  const token = signToken('emp-catalog', DepartmentCode.HR);

  beforeAll(async () => {
    ({ app } = await createTestApp());
  });

  afterAll(async () => {
    await app.close();
  });

  it('GET /v1/modules should list every module by name', async () => {
    const response = await request(app.getHttpServer())
      .get('/api/v1/modules')
      .auth(token, { type: 'bearer' })
      .expect(200);

    expect(response.body.map((module: { name: string }) => module.name)).toEqual([
      'Financial Approver',
      'Financial Management',
      'Financial Requester',
      'Inventory Control',
      'Legacy Time Tracking',
      'Payroll',
      'Purchasing',
      'Recruitment',
      'Reports Portal',
    ]);
    expect(response.body[4]).toEqual({
      id: 9,
      name: 'Legacy Time Tracking',
      description: null,
      active: false,
      allowedDepartments: ['HR', 'OPERATIONS'],
    });
  });

  it('GET /v1/departments should list quotas', async () => {
    const response = await request(app.getHttpServer())
      .get('/api/v1/departments')
      .auth(token, { type: 'bearer' })
      .expect(200);

    expect(response.body).toEqual([
      { code: 'FINANCE', name: 'Finance', moduleQuota: 5 },
      { code: 'HR', name: 'Human Resources', moduleQuota: 5 },
      { code: 'IT', name: 'Information Technology', moduleQuota: 10 },
      { code: 'OPERATIONS', name: 'Operations', moduleQuota: 5 },
      { code: 'OTHER', name: 'Other', moduleQuota: 5 },
    ]);
  });

  it('should require a token', async () => {
    await request(app.getHttpServer()).get('/api/v1/modules').expect(401);
  });
});
