import { NestExpressApplication } from '@nestjs/platform-express';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '../../src/app.module';
import { setupApp } from '../../src/app.setup';

const TENANT_HEADER = 'x-tenant-id';
const POLICIES = '/api/v1/policies';

describe('Policy Analysis Endpoints (E2E)', () => {
  let app: NestExpressApplication;

  const deductible = {
    name: 'deductible',
    value: '$500',
    confidence: 0.92,
    sourcePage: 3,
    citation: 'Deductible: $500',
    modelVersion: 'v1',
  };

  beforeAll(async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    app = moduleRef.createNestApplication<NestExpressApplication>();
    setupApp(app);
    await app.init();
  });

  afterAll(async () => {
    await app.close();
  });

  function createAs(tenantId: string, body: object) {
    return request(app.getHttpServer())
      .post(POLICIES)
      .set(TENANT_HEADER, tenantId)
      .send(body);
  }

  describe('GET /', () => {
    it('should return application info', async () => {
      const response = await request(app.getHttpServer()).get('/').expect(200);

      expect(response.body).toEqual({
        name: 'Policy Analysis API',
        version: '1.0.0',
      });
    });

    it('should report health without a tenant', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/health')
        .expect(200);

      expect(response.body.status).toBe('ok');
      expect(typeof response.body.policies).toBe('number');
    });
  });

  describe('POST /policies', () => {
    it('should create an analysis for the calling tenant', async () => {
      const response = await createAs('acme', {
        provider: 'Acme Insurance',
        planType: 'PPO',
        fields: [deductible],
      }).expect(201);

      const { analysis, fileUrl } = response.body;
      expect(fileUrl).toBeNull();
      expect(analysis.id).toMatch(
        /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/,
      );
      expect(analysis.tenantId).toBe('acme');
      expect(analysis.fields).toEqual([deductible]);
      expect(analysis.createdAt).toBe(analysis.updatedAt);
      expect(analysis.expiresAt).toBeNull();
    });

    it('should reject a confidence above 1', async () => {
      const response = await createAs('acme', {
        provider: 'Acme Insurance',
        planType: 'PPO',
        fields: [{ ...deductible, confidence: 1.5 }],
      }).expect(422);

      expect(response.body.errors.fields['0'].confidence).toBe(
        'confidence must not be greater than 1',
      );
    });

    it('should reject a body with neither fields nor document', async () => {
      const response = await createAs('acme', {
        provider: 'Acme Insurance',
        planType: 'PPO',
      }).expect(422);

      expect(response.body.errors.fields).toContain('fields must be an array');
    });

    it('should refuse a request without tenant header', async () => {
      await request(app.getHttpServer())
        .post(POLICIES)
        .send({ provider: 'Acme', planType: 'PPO', fields: [] })
        .expect(401);
    });

    it('should fill fields from an uploaded document', async () => {
      const response = await createAs('acme', {
        provider: 'Acme Insurance',
        planType: 'PPO',
        fileB64: Buffer.from('Sample policy document').toString('base64'),
        filename: 'test_policy.pdf',
      }).expect(201);

      expect(response.body.analysis.fields).toEqual([
        {
          name: 'example_field',
          value: 'This is a placeholder',
          confidence: 0.95,
          sourcePage: 1,
          citation: 'Sample citation',
          modelVersion: 'placeholder-v1',
        },
      ]);
      expect(response.body.fileUrl).toBeNull();
    });

    // POLICY_MAX_FILE_SIZE_MB is 1 under test (test/setup-env.ts)
    it('should accept a document of several hundred KB', async () => {
      const document = Buffer.alloc(300 * 1024, 'a');

      const response = await createAs('uploads', {
        provider: 'Acme Insurance',
        planType: 'PPO',
        fileB64: document.toString('base64'),
        filename: 'large_policy.pdf',
        retain: true,
      }).expect(201);

      const download = await request(app.getHttpServer())
        .get(response.body.fileUrl)
        .set(TENANT_HEADER, 'uploads')
        .responseType('blob')
        .expect(200);
      expect(Buffer.from(download.body).length).toBe(300 * 1024);
    });

    it('should reject a document just over the size limit with 422', async () => {
      const document = Buffer.alloc(1024 * 1024 + 1, 'a');

      const response = await createAs('uploads', {
        provider: 'Acme Insurance',
        planType: 'PPO',
        fileB64: document.toString('base64'),
      }).expect(422);

      expect(response.body).toEqual({
        status: 422,
        errors: { fileB64: 'document exceeds 1 MB' },
      });
    });
  });

  describe('tenant isolation', () => {
    let acmeId: string;

    beforeAll(async () => {
      const response = await createAs('isolation-acme', {
        provider: 'Acme Insurance',
        planType: 'PPO',
        fields: [deductible],
      }).expect(201);
      acmeId = response.body.analysis.id;

      await createAs('isolation-acme', {
        provider: 'Acme Insurance',
        planType: 'HMO',
        fields: [],
      }).expect(201);
      await createAs('isolation-globex', {
        provider: 'Globex Health',
        planType: 'PPO',
        fields: [],
      }).expect(201);
    });

    it('should hide a record from another tenant', async () => {
      const response = await request(app.getHttpServer())
        .get(`${POLICIES}/${acmeId}`)
        .set(TENANT_HEADER, 'isolation-globex')
        .expect(404);

      expect(response.body.message).toBe('Policy analysis not found');
    });

    it('should return the record to its owner', async () => {
      const response = await request(app.getHttpServer())
        .get(`${POLICIES}/${acmeId}`)
        .set(TENANT_HEADER, 'isolation-acme')
        .expect(200);

      expect(response.body.analysis.id).toBe(acmeId);
    });

    it('should list only the calling tenant records', async () => {
      const response = await request(app.getHttpServer())
        .get(POLICIES)
        .set(TENANT_HEADER, 'isolation-globex')
        .expect(200);

      expect(response.body).toHaveLength(1);
      expect(response.body[0].analysis.provider).toBe('Globex Health');
    });

    it('should apply exact filters', async () => {
      const response = await request(app.getHttpServer())
        .get(POLICIES)
        .query({ planType: 'HMO' })
        .set(TENANT_HEADER, 'isolation-acme')
        .expect(200);

      expect(response.body).toHaveLength(1);
      expect(response.body[0].analysis.planType).toBe('HMO');

      const lowerCase = await request(app.getHttpServer())
        .get(POLICIES)
        .query({ provider: 'acme insurance' })
        .set(TENANT_HEADER, 'isolation-acme')
        .expect(200);

      expect(lowerCase.body).toEqual([]);
    });
  });

  describe('PUT /policies/:id', () => {
    it('should change planType and advance updatedAt', async () => {
      const created = await createAs('updates', {
        provider: 'Acme Insurance',
        planType: 'PPO',
        fields: [deductible],
      }).expect(201);
      const { id, createdAt } = created.body.analysis;

      const response = await request(app.getHttpServer())
        .put(`${POLICIES}/${id}`)
        .set(TENANT_HEADER, 'updates')
        .send({ planType: 'HMO' })
        .expect(200);

      const analysis = response.body.analysis;
      expect(analysis.planType).toBe('HMO');
      expect(analysis.provider).toBe('Acme Insurance');
      expect(analysis.fields).toEqual([deductible]);
      expect(analysis.createdAt).toBe(createdAt);
      expect(Date.parse(analysis.updatedAt)).toBeGreaterThan(
        Date.parse(createdAt),
      );
    });

    it('should not update a record of another tenant', async () => {
      const created = await createAs('updates', {
        provider: 'Acme Insurance',
        planType: 'PPO',
        fields: [],
      }).expect(201);

      await request(app.getHttpServer())
        .put(`${POLICIES}/${created.body.analysis.id}`)
        .set(TENANT_HEADER, 'intruder')
        .send({ planType: 'HMO' })
        .expect(404);
    });
  });

  describe('DELETE /policies/:id', () => {
    it('should delete once and then report not found', async () => {
      const created = await createAs('deletes', {
        provider: 'Acme Insurance',
        planType: 'PPO',
        fields: [],
      }).expect(201);
      const path = `${POLICIES}/${created.body.analysis.id}`;

      await request(app.getHttpServer())
        .delete(path)
        .set(TENANT_HEADER, 'deletes')
        .expect(204);
      await request(app.getHttpServer())
        .delete(path)
        .set(TENANT_HEADER, 'deletes')
        .expect(404);
      await request(app.getHttpServer())
        .get(path)
        .set(TENANT_HEADER, 'deletes')
        .expect(404);
    });
  });

  describe('GET /policies/:id/file', () => {
    it('should serve a retained document', async () => {
      const created = await createAs('files', {
        provider: 'Acme Insurance',
        planType: 'PPO',
        fileB64: Buffer.from('Sample policy document').toString('base64'),
        filename: 'test_policy.pdf',
        retain: true,
      }).expect(201);
      const { analysis, fileUrl } = created.body;

      expect(fileUrl).toBe(`${POLICIES}/${analysis.id}/file`);
      expect(analysis.expiresAt).not.toBeNull();

      const response = await request(app.getHttpServer())
        .get(fileUrl)
        .set(TENANT_HEADER, 'files')
        .responseType('blob')
        .expect(200);

      expect(response.headers['content-disposition']).toBe(
        'attachment; filename="test_policy.pdf"',
      );
      expect(Buffer.from(response.body).toString()).toBe(
        'Sample policy document',
      );
    });

    it('should report a record without a document as not found', async () => {
      const created = await createAs('files', {
        provider: 'Acme Insurance',
        planType: 'PPO',
        fields: [],
      }).expect(201);

      await request(app.getHttpServer())
        .get(`${POLICIES}/${created.body.analysis.id}/file`)
        .set(TENANT_HEADER, 'files')
        .expect(404);
    });
  });
});
