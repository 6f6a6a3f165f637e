/**
 * Serverless entry point smoke test
 */

import path from 'path';

describe('lambda handler', () => {
  const originalEnv = { ...process.env };

  beforeAll(() => {
    process.env.DATABASE_URL = ':memory:';
    process.env.GENE_DATA_FILE = path.join(__dirname, '..', 'fixtures', 'genes.csv');
  });

  afterAll(() => {
    process.env = originalEnv;
  });

  it('seeds an in-memory store and answers a lookup', async () => {
    const { handler } = await import('../../lambda');

    const response = await handler({ httpMethod: 'GET', path: '/genes/TESTG0000000002' });

    expect(response.statusCode).toBe(200);
    expect(JSON.parse(response.body)).toMatchObject({ gene_stable_id: 'TESTG0000000002', gene_name: 'BRCAX' });
  });
});
