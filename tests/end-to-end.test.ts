import request from 'supertest';
import { createApp } from '../src/api/server';
import { createServices, ValidatorServices } from '../src/core/services';
import { TtlCache } from '../src/core/cache';
import { getDefaultConfig } from '../src/config';
import { FakeUpstream } from './helpers/fakeUpstream';
import { createQuietLogger } from './helpers/quietLogger';

const GENE_ID = 'ENSG00000139618';

const gene = (overrides: Record<string, unknown> = {}) => ({
  id: GENE_ID,
  display_name: 'BRCA2',
  biotype: 'protein_coding',
  seq_region_name: '13',
  start: 32315474,
  end: 32400266,
  strand: 1,
  assembly_name: 'GRCh38',
  ...overrides,
});

describe('end to end', () => {
  let clock: number;
  let upstream: FakeUpstream;
  let services: ValidatorServices;

  beforeEach(() => {
    clock = 0;
    upstream = new FakeUpstream();
    services = createServices(
      { ...getDefaultConfig(), baseUrl: 'https://upstream.test', backoffMs: 0, cacheTtlMs: 30_000 },
      {
        logger: createQuietLogger(),
        fetchImpl: upstream.fetchImpl,
        cache: new TtlCache({ now: () => clock }),
      }
    );
  });

  const getAnnotation = () =>
    request(createApp(services)).get('/ensembl/gene-annotation').query({ gene_id: GENE_ID });

  it('passes a complete gene record with an extra upstream field', async () => {
    upstream.on(`/lookup/id/${GENE_ID}`, { body: gene() });

    const response = await getAnnotation();

    expect(response.status).toBe(200);
    expect(response.body.validation.passed).toBe(true);
    expect(response.body.data.columns).toContain('assembly_name');
  });

  it('reports one issue per violated rule when required columns are null', async () => {
    upstream.on(`/lookup/id/${GENE_ID}`, { body: gene({ id: null, start: 'early' }) });

    const response = await getAnnotation();

    expect(response.status).toBe(200);
    expect(response.body.validation.passed).toBe(false);
    expect(response.body.validation.issues).toHaveLength(2);
    expect(response.body.validation.issues.map((i: { rule: string }) => i.rule)).toEqual(['nullable', 'type']);
  });

  it('serves repeated requests from the cache until the TTL elapses', async () => {
    upstream.on(`/lookup/id/${GENE_ID}`, { body: gene() });

    await getAnnotation();
    clock += 29_000;
    await getAnnotation();
    expect(upstream.calls).toHaveLength(1);

    clock += 1_000;
    await getAnnotation();
    expect(upstream.calls).toHaveLength(2);
  });

  it('recovers from transient failures and then caches', async () => {
    upstream.on(`/lookup/id/${GENE_ID}`, { status: 500 }, { error: new TypeError('fetch failed') }, { body: gene() });

    const first = await getAnnotation();
    const second = await getAnnotation();

    expect(first.status).toBe(200);
    expect(second.status).toBe(200);
    expect(upstream.calls).toHaveLength(3);
    expect(services.cache.size).toBe(1);
  });

  it('does not cache failed fetches', async () => {
    upstream.on(`/lookup/id/${GENE_ID}`, { status: 404, raw: 'not found' });

    const first = await getAnnotation();
    const second = await getAnnotation();

    expect(first.status).toBe(404);
    expect(second.status).toBe(404);
    expect(upstream.calls).toHaveLength(2);
    expect(services.cache.size).toBe(0);
  });
});
