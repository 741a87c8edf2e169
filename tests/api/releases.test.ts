import express from 'express';
import { promises as fs } from 'fs';
import { ReleasePipeline } from '../../src/engine/pipeline';
import { createApp } from '../../src/server';
import { createMemoryStore } from '../../src/storage/memory-store';
import { Store } from '../../src/storage/store';
import { FakeToolchain, FakeToolchainOptions, makeTempDir } from '../helpers/fake-toolchain';

async function request(app: express.Application, method: string, path: string, body?: string | object) {
  return new Promise<{ status: number; body: unknown }>((resolve) => {
    const server = app.listen(0, () => {
      const address = server.address();
      const port = typeof address === 'object' && address !== null ? address.port : 0;
      const url = `http://127.0.0.1:${port}${path}`;
      const options: RequestInit = {
        method,
        headers: { 'Content-Type': 'application/json' },
      };
      if (body !== undefined) options.body = typeof body === 'string' ? body : JSON.stringify(body);

      fetch(url, options)
        .then(async (res) => {
          const json: unknown = await res.json();
          server.close();
          resolve({ status: res.status, body: json });
        })
        .catch((err: unknown) => {
          server.close();
          resolve({ status: 500, body: { error: String(err) } });
        });
    });
  });
}

describe('Release API', () => {
  let workRoot: string;
  let store: Store;

  beforeEach(async () => {
    workRoot = await makeTempDir();
    store = createMemoryStore();
  });

  afterEach(async () => {
    await fs.rm(workRoot, { recursive: true, force: true });
  });

  function appWith(options: FakeToolchainOptions = {}): express.Application {
    const pipeline = new ReleasePipeline({
      matrix: {
        axes: { channels: ['play', 'direct'], cryptoModes: ['standard'] },
        variants: { 'direct-standard': { required: false } },
      },
      toolchain: new FakeToolchain(options),
      store,
      workRoot,
      scheduler: { maxConcurrency: 2, jobTimeoutMs: 5000, killGraceMs: 20 },
    });
    return createApp({ pipeline, store });
  }

  it('GET /health reports status', async () => {
    const res = await request(appWith(), 'GET', '/health');
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ status: 'ok', version: '0.1.0' });
  });

  it('POST /releases publishes and GET returns the manifest', async () => {
    const app = appWith();

    const created = await request(app, 'POST', '/api/v1/releases', { version: '1.0.0' });
    expect(created.status).toBe(201);
    expect(created.body).toMatchObject({ report: { version: '1.0.0', publication: { kind: 'published' } } });

    const list = await request(app, 'GET', '/api/v1/releases');
    expect(list.body).toEqual({ versions: ['1.0.0'] });

    const fetched = await request(app, 'GET', '/api/v1/releases/1.0.0');
    expect(fetched.status).toBe(200);
    expect(fetched.body).toMatchObject({ manifest: { version: '1.0.0', status: 'complete', variants: ['direct-standard', 'play-standard'] } });

    const verified = await request(app, 'GET', '/api/v1/releases/1.0.0/verify');
    expect(verified.body).toMatchObject({ verification: { found: true, ok: true } });
  });

  it('answers 200 when identical content is already published', async () => {
    const app = appWith();
    await request(app, 'POST', '/api/v1/releases', { version: '1.0.0' });
    const again = await request(app, 'POST', '/api/v1/releases', { version: '1.0.0' });
    expect(again.status).toBe(200);
    expect(again.body).toMatchObject({ report: { publication: { kind: 'unchanged' } } });
  });

  it('answers 409 for a version conflict', async () => {
    await request(appWith(), 'POST', '/api/v1/releases', { version: '1.0.0' });
    const res = await request(appWith({ identity: 'sdk@2', content: (v) => `new ${v}` }), 'POST', '/api/v1/releases', { version: '1.0.0' });
    expect(res.status).toBe(409);
    expect(res.body).toMatchObject({ error: { code: 'RELEASE.VERSION_CONFLICT' } });
  });

  it('answers 422 when a required variant blocks the release', async () => {
    const res = await request(appWith({ behaviors: { 'play-standard': 'fail' } }), 'POST', '/api/v1/releases', { version: '1.0.0' });
    expect(res.status).toBe(422);
    expect(res.body).toMatchObject({
      error: { code: 'RELEASE.BLOCKED', details: { blockedBy: ['play-standard'] } },
      report: { blockedBy: ['play-standard'] },
    });
  });

  it('rejects a body without a version', async () => {
    const res = await request(appWith(), 'POST', '/api/v1/releases', { selector: 'play-*' });
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error: { code: 'VALIDATION.INVALID_BODY' } });
  });

  it('rejects malformed JSON', async () => {
    const res = await request(appWith(), 'POST', '/api/v1/releases', '{"version":');
    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({ error: { code: 'VALIDATION.MALFORMED_BODY' } });
  });

  it('maps a selector that matches nothing to 422', async () => {
    const res = await request(appWith(), 'POST', '/api/v1/releases', { version: '1.0.0', selector: 'beta-*' });
    expect(res.status).toBe(422);
    expect(res.body).toMatchObject({ error: { code: 'MATRIX.EMPTY_SELECTION' } });
  });

  it('maps a selector that leaves out a required variant to 422 without publishing', async () => {
    const app = appWith();
    const res = await request(app, 'POST', '/api/v1/releases', { version: '1.0.0', selector: 'direct-*' });
    expect(res.status).toBe(422);
    expect(res.body).toMatchObject({ error: { code: 'MATRIX.REQUIRED_NOT_SELECTED', details: { unselected: ['play-standard'] } } });
    expect((await request(app, 'GET', '/api/v1/releases')).body).toEqual({ versions: [] });
  });

  it('publishes a selection that leaves out only optional variants as partial', async () => {
    const res = await request(appWith(), 'POST', '/api/v1/releases', { version: '1.0.0', selector: 'play-*' });
    expect(res.status).toBe(201);
    expect(res.body).toMatchObject({
      report: {
        manifest: {
          status: 'partial',
          variants: ['direct-standard', 'play-standard'],
          omitted: [{ variant: 'direct-standard', status: 'not_selected', reason: 'RELEASE.NOT_SELECTED' }],
        },
      },
    });
  });

  it('answers 400 for an encoded path in the version', async () => {
    const app = appWith();
    const manifest = await request(app, 'GET', '/api/v1/releases/..%2Fx');
    expect(manifest.status).toBe(400);
    expect(manifest.body).toMatchObject({ error: { code: 'RELEASE.INVALID_VERSION' } });
    const verify = await request(app, 'GET', '/api/v1/releases/..%2Fx/verify');
    expect(verify.status).toBe(400);
    expect(verify.body).toMatchObject({ error: { code: 'RELEASE.INVALID_VERSION' } });
  });

  it('answers 404 for unknown releases', async () => {
    const app = appWith();
    expect((await request(app, 'GET', '/api/v1/releases/9.9.9')).status).toBe(404);
    const res = await request(app, 'GET', '/api/v1/releases/9.9.9/verify');
    expect(res.status).toBe(404);
    expect(res.body).toMatchObject({ error: { code: 'RELEASE.NOT_FOUND' } });
  });
});
