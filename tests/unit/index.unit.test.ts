import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import {
  AuthenticationError,
  createTaskClient,
  generate,
  getResult,
  resetDefaultClient,
} from '#backend/index.js';
import { FakeGenerationService, createLoggerStub } from '../helpers/fake-generation-service.js';

describe('package entry', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'flux-entry-'));
    vi.stubEnv('BFL_LOG_DIR', dir);
    vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(async () => {
    resetDefaultClient();
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('createTaskClient wires config and deps', async () => {
    const service = new FakeGenerationService({ ids: ['abc123'] });
    const client = await createTaskClient(
      { apiKey: 'test-secret', env: {} },
      { transport: service, logger: createLoggerStub() }
    );

    const task = await client.submit('flux-pro', { prompt: 'a cat' });

    expect(task.id).toBe('abc123');
    expect(service.requests[0].url).toBe('https://api.bfl.ml/v1/flux-pro');
  });

  it('default helpers read the key from the environment', async () => {
    vi.stubEnv('BFL_API_KEY', 'test-secret');
    const fetchMock = vi
      .spyOn(globalThis, 'fetch')
      .mockResolvedValueOnce(new Response('{"id":"abc123"}', { status: 200 }))
      .mockResolvedValueOnce(
        new Response(
          '{"id":"abc123","status":"Ready","result":{"prompt":"a cat","sample":"https://cdn.example.com/abc123.jpg"}}',
          { status: 200 }
        )
      );

    const task = await generate('flux-pro', { prompt: 'a cat' });
    const done = await getResult(task.id);

    expect(task.status).toBe('Pending');
    expect(done.result).toEqual({ prompt: 'a cat', sample: 'https://cdn.example.com/abc123.jpg' });
    expect(fetchMock).toHaveBeenCalledTimes(2);
    const [, init] = fetchMock.mock.calls[0];
    expect(init?.headers).toMatchObject({ 'x-key': 'test-secret' });
  });

  it('keeps a rebuilt default client when an earlier build fails', async () => {
    const badDir = path.join(dir, 'bad-config');
    await fs.mkdir(path.join(badDir, 'ai'), { recursive: true });
    await fs.writeFile(path.join(badDir, 'ai', 'bfl_config.yaml'), 'service:\n  submit_path: /v1/generate\n', 'utf-8');
    vi.spyOn(globalThis, 'fetch').mockImplementation(
      async () => new Response('{"id":"abc123"}', { status: 200 })
    );

    vi.stubEnv('BFL_CONFIG_DIR', badDir);
    const first = generate('flux-pro', { prompt: 'a cat' });
    resetDefaultClient();
    vi.stubEnv('BFL_CONFIG_DIR', '');
    vi.stubEnv('BFL_API_KEY', 'test-secret');
    const second = generate('flux-pro', { prompt: 'a cat' });

    await expect(first).rejects.toThrow(/Invalid client config/);
    await expect(second).resolves.toMatchObject({ id: 'abc123' });

    // 已构建的默认客户端保留启动时的配置
    vi.stubEnv('BFL_API_KEY', '');
    await expect(generate('flux-pro', { prompt: 'a dog' })).resolves.toMatchObject({ id: 'abc123' });
  });

  it('default helpers fail without a key and without calling fetch', async () => {
    vi.stubEnv('BFL_API_KEY', '');
    const fetchMock = vi.spyOn(globalThis, 'fetch');

    await expect(generate('flux-pro', { prompt: 'a cat' })).rejects.toBeInstanceOf(AuthenticationError);
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
