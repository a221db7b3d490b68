import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import {
  DEFAULT_BASE_URL,
  DEFAULT_USER_AGENT,
  loadClientConfig,
} from '#backend/config/client-config.js';

describe('loadClientConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'flux-config-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function writeYaml(content: string, sub = ''): Promise<string> {
    const file = path.join(dir, sub, 'bfl_config.yaml');
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, content, 'utf-8');
    return file;
  }

  it('falls back to built-in defaults without a credential', async () => {
    const cfg = await loadClientConfig({ env: {}, configFile: path.join(dir, 'missing.yaml') });

    expect(cfg).toEqual({
      apiKey: null,
      baseUrl: DEFAULT_BASE_URL,
      userAgent: DEFAULT_USER_AGENT,
      submitPath: '/v1/{model}',
      resultPath: '/v1/get_result',
      logRoot: path.resolve(process.cwd(), 'logs'),
    });
    expect(Object.isFrozen(cfg)).toBe(true);
  });

  it('reads the bundled yaml defaults', async () => {
    const cfg = await loadClientConfig({ env: {} });
    expect(cfg.baseUrl).toBe('https://api.bfl.ml');
    expect(cfg.userAgent).toBe('flux-task-client/0.1.0');
  });

  it('uses yaml service values and strips trailing slashes', async () => {
    const configFile = await writeYaml(
      [
        'service:',
        '  base_url: https://eu.images.example.com/',
        '  user_agent: custom-agent/2.0',
        '  submit_path: /v2/generate/{model}',
        '  result_path: /v2/result',
      ].join('\n')
    );

    const cfg = await loadClientConfig({ env: {}, configFile });

    expect(cfg.baseUrl).toBe('https://eu.images.example.com');
    expect(cfg.userAgent).toBe('custom-agent/2.0');
    expect(cfg.submitPath).toBe('/v2/generate/{model}');
    expect(cfg.resultPath).toBe('/v2/result');
  });

  it('finds the yaml under BFL_CONFIG_DIR', async () => {
    await writeYaml('service:\n  base_url: https://dir.example.com\n', 'ai');
    const cfg = await loadClientConfig({ env: { BFL_CONFIG_DIR: dir } });
    expect(cfg.baseUrl).toBe('https://dir.example.com');
  });

  it('prefers explicit options over env over yaml', async () => {
    const configFile = await writeYaml('service:\n  base_url: https://yaml.example.com\n');
    const env = { BFL_API_KEY: 'env-key', BFL_BASE_URL: 'https://env.example.com', BFL_LOG_DIR: dir };

    const fromEnv = await loadClientConfig({ env, configFile });
    expect(fromEnv.apiKey).toBe('env-key');
    expect(fromEnv.baseUrl).toBe('https://env.example.com');
    expect(fromEnv.logRoot).toBe(dir);

    const explicit = await loadClientConfig({
      env,
      configFile,
      apiKey: 'test-secret',
      baseUrl: 'https://option.example.com',
    });
    expect(explicit.apiKey).toBe('test-secret');
    expect(explicit.baseUrl).toBe('https://option.example.com');
  });

  it('treats a blank key as absent', async () => {
    const cfg = await loadClientConfig({ env: { BFL_API_KEY: '  ' }, configFile: path.join(dir, 'none.yaml') });
    expect(cfg.apiKey).toBeNull();
  });

  it('reads the env file without overriding real variables', async () => {
    const envFile = path.join(dir, '.env');
    await fs.writeFile(envFile, 'BFL_API_KEY=file-key\nBFL_BASE_URL=https://file.example.com\n', 'utf-8');
    const configFile = path.join(dir, 'none.yaml');

    const fromFile = await loadClientConfig({ env: {}, envFile, configFile });
    expect(fromFile.apiKey).toBe('file-key');
    expect(fromFile.baseUrl).toBe('https://file.example.com');

    const envWins = await loadClientConfig({ env: { BFL_API_KEY: 'env-key' }, envFile, configFile });
    expect(envWins.apiKey).toBe('env-key');
    expect(envWins.baseUrl).toBe('https://file.example.com');
  });

  it('ignores a missing env file', async () => {
    const cfg = await loadClientConfig({
      env: {},
      envFile: path.join(dir, 'absent.env'),
      configFile: path.join(dir, 'none.yaml'),
    });
    expect(cfg.apiKey).toBeNull();
  });

  it('rejects an invalid yaml file', async () => {
    const configFile = await writeYaml('service:\n  submit_path: /v1/generate\n');
    await expect(loadClientConfig({ env: {}, configFile })).rejects.toThrow(/Invalid client config/);
  });
});
