/**
 * 客户端配置：启动时解析一次，之后只读
 * 优先级：显式参数 > 环境变量 > .env 文件 > bfl_config.yaml > 内置默认值
 */
import path from 'path';
import { promises as fs } from 'fs';
import { fileURLToPath } from 'url';
import dotenv from 'dotenv';
import jsyaml from 'js-yaml';
import { z } from 'zod';

export const DEFAULT_BASE_URL = 'https://api.bfl.ml';
export const DEFAULT_USER_AGENT = 'flux-task-client/0.1.0';
export const DEFAULT_SUBMIT_PATH = '/v1/{model}';
export const DEFAULT_RESULT_PATH = '/v1/get_result';

export interface ClientConfig {
  /** 缺失时不在构造阶段报错，首次调用时抛 AuthenticationError */
  readonly apiKey: string | null;
  readonly baseUrl: string;
  readonly userAgent: string;
  /** 提交路径模板，`{model}` 为占位符 */
  readonly submitPath: string;
  readonly resultPath: string;
  readonly logRoot: string;
}

export interface LoadClientConfigOptions {
  apiKey?: string;
  baseUrl?: string;
  logRoot?: string;
  /** 默认 process.env */
  env?: NodeJS.ProcessEnv;
  /** 可选 .env 文件，不覆盖已存在的环境变量 */
  envFile?: string;
  /** 默认 <configDir>/ai/bfl_config.yaml */
  configFile?: string;
}

const serviceYamlSchema = z
  .object({
    service: z
      .object({
        base_url: z.string().url().optional(),
        user_agent: z.string().min(1).optional(),
        submit_path: z.string().includes('{model}').optional(),
        result_path: z.string().startsWith('/').optional(),
      })
      .default({}),
  })
  .passthrough();

type ServiceYaml = z.infer<typeof serviceYamlSchema>;

function getConfigDir(env: NodeJS.ProcessEnv): string {
  if (env.BFL_CONFIG_DIR) {
    return path.resolve(env.BFL_CONFIG_DIR);
  }
  return path.dirname(fileURLToPath(import.meta.url));
}

async function readOptionalFile(filePath: string): Promise<string | null> {
  try {
    return await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return null;
    throw err;
  }
}

export async function loadServiceYaml(filePath: string): Promise<ServiceYaml> {
  const content = await readOptionalFile(filePath);
  if (content === null) return { service: {} };
  const parsed = serviceYamlSchema.safeParse(jsyaml.load(content) ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid client config ${filePath}: ${detail}`);
  }
  return parsed.data;
}

/** 读取 .env，真实环境变量优先 */
async function mergeEnvFile(env: NodeJS.ProcessEnv, envFile?: string): Promise<NodeJS.ProcessEnv> {
  if (!envFile) return env;
  const content = await readOptionalFile(path.resolve(envFile));
  if (content === null) return env;
  return { ...dotenv.parse(content), ...env };
}

function pickNonEmpty(...values: Array<string | undefined>): string | undefined {
  for (const v of values) {
    const trimmed = v?.trim();
    if (trimmed) return trimmed;
  }
  return undefined;
}

export async function loadClientConfig(options: LoadClientConfigOptions = {}): Promise<ClientConfig> {
  // 调用时即取快照，之后的环境变量修改不影响本次解析
  const env = await mergeEnvFile({ ...(options.env ?? process.env) }, options.envFile);
  const configFile = options.configFile ?? path.join(getConfigDir(env), 'ai', 'bfl_config.yaml');
  const { service } = await loadServiceYaml(configFile);

  const baseUrl = pickNonEmpty(options.baseUrl, env.BFL_BASE_URL, service.base_url) ?? DEFAULT_BASE_URL;
  const config: ClientConfig = {
    apiKey: pickNonEmpty(options.apiKey, env.BFL_API_KEY) ?? null,
    baseUrl: baseUrl.replace(/\/+$/, ''),
    userAgent: service.user_agent ?? DEFAULT_USER_AGENT,
    submitPath: service.submit_path ?? DEFAULT_SUBMIT_PATH,
    resultPath: service.result_path ?? DEFAULT_RESULT_PATH,
    logRoot: path.resolve(pickNonEmpty(options.logRoot, env.BFL_LOG_DIR) ?? path.join(process.cwd(), 'logs')),
  };
  return Object.freeze(config);
}
