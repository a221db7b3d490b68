/**
 * 各模型的生成参数（仅类型提示，合法性由服务端校验）
 */

/** FLUX 1.1 [pro] */
export type FluxProPlusInputs = {
  prompt: string;
  /** 32 的倍数，默认 1024 */
  width?: number;
  /** 32 的倍数，默认 768 */
  height?: number;
  prompt_upsampling?: boolean;
  seed?: number;
  /** 0 最严格 ~ 6 最宽松，默认 2 */
  safety_tolerance?: number;
};

/** FLUX.1 [pro]：在 1.1 基础上增加 steps / guidance / interval */
export type FluxProInputs = FluxProPlusInputs & {
  steps?: number;
  guidance?: number;
  interval?: number;
};

/** FLUX.1 [dev]：字段同 pro，默认 steps 28、guidance 3.0 */
export type FluxDevInputs = FluxProInputs;

export type ModelInputMap = {
  'flux-pro-1.1': FluxProPlusInputs;
  'flux-pro': FluxProInputs;
  'flux-dev': FluxDevInputs;
};

export type GenerationModel = keyof ModelInputMap;

/** 开放参数表：未列出的模型按此透传 */
export type GenerationParameters = Record<string, unknown>;
