import path from 'path';

export type CompareMode = 'substring' | 'sequence';

export interface ProbeConfig {
  targetFunction: string;   // 被插桩的函数
  logMacro: string;
  logTag: string;
  harnessDir: string;       // 构建脚本所在目录，也是脚本的工作目录
  buildScript: string;
  sketchFileName: string;
  rawOutputFile: string;
  buildLogFile: string;
  timeoutMs: number;
  compareMode: CompareMode;
}

export const DEFAULT_CONFIG: ProbeConfig = {
  targetFunction: 'digitalWrite',
  logMacro: 'ESP_LOGI',
  logTag: 'TAG',
  harnessDir: path.resolve('harness'),
  buildScript: 'ino_to_running.sh',
  sketchFileName: 'submission.ino',
  rawOutputFile: 'output.txt',
  buildLogFile: 'build.log',
  timeoutMs: 20000,
  compareMode: 'substring'
};

/**
 * 解析超时时间（秒），非法值抛出错误
 */
export function parseTimeoutSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds <= 0) {
    throw new Error(`Invalid timeout: ${value}. Expected a positive number of seconds`);
  }
  return Math.round(seconds * 1000);
}

export function parseCompareMode(value: string): CompareMode {
  if (value === 'substring' || value === 'sequence') {
    return value;
  }
  throw new Error(`Invalid compare mode: ${value}. Expected substring or sequence`);
}

// 未提供的命令行参数是 undefined，不能覆盖前面的值
function withoutUndefined<T extends object>(value: Partial<T>): Partial<T> {
  const result: Partial<T> = {};
  for (const key in value) {
    if (value[key] !== undefined) {
      result[key] = value[key];
    }
  }
  return result;
}

/**
 * 配置优先级：命令行参数 > 环境变量 > 默认值
 */
export function loadConfig(
  overrides: Partial<ProbeConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): ProbeConfig {
  const fromEnv: Partial<ProbeConfig> = {};

  if (env['PROBE_LOG_MACRO']) {
    fromEnv.logMacro = env['PROBE_LOG_MACRO'];
  }
  if (env['PROBE_LOG_TAG']) {
    fromEnv.logTag = env['PROBE_LOG_TAG'];
  }
  if (env['PROBE_HARNESS_DIR']) {
    fromEnv.harnessDir = path.resolve(env['PROBE_HARNESS_DIR']);
  }
  if (env['PROBE_BUILD_SCRIPT']) {
    fromEnv.buildScript = env['PROBE_BUILD_SCRIPT'];
  }
  if (env['PROBE_TIMEOUT']) {
    fromEnv.timeoutMs = parseTimeoutSeconds(env['PROBE_TIMEOUT']);
  }
  if (env['PROBE_COMPARE_MODE']) {
    fromEnv.compareMode = parseCompareMode(env['PROBE_COMPARE_MODE']);
  }

  return { ...DEFAULT_CONFIG, ...fromEnv, ...withoutUndefined(overrides) };
}
