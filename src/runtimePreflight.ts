export interface RuntimePreflightOptions {
  allowNonProd?: boolean;
  allowMemoryInProduction?: boolean;
}

const LOG_LEVELS = new Set(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

function isBlank(value: string | undefined): boolean {
  return !value || value.trim().length === 0;
}

function isAbsolutePath(value: string): boolean {
  return value.startsWith('/') || /^[A-Za-z]:[\\/]/.test(value) || value.startsWith('\\\\');
}

export function shouldRunRuntimePreflight(env: NodeJS.ProcessEnv): boolean {
  return env.ENABLE_RUNTIME_PREFLIGHT === '1' || env.NODE_ENV === 'production';
}

export function validateRuntimeEnv(
  env: NodeJS.ProcessEnv,
  options: RuntimePreflightOptions = {}
): string[] {
  const errors: string[] = [];
  const allowNonProd = options.allowNonProd ?? false;
  const allowMemoryInProduction = options.allowMemoryInProduction ?? false;

  const nodeEnv = env.NODE_ENV?.trim();
  if (isBlank(nodeEnv)) {
    errors.push('NODE_ENV 未设置');
  } else if (nodeEnv !== 'production' && !allowNonProd) {
    errors.push(`NODE_ENV=${nodeEnv}，不是 production（可设置 ALLOW_NON_PROD=1 跳过）`);
  }

  const storageDriver = env.STORAGE_DRIVER?.trim() || 'file';
  if (storageDriver !== 'file' && storageDriver !== 'memory') {
    errors.push(`STORAGE_DRIVER=${storageDriver} 非法，应为 file 或 memory`);
  }

  if (storageDriver === 'memory' && nodeEnv === 'production' && !allowMemoryInProduction) {
    errors.push('生产环境使用 memory 存储会丢失记录（可设置 ALLOW_MEMORY_IN_PRODUCTION=1 跳过）');
  }

  for (const key of ['DATA_DIR', 'LEGACY_DATA_DIR', 'EXPORT_DIR'] as const) {
    const value = env[key]?.trim();
    if (value && !isAbsolutePath(value)) {
      errors.push(`${key}=${value} 必须是绝对路径`);
    }
  }

  const port = (env.PORT ?? '3000').trim();
  if (!/^\d+$/.test(port)) {
    errors.push(`PORT=${port} 非法，必须是数字`);
  } else {
    const value = Number(port);
    if (value < 1 || value > 65535) {
      errors.push(`PORT=${port} 超出范围，应在 1-65535`);
    }
  }

  const logLevel = env.LOG_LEVEL?.trim();
  if (logLevel && !LOG_LEVELS.has(logLevel)) {
    errors.push(`LOG_LEVEL=${logLevel} 非法，应为 ${[...LOG_LEVELS].join('/')}`);
  }

  return errors;
}

export function assertRuntimeEnv(
  env: NodeJS.ProcessEnv,
  options: RuntimePreflightOptions = {}
): void {
  const errors = validateRuntimeEnv(env, options);
  if (errors.length === 0) {
    return;
  }

  const message = ['启动前环境变量校验失败：', ...errors.map((item) => `- ${item}`)].join('\n');
  throw new Error(message);
}
