export type SuiteName = 'parser' | 'upload';

export type Target = {
  host: string;
  port: number;
};

export type RunConfig = {
  target: Target;
  // Overrides every scenario's own read timeout when set.
  timeoutMs?: number;
  pauseMs: number;
  suites: SuiteName[];
  scenarioIds: string[];
  sourceDir?: string;
};

export type RunConfigInput = {
  host?: string;
  port?: string;
  timeout?: string;
  pause?: string;
  suite?: string;
  scenario?: string[];
  source?: string;
};

export const DEFAULT_HOST = 'localhost';
export const DEFAULT_PORT = 8080;
export const DEFAULT_PAUSE_MS = 500;

const SUITES: Record<string, SuiteName[]> = {
  parser: ['parser'],
  upload: ['upload'],
  all: ['parser', 'upload'],
};

export class ConfigError extends Error {
  readonly option: string;

  constructor(option: string, message: string) {
    super(message);
    this.name = 'ConfigError';
    this.option = option;
  }
}

const parseInteger = (option: string, raw: string, min: number, max: number): number => {
  const value = Number(raw);
  if (!/^\d+$/.test(raw.trim()) || !Number.isSafeInteger(value) || value < min || value > max) {
    throw new ConfigError(option, `--${option} must be an integer between ${min} and ${max}, got "${raw}"`);
  }
  return value;
};

export const resolveRunConfig = (input: RunConfigInput): RunConfig => {
  const host = input.host?.trim() || DEFAULT_HOST;
  const port = input.port !== undefined ? parseInteger('port', input.port, 1, 65535) : DEFAULT_PORT;
  const timeoutMs = input.timeout !== undefined
    ? parseInteger('timeout', input.timeout, 1, Number.MAX_SAFE_INTEGER)
    : undefined;
  const pauseMs = input.pause !== undefined
    ? parseInteger('pause', input.pause, 0, Number.MAX_SAFE_INTEGER)
    : DEFAULT_PAUSE_MS;

  const suiteKey = input.suite?.trim().toLowerCase() || 'all';
  const suites = Object.hasOwn(SUITES, suiteKey) ? SUITES[suiteKey] : undefined;
  if (!suites) {
    throw new ConfigError('suite', `--suite must be one of ${Object.keys(SUITES).join(', ')}, got "${input.suite}"`);
  }

  return {
    target: { host, port },
    timeoutMs,
    pauseMs,
    suites,
    scenarioIds: input.scenario ?? [],
    sourceDir: input.source?.trim() || undefined,
  };
};
