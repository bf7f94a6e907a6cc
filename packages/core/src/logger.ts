const LEVELS = { debug: 0, info: 1, warn: 2, error: 3 } as const;
type Level = keyof typeof LEVELS;

const SECRET_KEY = /password|token|secret|authorization|sessionkey/i;
const REDACTED = '[REDACTED]';

function isLevel(value: string): value is Level {
  return value in LEVELS;
}

function getThreshold(): number {
  const env = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  return isLevel(env) ? LEVELS[env] : LEVELS.info;
}

export interface Logger {
  debug(msg: string, data?: unknown): void;
  info(msg: string, data?: unknown): void;
  warn(msg: string, data?: unknown): void;
  error(msg: string, data?: unknown): void;
}

/**
 * Replace the values of secret-looking keys, at any depth, with a placeholder.
 */
export function redactSecrets(data: unknown): unknown {
  if (Array.isArray(data)) return data.map(redactSecrets);
  if (data !== null && typeof data === 'object') {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      out[key] = SECRET_KEY.test(key) ? REDACTED : redactSecrets(value);
    }
    return out;
  }
  return data;
}

/**
 * JSON-lines logger. Every level goes to stderr so command output on stdout
 * stays clean.
 */
export function createLogger(namespace: string): Logger {
  const write = (level: Level, msg: string, data?: unknown) => {
    if (LEVELS[level] < getThreshold()) return;
    const entry: Record<string, unknown> = {
      ts: new Date().toISOString(),
      level,
      ns: namespace,
      msg,
    };
    if (data !== undefined) entry.data = redactSecrets(data);
    process.stderr.write(JSON.stringify(entry) + '\n');
  };

  return {
    debug: (msg, data?) => write('debug', msg, data),
    info: (msg, data?) => write('info', msg, data),
    warn: (msg, data?) => write('warn', msg, data),
    error: (msg, data?) => write('error', msg, data),
  };
}
