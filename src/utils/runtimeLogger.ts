import { appendFile, mkdir } from 'node:fs/promises';
import path from 'node:path';

export type RuntimeLogLevel = 'debug' | 'info' | 'warn' | 'error';

type RuntimeLogRecord = {
  ts: string;
  level: RuntimeLogLevel;
  component: string;
  message: string;
  data?: Record<string, unknown>;
};

type RuntimeLoggerOptions = {
  logDir: string;
  component: string;
  level?: RuntimeLogLevel;
  echoToConsole?: boolean;
  now?: () => Date;
};

const LOG_LEVEL_WEIGHT: Record<RuntimeLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const normalizeLogLevel = (value: string | undefined): RuntimeLogLevel | null => {
  if (!value) return null;
  const lowered = value.trim().toLowerCase();
  if (lowered === 'warning') return 'warn';
  if (lowered === 'critical') return 'error';
  if (lowered === 'debug' || lowered === 'info' || lowered === 'warn' || lowered === 'error') {
    return lowered;
  }
  return null;
};

export function serializeError(err: unknown): { name: string; message: string; stack?: string } | string {
  if (err instanceof Error) {
    return {
      name: err.name,
      message: err.message,
      stack: err.stack,
    };
  }

  return String(err);
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err ?? 'Unknown error');
}

// Error instances stringify to `{}`; replace them before the record is written.
const prepareData = (data: Record<string, unknown>): Record<string, unknown> =>
  Object.fromEntries(
    Object.entries(data).map(([key, value]) => [key, value instanceof Error ? serializeError(value) : value]),
  );

export type RuntimeLogger = {
  debug: (message: string, data?: Record<string, unknown>) => void;
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
  child: (name: string) => RuntimeLogger;
  /** Resolves once every record logged so far has been written. */
  flush: () => Promise<void>;
};

/**
 * Appends to `runtime.jsonl` in call order. One sink is shared by a logger
 * and all of its children.
 */
class RuntimeLogSink {
  private readonly logPath: string;
  private tail: Promise<void> = Promise.resolve();
  private dirReady = false;

  constructor(logDir: string) {
    this.logPath = path.join(logDir, 'runtime.jsonl');
  }

  enqueue(record: RuntimeLogRecord): void {
    this.tail = this.tail
      .then(() => this.append(record))
      .catch((err: unknown) => {
        console.error(`[runtime-logger-failure] ${record.component}`, serializeError(err));
      });
  }

  flush(): Promise<void> {
    return this.tail;
  }

  private async append(record: RuntimeLogRecord): Promise<void> {
    if (!this.dirReady) {
      await mkdir(path.dirname(this.logPath), { recursive: true });
      this.dirReady = true;
    }
    await appendFile(this.logPath, JSON.stringify(record) + '\n', 'utf8');
  }
}

const echo = (record: RuntimeLogRecord) => {
  const prefix = `[${record.ts}] [${record.level}] [${record.component}] ${record.message}`;
  if (record.level === 'error' || record.level === 'warn') {
    console.error(prefix, record.data ?? '');
  } else {
    console.log(prefix, record.data ?? '');
  }
};

const buildLogger = (
  sink: RuntimeLogSink,
  component: string,
  settings: { threshold: RuntimeLogLevel; echoToConsole: boolean; now: () => Date },
): RuntimeLogger => {
  const log = (level: RuntimeLogLevel, message: string, data?: Record<string, unknown>) => {
    if (LOG_LEVEL_WEIGHT[level] < LOG_LEVEL_WEIGHT[settings.threshold]) {
      return;
    }

    const record: RuntimeLogRecord = {
      ts: settings.now().toISOString(),
      level,
      component,
      message,
      ...(data ? { data: prepareData(data) } : {}),
    };

    sink.enqueue(record);
    if (settings.echoToConsole) echo(record);
  };

  return {
    debug: (message, data) => log('debug', message, data),
    info: (message, data) => log('info', message, data),
    warn: (message, data) => log('warn', message, data),
    error: (message, data) => log('error', message, data),
    child: (name) => buildLogger(sink, `${component}.${name}`, settings),
    flush: () => sink.flush(),
  };
};

export function createRuntimeLogger(options: RuntimeLoggerOptions): RuntimeLogger {
  return buildLogger(new RuntimeLogSink(options.logDir), options.component, {
    threshold: options.level ?? 'info',
    echoToConsole: options.echoToConsole ?? process.env.NODE_ENV !== 'test',
    now: options.now ?? (() => new Date()),
  });
}

/** Logger that drops every record; used where no log directory is configured. */
export function createSilentLogger(): RuntimeLogger {
  const logger: RuntimeLogger = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
    child: () => logger,
    flush: async () => undefined,
  };
  return logger;
}
