import pino, { type DestinationStream, type Logger, type TransportTargetOptions } from 'pino';

// Lightweight logger wrapper around pino with a console fallback.
// Configure via env:
// - LOG_LEVEL: 'debug' | 'info' | 'warn' | 'error' (default: 'info')
// - LOG_PRETTY: 'false' to write raw JSON lines instead of pino-pretty output
// - LOG_ERROR_FILE: also append error records to this file
// - USE_PINO: 'false' to force console fallback (always used under NODE_ENV=test)

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type PinoLike = {
  info: (obj: unknown, msg?: string) => void;
  warn: (obj: unknown, msg?: string) => void;
  error: (obj: unknown, msg?: string) => void;
  debug: (obj: unknown, msg?: string) => void;
  child: (bindings: Record<string, unknown>) => PinoLike;
};

const LOG_LEVELS: readonly string[] = ['debug', 'info', 'warn', 'error'] satisfies LogLevel[];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.includes(value);
}

function getLevelOrder(level: LogLevel): number {
  switch (level) {
    case 'debug': return 10;
    case 'info': return 20;
    case 'warn': return 30;
    case 'error': return 40;
    default: return 20;
  }
}

// pino wants an object as the first argument; errors go under `err` so its serializer picks them up
function toLogObject(obj: unknown): object {
  if (obj instanceof Error) return { err: obj };
  if (typeof obj === 'object' && obj !== null) return obj;
  return obj === undefined ? {} : { value: obj };
}

export function buildTargets(pretty: boolean, errorFile: string | undefined): TransportTargetOptions[] {
  // stdout target accepts everything; setLogLevel does the gating
  const targets: TransportTargetOptions[] = [
    pretty
      ? {
          target: 'pino-pretty',
          level: 'debug',
          options: { colorize: true, translateTime: 'SYS:standard', destination: 1 },
        }
      : { target: 'pino/file', level: 'debug', options: { destination: 1 } },
  ];

  if (errorFile) {
    targets.push({
      target: 'pino/file',
      level: 'error',
      options: { destination: errorFile, mkdir: true },
    });
  }

  return targets;
}

// Children are created once per module, so level gating happens here rather than on the pino instance
function wrapPino(base: Logger): PinoLike {
  return {
    info: (obj, msg) => { if (should('info')) base.info(toLogObject(obj), msg); },
    warn: (obj, msg) => { if (should('warn')) base.warn(toLogObject(obj), msg); },
    error: (obj, msg) => { if (should('error')) base.error(toLogObject(obj), msg); },
    debug: (obj, msg) => { if (should('debug')) base.debug(toLogObject(obj), msg); },
    child: (bindings) => wrapPino(base.child(bindings)),
  };
}

/**
 * pino-backed logger writing to `destination`, or to the stdout/error-file
 * transport targets when none is given. The instance itself logs everything;
 * the global level set through setLogLevel filters.
 */
export function createPinoLogger(destination?: DestinationStream): PinoLike {
  if (destination) {
    return wrapPino(pino({ level: 'debug' }, destination));
  }

  const pretty = process.env.LOG_PRETTY !== 'false';
  const errorFile = process.env.LOG_ERROR_FILE?.trim() || undefined;
  return wrapPino(pino({ level: 'debug', transport: { targets: buildTargets(pretty, errorFile) } }));
}

function createBaseLogger(): PinoLike {
  const usePino = process.env.USE_PINO !== 'false' && process.env.NODE_ENV !== 'test';
  if (!usePino) return createConsoleWrapper();

  try {
    return createPinoLogger();
  } catch (error) {
    // Transport worker could not start (missing pino-pretty, unwritable file); keep logging to the console
    console.warn('[logger] pino unavailable, falling back to console', error);
    return createConsoleWrapper();
  }
}

// Global dynamic level controlled by setLogLevel
const envLevel = process.env.LOG_LEVEL?.trim().toLowerCase();
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';
const baseLogger: PinoLike = createBaseLogger();

function should(method: LogLevel): boolean {
  return getLevelOrder(method) >= getLevelOrder(currentLevel);
}

function createConsoleWrapper(bindings: Record<string, unknown> = {}): PinoLike {
  const prefix = Object.keys(bindings).length > 0 ? `[${Object.entries(bindings).map(([k,v]) => `${k}=${String(v)}`).join(' ')}]` : '';
  return {
    info: (obj, msg) => { if (should('info')) console.log(prefix, msg || '', obj ?? ''); },
    warn: (obj, msg) => { if (should('warn')) console.warn(prefix, msg || '', obj ?? ''); },
    error: (obj, msg) => { if (should('error')) console.error(prefix, msg || '', obj ?? ''); },
    debug: (obj, msg) => { if (should('debug')) console.debug(prefix, msg || '', obj ?? ''); },
    child: (more) => createConsoleWrapper({ ...bindings, ...more }),
  };
}

export function setLogLevel(level: LogLevel): void {
  if (!isLogLevel(level)) return;
  currentLevel = level;
}

export function getLogger(bindings?: Record<string, unknown>): PinoLike {
  if (bindings && Object.keys(bindings).length > 0) {
    return baseLogger.child(bindings);
  }
  return baseLogger;
}
