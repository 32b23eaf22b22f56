import { cyan, dim, green, red, yellow } from 'colorette';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

let currentLevel: LogLevel = isLogLevel(process.env.FETCHARR_LOG_LEVEL) ? process.env.FETCHARR_LOG_LEVEL : 'info';

export function setLogLevel(level: LogLevel): void {
  // env override wins so tests stay quiet regardless of config files
  if (isLogLevel(process.env.FETCHARR_LOG_LEVEL)) return;
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export interface Logger {
  debug(msg: string): void;
  info(msg: string): void;
  success(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function stamp(): string {
  return dim(new Date().toISOString().slice(11, 19));
}

export function createLogger(scope: string): Logger {
  const tag = cyan(`[${scope}]`);
  return {
    debug: (msg) => {
      if (enabled('debug')) console.log(`${stamp()} ${dim('DEBUG')} ${tag} ${dim(msg)}`);
    },
    info: (msg) => {
      if (enabled('info')) console.log(`${stamp()} INFO  ${tag} ${msg}`);
    },
    success: (msg) => {
      if (enabled('info')) console.log(`${stamp()} ${green('OK')}    ${tag} ${msg}`);
    },
    warn: (msg) => {
      if (enabled('warn')) console.warn(`${stamp()} ${yellow('WARN')}  ${tag} ${msg}`);
    },
    error: (msg) => {
      if (enabled('error')) console.error(`${stamp()} ${red('ERROR')} ${tag} ${msg}`);
    },
  };
}
