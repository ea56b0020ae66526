export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export type LogFormat = 'json' | 'pretty';

export interface DebugConfig {
  enabled: boolean;
  logParse: boolean;
  logRewrite: boolean;
  logBuild: boolean;
  logDsl: boolean;
  logServer: boolean;
  logLevel: LogLevel;
  logFormat: LogFormat;
  enableRequestTiming: boolean;
}

const toBool = (value: string | undefined, defaultValue: boolean) => {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  return value.trim().toLowerCase() === 'true';
};

const toLogLevel = (value: string | undefined, defaultValue: LogLevel): LogLevel => {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  switch (normalized) {
    case 'debug':
      return LogLevel.DEBUG;
    case 'info':
      return LogLevel.INFO;
    case 'warn':
      return LogLevel.WARN;
    case 'error':
      return LogLevel.ERROR;
    default:
      return defaultValue;
  }
};

const toLogFormat = (value: string | undefined, defaultValue: LogFormat): LogFormat => {
  if (!value) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  return normalized === 'json' ? 'json' : defaultValue;
};

export function loadDebugConfig(env: NodeJS.ProcessEnv = process.env): DebugConfig {
  const enabled = toBool(env.QUERY_TOOLKIT_DEBUG_MODE, false);

  // Level, format and timing apply whether or not debug categories are on
  const logLevel = toLogLevel(env.QUERY_TOOLKIT_LOG_LEVEL, LogLevel.INFO);
  const logFormat = toLogFormat(env.QUERY_TOOLKIT_LOG_FORMAT, 'pretty');
  const enableRequestTiming = toBool(env.QUERY_TOOLKIT_ENABLE_REQUEST_TIMING, true);

  if (!enabled) {
    return {
      enabled: false,
      logParse: false,
      logRewrite: false,
      logBuild: false,
      logDsl: false,
      logServer: false,
      logLevel,
      logFormat,
      enableRequestTiming,
    };
  }

  return {
    enabled: true,
    logParse: toBool(env.QUERY_TOOLKIT_DEBUG_PARSE, true),
    logRewrite: toBool(env.QUERY_TOOLKIT_DEBUG_REWRITE, true),
    logBuild: toBool(env.QUERY_TOOLKIT_DEBUG_BUILD, true),
    logDsl: toBool(env.QUERY_TOOLKIT_DEBUG_DSL, true),
    logServer: toBool(env.QUERY_TOOLKIT_DEBUG_SERVER, true),
    logLevel,
    logFormat,
    enableRequestTiming,
  };
}
