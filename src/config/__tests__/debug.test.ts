import { describe, it, expect, beforeEach, afterAll } from '@jest/globals';
import { loadDebugConfig, LogLevel } from '../debug.js';

describe('loadDebugConfig', () => {
  // Capture original env at module load to avoid mutation issues
  const ORIGINAL_ENV = { ...process.env };

  beforeEach(() => {
    process.env = { ...ORIGINAL_ENV };
    for (const key of Object.keys(process.env)) {
      if (key.startsWith('QUERY_TOOLKIT_')) {
        delete process.env[key];
      }
    }
  });

  afterAll(() => {
    process.env = ORIGINAL_ENV;
  });

  it('should default to debug disabled when env is not set', () => {
    const config = loadDebugConfig();

    expect(config).toEqual({
      enabled: false,
      logParse: false,
      logRewrite: false,
      logBuild: false,
      logDsl: false,
      logServer: false,
      logLevel: LogLevel.INFO,
      logFormat: 'pretty',
      enableRequestTiming: true,
    });
  });

  it('should enable debug with all categories defaulting to true', () => {
    process.env.QUERY_TOOLKIT_DEBUG_MODE = 'true';

    const config = loadDebugConfig();

    expect(config.enabled).toBe(true);
    expect(config.logParse).toBe(true);
    expect(config.logRewrite).toBe(true);
    expect(config.logBuild).toBe(true);
    expect(config.logDsl).toBe(true);
    expect(config.logServer).toBe(true);
  });

  it('should allow explicit false categories when debug is enabled', () => {
    process.env.QUERY_TOOLKIT_DEBUG_MODE = 'TRUE';
    process.env.QUERY_TOOLKIT_DEBUG_DSL = 'false';
    process.env.QUERY_TOOLKIT_DEBUG_PARSE = 'no';

    const config = loadDebugConfig();

    expect(config.logDsl).toBe(false);
    expect(config.logParse).toBe(false);
    expect(config.logRewrite).toBe(true);
  });

  it('should ignore category flags when debug is disabled', () => {
    process.env.QUERY_TOOLKIT_DEBUG_PARSE = 'true';

    expect(loadDebugConfig().logParse).toBe(false);
  });

  it('should read level, format and timing independently of debug mode', () => {
    const config = loadDebugConfig({
      QUERY_TOOLKIT_LOG_LEVEL: ' WARN ',
      QUERY_TOOLKIT_LOG_FORMAT: 'json',
      QUERY_TOOLKIT_ENABLE_REQUEST_TIMING: 'false',
    });

    expect(config.logLevel).toBe(LogLevel.WARN);
    expect(config.logFormat).toBe('json');
    expect(config.enableRequestTiming).toBe(false);
  });

  it('should fall back to defaults for unknown level and format values', () => {
    const config = loadDebugConfig({
      QUERY_TOOLKIT_LOG_LEVEL: 'verbose',
      QUERY_TOOLKIT_LOG_FORMAT: 'xml',
    });

    expect(config.logLevel).toBe(LogLevel.INFO);
    expect(config.logFormat).toBe('pretty');
  });
});
