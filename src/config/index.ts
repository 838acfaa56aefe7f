import { config } from 'dotenv';
import moment from 'moment-timezone';

config();

interface AppConfig {
  PORT: number;
  NODE_ENV: string;
  LOG_LEVEL: string;
  MONGODB_URI: string;
  DEVICES_CONFIG_PATH: string;
  TIMEZONE: string;
  MONITOR: {
    ENABLED: boolean;
    INTERVAL_SECONDS: number;
    MAX_CONSECUTIVE_FAILURES: number;
    EXIT_ON_UNHEALTHY: boolean;
    HEALTH_LOG_INTERVAL_SECONDS: number;
    STALE_SUCCESS_WARNING_SECONDS: number;
    SHUTDOWN_GRACE_PERIOD_MS: number;
  };
  FETCH: {
    TIMEOUT_MS: number;
    SETTLE_DELAY_MS: number;
    MAX_ATTEMPTS: number;
    RETRY_DELAY_MS: number;
    FORCE_HTTP: boolean;
    CHROMIUM_EXECUTABLE_PATH?: string;
  };
  CHANGE_DETECTION: {
    STORE_ALL_READINGS: boolean;
    STORE_EMPTY_READINGS: boolean;
    SEED_FROM_STORE: boolean;
  };
  HEALTH_MAX_AGE_SECONDS: number;
  ALLOWED_ORIGINS?: string[];
  ALERT_WEBHOOK_URL?: string;
  ENABLE_ALERT_WEBHOOK: boolean;
}

class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

function validateEnvironmentVariable(name: string, value: string | undefined, required: boolean = true): string {
  if (!value && required) {
    throw new ConfigurationError(`Required environment variable ${name} is not set`);
  }

  if (!value && !required) {
    return '';
  }

  if (value && value.trim() === '') {
    throw new ConfigurationError(`Environment variable ${name} cannot be empty`);
  }

  return value || '';
}

function validateNumericEnvironmentVariable(name: string, value: string | undefined, required: boolean = true, defaultValue?: number): number {
  const stringValue = validateEnvironmentVariable(name, value, required);

  if (!stringValue && !required && defaultValue !== undefined) {
    return defaultValue;
  }

  const numericValue = parseInt(stringValue, 10);

  if (isNaN(numericValue)) {
    throw new ConfigurationError(`Environment variable ${name} must be a valid number, got: ${stringValue}`);
  }

  if (numericValue < 0) {
    throw new ConfigurationError(`Environment variable ${name} must be a positive number, got: ${numericValue}`);
  }

  return numericValue;
}

function validateBooleanEnvironmentVariable(name: string, value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no'].includes(normalized)) {
    return false;
  }

  throw new ConfigurationError(`Environment variable ${name} must be true or false, got: ${value}`);
}

function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  try {
    const config: AppConfig = {
      PORT: validateNumericEnvironmentVariable('PORT', env.PORT, false, 3000),
      NODE_ENV: validateEnvironmentVariable('NODE_ENV', env.NODE_ENV, false) || 'development',
      LOG_LEVEL: validateEnvironmentVariable('LOG_LEVEL', env.LOG_LEVEL, false) || 'info',
      MONGODB_URI: validateEnvironmentVariable('MONGODB_URI', env.MONGODB_URI, false) || 'mongodb://localhost:27017/flowwatch',
      DEVICES_CONFIG_PATH: validateEnvironmentVariable('DEVICES_CONFIG_PATH', env.DEVICES_CONFIG_PATH, false) || 'data/devices.json',
      TIMEZONE: validateEnvironmentVariable('TIMEZONE', env.TIMEZONE, false) || 'Australia/Brisbane',
      MONITOR: {
        ENABLED: validateBooleanEnvironmentVariable('MONITOR_ENABLED', env.MONITOR_ENABLED, true),
        INTERVAL_SECONDS: validateNumericEnvironmentVariable('MONITOR_INTERVAL', env.MONITOR_INTERVAL, false, 60),
        MAX_CONSECUTIVE_FAILURES: validateNumericEnvironmentVariable('MAX_CONSECUTIVE_FAILURES', env.MAX_CONSECUTIVE_FAILURES, false, 10),
        EXIT_ON_UNHEALTHY: validateBooleanEnvironmentVariable('EXIT_ON_UNHEALTHY', env.EXIT_ON_UNHEALTHY, false),
        HEALTH_LOG_INTERVAL_SECONDS: validateNumericEnvironmentVariable('HEALTH_LOG_INTERVAL', env.HEALTH_LOG_INTERVAL, false, 300), // 5 minutes
        STALE_SUCCESS_WARNING_SECONDS: validateNumericEnvironmentVariable('STALE_SUCCESS_WARNING', env.STALE_SUCCESS_WARNING, false, 600), // 10 minutes
        SHUTDOWN_GRACE_PERIOD_MS: validateNumericEnvironmentVariable('SHUTDOWN_GRACE_PERIOD', env.SHUTDOWN_GRACE_PERIOD, false, 10000),
      },
      FETCH: {
        TIMEOUT_MS: validateNumericEnvironmentVariable('FETCH_TIMEOUT', env.FETCH_TIMEOUT, false, 15000),
        SETTLE_DELAY_MS: validateNumericEnvironmentVariable('FETCH_SETTLE_DELAY', env.FETCH_SETTLE_DELAY, false, 3000),
        MAX_ATTEMPTS: validateNumericEnvironmentVariable('FETCH_MAX_ATTEMPTS', env.FETCH_MAX_ATTEMPTS, false, 3),
        RETRY_DELAY_MS: validateNumericEnvironmentVariable('FETCH_RETRY_DELAY', env.FETCH_RETRY_DELAY, false, 5000),
        FORCE_HTTP: validateBooleanEnvironmentVariable('SCRAPER_FORCE_HTTP', env.SCRAPER_FORCE_HTTP, false),
        CHROMIUM_EXECUTABLE_PATH: validateEnvironmentVariable('CHROMIUM_EXECUTABLE_PATH', env.CHROMIUM_EXECUTABLE_PATH, false) || undefined,
      },
      CHANGE_DETECTION: {
        STORE_ALL_READINGS: validateBooleanEnvironmentVariable('STORE_ALL_READINGS', env.STORE_ALL_READINGS, false),
        STORE_EMPTY_READINGS: validateBooleanEnvironmentVariable('STORE_EMPTY_READINGS', env.STORE_EMPTY_READINGS, true),
        SEED_FROM_STORE: validateBooleanEnvironmentVariable('SEED_FROM_STORE', env.SEED_FROM_STORE, true),
      },
      HEALTH_MAX_AGE_SECONDS: validateNumericEnvironmentVariable('HEALTH_MAX_AGE', env.HEALTH_MAX_AGE, false, 900), // 15 minutes
      ALLOWED_ORIGINS: validateEnvironmentVariable('ALLOWED_ORIGINS', env.ALLOWED_ORIGINS, false)
        .split(',')
        .map(origin => origin.trim())
        .filter(Boolean),
      ALERT_WEBHOOK_URL: validateEnvironmentVariable('ALERT_WEBHOOK_URL', env.ALERT_WEBHOOK_URL, false) || undefined,
      ENABLE_ALERT_WEBHOOK: validateBooleanEnvironmentVariable('ENABLE_ALERT_WEBHOOK', env.ENABLE_ALERT_WEBHOOK, false),
    };

    // Validate specific values
    if (!['development', 'production', 'test'].includes(config.NODE_ENV)) {
      throw new ConfigurationError(`NODE_ENV must be one of: development, production, test. Got: ${config.NODE_ENV}`);
    }

    if (!['error', 'warn', 'notify', 'info', 'debug'].includes(config.LOG_LEVEL)) {
      throw new ConfigurationError(`LOG_LEVEL must be one of: error, warn, notify, info, debug. Got: ${config.LOG_LEVEL}`);
    }

    if (config.PORT < 1 || config.PORT > 65535) {
      throw new ConfigurationError(`PORT must be between 1 and 65535. Got: ${config.PORT}`);
    }

    if (!config.MONGODB_URI.startsWith('mongodb://') && !config.MONGODB_URI.startsWith('mongodb+srv://')) {
      throw new ConfigurationError(`MONGODB_URI must start with mongodb:// or mongodb+srv://. Got: ${config.MONGODB_URI}`);
    }

    if (!moment.tz.zone(config.TIMEZONE)) {
      throw new ConfigurationError(`TIMEZONE must be a known IANA time zone. Got: ${config.TIMEZONE}`);
    }

    if (config.MONITOR.INTERVAL_SECONDS < 1) {
      throw new ConfigurationError(`MONITOR_INTERVAL must be at least 1 second. Got: ${config.MONITOR.INTERVAL_SECONDS}`);
    }

    if (config.MONITOR.MAX_CONSECUTIVE_FAILURES < 1) {
      throw new ConfigurationError(`MAX_CONSECUTIVE_FAILURES must be at least 1. Got: ${config.MONITOR.MAX_CONSECUTIVE_FAILURES}`);
    }

    if (config.FETCH.MAX_ATTEMPTS < 1 || config.FETCH.MAX_ATTEMPTS > 10) {
      throw new ConfigurationError(`FETCH_MAX_ATTEMPTS must be between 1 and 10. Got: ${config.FETCH.MAX_ATTEMPTS}`);
    }

    if (config.FETCH.TIMEOUT_MS < 1000) {
      throw new ConfigurationError(`FETCH_TIMEOUT must be at least 1000 ms. Got: ${config.FETCH.TIMEOUT_MS}`);
    }

    if (config.ENABLE_ALERT_WEBHOOK && !config.ALERT_WEBHOOK_URL?.startsWith('http')) {
      throw new ConfigurationError('ALERT_WEBHOOK_URL must be a valid URL starting with http/https when ENABLE_ALERT_WEBHOOK is true');
    }

    return config;

  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw error;
    }
    throw new ConfigurationError(`Failed to load configuration: ${error instanceof Error ? error.message : String(error)}`);
  }
}

let Config: AppConfig;

try {
  Config = loadConfig();
} catch (error) {
  console.error('Configuration Error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
}

export { Config, ConfigurationError, loadConfig };
export type { AppConfig };
export default Config;
