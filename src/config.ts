import 'dotenv/config';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogStyle = 'text' | 'systemd';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

// Reported by the CLI once logging is configured.
export const configWarnings: string[] = [];

export function intFromEnv(key: string, fallback: number, min = 0): number {
  const raw = process.env[key];
  if (raw === undefined || raw === '') return fallback;
  const parsed = parseInt(raw, 10);
  if (Number.isNaN(parsed)) {
    configWarnings.push(`Failed to parse $${key}. Got '${raw}'. Defaulting to '${fallback}'`);
    return fallback;
  }
  if (parsed < min) {
    configWarnings.push(`$${key} must be at least ${min}. Got '${raw}'. Defaulting to '${fallback}'`);
    return fallback;
  }
  return parsed;
}

function logLevelFromEnv(): LogLevel {
  const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase();
  const level = LOG_LEVELS.find((l) => l === raw);
  if (!level) {
    configWarnings.push(`Unknown $LOG_LEVEL '${raw}'. Defaulting to 'info'`);
    return 'info';
  }
  return level;
}

function logStyleFromEnv(): LogStyle {
  return process.env.LOG_STYLE === 'SYSTEMD' ? 'systemd' : 'text';
}

export const CONFIG = Object.freeze({
  WORK_DIR: process.env.APPLIANCE_WORK_DIR ?? '',
  HOST: process.env.HOST ?? '127.0.0.1',
  PORT: intFromEnv('PORT', 3000),
  DEMO: process.env.APPLIANCE_DEMO === '1' || process.env.APPLIANCE_DEMO === 'true',
  LOG_LEVEL: logLevelFromEnv(),
  LOG_STYLE: logStyleFromEnv(),
  LOG_FILE: process.env.LOG_FILE ?? '',
  BUS_CAPACITY: intFromEnv('BUS_CAPACITY', 100, 1),
  NIXOS_CONFIG_NAME: process.env.NIXOS_CONFIG_NAME ?? 'appliancevm',
  INSTALL_DISK: process.env.INSTALL_DISK ?? '',
  DEMO_STEP_MS: intFromEnv('DEMO_STEP_MS', 1000),
});

