import dotenv from 'dotenv';
import path from 'path';

// Load .env from project root so it works regardless of process.cwd() (PM2/backup-safe)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

export interface EnvConfig {
  BOT_TOKEN: string;
  DATA_FILE: string;
  DISPLAY_TIMEZONE: string;
  TRANSPORT_TIMEOUT_MS: number;
  WIZARD_SESSION_TTL_MINUTES: number;
  LOG_LEVEL: 'debug' | 'info';
}

type EnvSource = Record<string, string | undefined>;

function getEnvVar(source: EnvSource, key: string): string {
  const value = source[key]?.trim();
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getPositiveInt(source: EnvSource, key: string, defaultValue: number): number {
  const raw = source[key]?.trim();
  if (!raw) {
    return defaultValue;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid value for ${key}: "${raw}" (expected a positive integer)`);
  }
  return parsed;
}

/**
 * Read bot configuration from the environment. Throws when BOT_TOKEN is absent;
 * the bootstrap turns that into a non-zero exit.
 */
export function loadEnv(source: EnvSource = process.env): EnvConfig {
  const dataFile = source.DATA_FILE?.trim();
  return {
    BOT_TOKEN: getEnvVar(source, 'BOT_TOKEN'),
    DATA_FILE: dataFile ? path.resolve(projectRoot, dataFile) : path.join(projectRoot, 'bot_data.json'),
    DISPLAY_TIMEZONE: source.DISPLAY_TIMEZONE?.trim() || 'UTC',
    TRANSPORT_TIMEOUT_MS: getPositiveInt(source, 'TRANSPORT_TIMEOUT_MS', 15_000),
    WIZARD_SESSION_TTL_MINUTES: getPositiveInt(source, 'WIZARD_SESSION_TTL_MINUTES', 30),
    LOG_LEVEL: source.LOG_LEVEL?.trim().toLowerCase() === 'debug' ? 'debug' : 'info',
  };
}

/**
 * Mask a bot token for logging (first and last characters only)
 */
export function maskToken(token: string): string {
  if (token.length <= 12) {
    return `${token.substring(0, 4)}...`;
  }
  return `${token.substring(0, 6)}...${token.substring(token.length - 4)}`;
}
