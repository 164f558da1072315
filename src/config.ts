/**
 * Application Configuration
 *
 * Centralizes all environment variable access. Unlike a throw-on-first-miss
 * loader, every key is checked and all problems are reported together in one
 * ConfigurationError so the operator can fix the .env file in a single pass.
 *
 * Environment variables:
 * - PLUGGY_CLIENT_ID / PLUGGY_CLIENT_SECRET: Required Pluggy API credentials
 * - PLUGGY_BASE_URL: Pluggy API base URL (defaults to production)
 * - DB_HOST / DB_USER / DB_PASSWORD / DB_NAME: Required PostgreSQL settings
 * - DB_PORT: PostgreSQL port (default 5432)
 * - DB_SSLMODE: disable | require | verify-ca | verify-full (default require)
 * - PORT: HTTP server port (default 8080)
 * - APP_ENV: development | production (default development)
 * - SESSION_SECRET: Cookie signing secret (random per process when unset)
 */

import 'dotenv/config';
import { randomBytes } from 'node:crypto';

export type AppEnv = 'development' | 'production';

export const SSL_MODES = ['disable', 'require', 'verify-ca', 'verify-full'] as const;
export type SslMode = (typeof SSL_MODES)[number];

/** Minimum length accepted for Pluggy client id / secret (both are UUIDs) */
const MIN_CREDENTIAL_LENGTH = 10;

export interface PluggyConfig {
  clientId: string;
  clientSecret: string;
  baseUrl: string;
  timeoutMs: number;
}

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  name: string;
  sslMode: SslMode;
}

export interface AppConfig {
  appEnv: AppEnv;
  isDev: boolean;
  pluggy: PluggyConfig;
  database: DatabaseConfig;
  server: {
    port: number;
    sessionSecret: string;
  };
}

export interface ConfigIssue {
  key: string;
  problem: 'missing' | 'invalid';
  detail: string;
}

/**
 * Thrown by loadConfig when one or more settings are missing or invalid.
 * `issues` holds every problem found, not just the first.
 */
export class ConfigurationError extends Error {
  readonly issues: ConfigIssue[];

  constructor(issues: ConfigIssue[]) {
    super(
      `Configuration incomplete. Fix the following environment variables:\n` +
      issues.map(i => `  - ${i.key}: ${i.detail}`).join('\n') +
      `\n\nCopy .env.example to .env and fill in the required values.`
    );
    this.name = 'ConfigurationError';
    this.issues = issues;
  }

  get keys(): string[] {
    return this.issues.map(i => i.key);
  }
}

type Env = Record<string, string | undefined>;

/**
 * Build the application config from an environment map.
 *
 * @throws ConfigurationError listing every missing or invalid key
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const issues: ConfigIssue[] = [];

  const requiredEnv = (key: string): string => {
    const value = env[key]?.trim() ?? '';
    if (!value) {
      issues.push({ key, problem: 'missing', detail: 'not set' });
    }
    return value;
  };

  const optionalEnv = (key: string, fallback: string): string => {
    const value = env[key]?.trim();
    return value ? value : fallback;
  };

  const credential = (key: string): string => {
    const value = requiredEnv(key);
    if (value && value.length < MIN_CREDENTIAL_LENGTH) {
      issues.push({ key, problem: 'invalid', detail: `too short (${value.length} characters)` });
    }
    return value;
  };

  const portEnv = (key: string, fallback: number): number => {
    const raw = optionalEnv(key, String(fallback));
    const port = Number(raw);
    if (!/^\d+$/.test(raw) || port < 1 || port > 65535) {
      issues.push({ key, problem: 'invalid', detail: `"${raw}" is not a valid port` });
      return fallback;
    }
    return port;
  };

  const sslModeEnv = (key: string): SslMode => {
    const raw = optionalEnv(key, 'require');
    const mode = SSL_MODES.find(m => m === raw);
    if (!mode) {
      issues.push({ key, problem: 'invalid', detail: `expected one of ${SSL_MODES.join(', ')}, got "${raw}"` });
      return 'require';
    }
    return mode;
  };

  const appEnv: AppEnv = optionalEnv('APP_ENV', 'development') === 'production' ? 'production' : 'development';

  const config: AppConfig = {
    appEnv,
    isDev: appEnv === 'development',
    pluggy: {
      clientId: credential('PLUGGY_CLIENT_ID'),
      clientSecret: credential('PLUGGY_CLIENT_SECRET'),
      baseUrl: optionalEnv('PLUGGY_BASE_URL', 'https://api.pluggy.ai').replace(/\/+$/, ''),
      timeoutMs: 15_000,
    },
    database: {
      host: requiredEnv('DB_HOST'),
      port: portEnv('DB_PORT', 5432),
      user: requiredEnv('DB_USER'),
      password: requiredEnv('DB_PASSWORD'),
      name: requiredEnv('DB_NAME'),
      sslMode: sslModeEnv('DB_SSLMODE'),
    },
    server: {
      port: portEnv('PORT', 8080),
      sessionSecret: optionalEnv('SESSION_SECRET', '') || randomBytes(32).toString('hex'),
    },
  };

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }

  return config;
}
