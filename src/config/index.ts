import dotenv from 'dotenv';
import { ConfigError } from '../utils/errors';

dotenv.config();

export interface DatabaseConfig {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  max: number;
  connectionTimeoutMillis?: number;
}

export interface TlsConfig {
  certFile: string;
  keyFile: string;
}

export interface AppConfig {
  nodeEnv: string;
  port: number;
  database: DatabaseConfig;
  tls: TlsConfig | null;
  bodyLimit: string;
  enforceFieldLimits: boolean;
  logLevel: string;
}

type Env = Record<string, string | undefined>;

const REQUIRED = ['DB_HOST', 'DB_PORT', 'DB_USERNAME', 'DB_PASSWORD', 'DB_NAME'] as const;

function parseInteger(
  env: Env,
  key: string,
  fallback: number | undefined,
  problems: string[]
): number | undefined {
  const raw = env[key];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0) {
    problems.push(`${key} must be a non-negative integer (got "${raw}")`);
    return fallback;
  }
  return value;
}

function parseBoolean(env: Env, key: string, fallback: boolean, problems: string[]): boolean {
  const raw = env[key];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  switch (raw.toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      problems.push(`${key} must be true or false (got "${raw}")`);
      return fallback;
  }
}

/**
 * Build the typed configuration from environment variables.
 * Throws a ConfigError listing every problem found.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const problems: string[] = [];

  const missing = REQUIRED.filter((key) => !env[key]);
  if (missing.length > 0) {
    problems.push(`missing required environment variables: ${missing.join(', ')}`);
  }

  const port = parseInteger(env, 'LISTEN_PORT', 3000, problems) ?? 3000;
  if (port > 65535) {
    problems.push(`LISTEN_PORT must be at most 65535 (got ${port})`);
  }

  const certFile = env.CERT_FILE || '';
  const keyFile = env.KEY_FILE || '';
  if (Boolean(certFile) !== Boolean(keyFile)) {
    problems.push('CERT_FILE and KEY_FILE must be set together');
  }

  const database: DatabaseConfig = {
    host: env.DB_HOST || '',
    port: parseInteger(env, 'DB_PORT', 5432, problems) ?? 5432,
    user: env.DB_USERNAME || '',
    password: env.DB_PASSWORD || '',
    database: env.DB_NAME || '',
    max: parseInteger(env, 'DB_POOL_MAX', 10, problems) ?? 10,
    connectionTimeoutMillis: parseInteger(env, 'DB_CONNECTION_TIMEOUT_MS', undefined, problems),
  };

  const enforceFieldLimits = parseBoolean(env, 'ENFORCE_FIELD_LIMITS', true, problems);

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return {
    nodeEnv: env.NODE_ENV || 'development',
    port,
    database,
    tls: certFile && keyFile ? { certFile, keyFile } : null,
    bodyLimit: env.BODY_LIMIT || '100kb',
    enforceFieldLimits,
    logLevel: env.LOG_LEVEL || 'info',
  };
}

export default loadConfig;
