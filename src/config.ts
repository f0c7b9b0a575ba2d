import dotenv from 'dotenv';
import { ConfigurationError } from './utils/errors';

// Load environment variables
dotenv.config();

export interface SmtpSettings {
  host: string;
  port: number;
  secure: boolean;
  password: string;
}

export interface EnvConfig {
  smtp: SmtpSettings;
  requestTimeoutMs: number;
}

export const DEFAULT_REQUEST_TIMEOUT_MS = 60000;

export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): EnvConfig {
  const password = env.EMAIL_APP_PASSWORD;
  if (!password) {
    throw new ConfigurationError('Missing required environment variable: EMAIL_APP_PASSWORD');
  }

  const port = parsePositiveInt(env, 'SMTP_PORT', 465);

  return {
    smtp: {
      host: env.SMTP_HOST || 'smtp.gmail.com',
      port,
      secure: env.SMTP_SECURE ? env.SMTP_SECURE === 'true' : port === 465,
      password,
    },
    requestTimeoutMs: parsePositiveInt(env, 'REQUEST_TIMEOUT_MS', DEFAULT_REQUEST_TIMEOUT_MS),
  };
}

function parsePositiveInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got "${raw}"`, { [name]: raw });
  }
  return value;
}
