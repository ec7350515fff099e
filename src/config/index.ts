import dotenv from 'dotenv';
import type { EmailConfig } from '../types/email.js';
import { ConfigError } from '../utils/errors.js';

dotenv.config();

export type LogLevel = 'minimal' | 'info' | 'debug';

export interface StorageConfig {
  dbPath: string;
}

export interface NotificationConfig {
  webhookUrl?: string;
  timeoutMs: number;
  notifySummary: boolean;
}

export interface ProcessingConfig {
  // 0 means every unread message is handled each run
  maxEmailsPerRun: number;
  logLevel: LogLevel;
}

export interface AppConfig {
  email: EmailConfig;
  storage: StorageConfig;
  notification: NotificationConfig;
  processing: ProcessingConfig;
}

type Env = Record<string, string | undefined>;

function parseInteger(env: Env, name: string, fallback: number, allowZero = false): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const parsed = Number(raw.trim());
  const min = allowZero ? 0 : 1;
  if (!Number.isInteger(parsed) || parsed < min) {
    const expected = allowZero ? 'a non-negative integer' : 'a positive integer';
    throw new ConfigError(`Invalid ${name} value "${raw}". Expected ${expected}.`);
  }
  return parsed;
}

function parseLogLevel(raw?: string): LogLevel {
  const normalized = (raw || 'info').trim().toLowerCase();
  if (normalized === 'minimal' || normalized === 'info' || normalized === 'debug') {
    return normalized;
  }
  throw new ConfigError(`Invalid LOG_LEVEL value "${raw}". Use minimal, info or debug.`);
}

/**
 * Read configuration from the environment (after .env has been loaded).
 * Missing credentials are not an error here; call validateConfig before
 * connecting.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const webhookUrl = env.WECHAT_WEBHOOK_URL?.trim();

  return {
    email: {
      host: env.EMAIL_HOST?.trim() || '',
      port: parseInteger(env, 'EMAIL_PORT', 993),
      user: env.EMAIL_USER || '',
      password: env.EMAIL_PASS || '',
      tls: env.EMAIL_TLS !== 'false',
      mailbox: env.EMAIL_MAILBOX || 'INBOX',
      connTimeoutMs: parseInteger(env, 'EMAIL_CONN_TIMEOUT_MS', 10000),
      authTimeoutMs: parseInteger(env, 'EMAIL_AUTH_TIMEOUT_MS', 5000),
    },
    storage: {
      dbPath: env.DB_PATH || 'invoices.db',
    },
    notification: {
      webhookUrl: webhookUrl ? webhookUrl : undefined,
      timeoutMs: parseInteger(env, 'WEBHOOK_TIMEOUT_MS', 10000),
      notifySummary: env.WECHAT_NOTIFY_SUMMARY === 'true',
    },
    processing: {
      maxEmailsPerRun: parseInteger(env, 'MAX_EMAILS_PER_RUN', 0, true),
      logLevel: parseLogLevel(env.LOG_LEVEL),
    },
  };
}

export function validateConfig(config: AppConfig): void {
  const missing: string[] = [];
  if (!config.email.host) missing.push('EMAIL_HOST');
  if (!config.email.user) missing.push('EMAIL_USER');
  if (!config.email.password) missing.push('EMAIL_PASS');

  if (missing.length > 0) {
    throw new ConfigError(`Email credentials not configured (missing ${missing.join(', ')}). Please check .env file.`);
  }

  if (config.notification.webhookUrl) {
    try {
      new URL(config.notification.webhookUrl);
    } catch {
      throw new ConfigError(`Invalid WECHAT_WEBHOOK_URL "${config.notification.webhookUrl}".`);
    }
  }
}
