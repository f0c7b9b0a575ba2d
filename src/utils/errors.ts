import type { NotificationCategory } from '../types/probe';

export class MonitorError extends Error {
  public readonly context: Record<string, unknown>;

  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'MonitorError';
    this.context = context;
  }
}

/**
 * Raised while loading the config file or the environment. The run never starts.
 */
export class ConfigurationError extends MonitorError {
  constructor(message: string, context: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, context, options);
    this.name = 'ConfigurationError';
  }
}

export class NotificationDeliveryError extends MonitorError {
  public readonly category: NotificationCategory | 'FATAL';
  public readonly recipients: string[];

  constructor(
    message: string,
    category: NotificationCategory | 'FATAL',
    recipients: string[],
    options?: { cause?: unknown }
  ) {
    super(message, { category, recipients }, options);
    this.name = 'NotificationDeliveryError';
    this.category = category;
    this.recipients = recipients;
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : 'Unknown error';
}
