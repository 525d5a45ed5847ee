import { QueueConfig, QueueError, QueueErrorCode } from './types';

/** SQS rejects visibility timeouts above 12 hours. */
export const MAX_VISIBILITY_TIMEOUT_SECONDS = 43200;

export const DEFAULT_REGION = 'us-east-1';
export const DEFAULT_VISIBILITY_TIMEOUT_SECONDS = 30;

/**
 * Checks a config and returns a frozen copy. A zero timeout is accepted by
 * SQS but would make every received message visible again immediately.
 */
export function validateQueueConfig(config: QueueConfig): Readonly<QueueConfig> {
  const timeout = config.visibilityTimeoutSeconds;
  if (!Number.isInteger(timeout) || timeout <= 0 || timeout > MAX_VISIBILITY_TIMEOUT_SECONDS) {
    throw new QueueError(
      `Visibility timeout must be an integer between 1 and ${MAX_VISIBILITY_TIMEOUT_SECONDS} seconds, got ${timeout}`,
      QueueErrorCode.INVALID_CONFIG,
      false,
      { visibilityTimeoutSeconds: timeout }
    );
  }

  if (!config.name) {
    throw new QueueError('Queue name is required', QueueErrorCode.INVALID_CONFIG, false);
  }

  return Object.freeze({
    region: config.region,
    name: config.name,
    visibilityTimeoutSeconds: timeout,
  });
}

/**
 * Loads queue configuration from environment variables.
 */
export function loadQueueConfig(env: NodeJS.ProcessEnv = process.env): Readonly<QueueConfig> {
  const required = ['SQS_QUEUE_NAME'];
  const missing = required.filter(key => !env[key]);

  if (missing.length > 0) {
    throw new QueueError(
      `Missing required environment variables: ${missing.join(', ')}`,
      QueueErrorCode.INVALID_CONFIG,
      false,
      { missing }
    );
  }

  return validateQueueConfig({
    region: env.AWS_REGION || DEFAULT_REGION,
    name: env.SQS_QUEUE_NAME || '',
    visibilityTimeoutSeconds: Number(
      env.SQS_VISIBILITY_TIMEOUT || String(DEFAULT_VISIBILITY_TIMEOUT_SECONDS)
    ),
  });
}
