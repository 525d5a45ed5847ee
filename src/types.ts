export interface QueueConfig {
  /** AWS region the queue lives in, e.g. 'us-west-2'. */
  region: string;
  /** Name of the SQS queue. */
  name: string;
  /**
   * Seconds a received message stays hidden from other receivers. Must be
   * long enough to process and delete the message. Must be greater than 0.
   */
  visibilityTimeoutSeconds: number;
}

/**
 * A message handed out by a receive call. The receipt handle is only valid
 * while the message is in flight.
 */
export interface QueueMessage {
  messageId: string;
  receiptHandle: string;
  body: string;
  /** System attributes such as SentTimestamp. */
  attributes: Record<string, string>;
  /** Attributes set by the sender. */
  messageAttributes: Record<string, QueueMessageAttribute>;
}

export interface QueueMessageAttribute {
  dataType: string;
  stringValue?: string;
  binaryValue?: Uint8Array;
}

export interface SendBatchEntry {
  id: string;
  body: string;
}

export interface DeleteBatchEntry {
  id: string;
  receiptHandle: string;
}

export interface BatchFailure {
  id: string;
  code: string;
  message?: string;
  senderFault: boolean;
}

export interface BatchResult {
  successful: string[];
  failed: BatchFailure[];
}

export interface ReceiveRequest {
  maxMessages: number;
  visibilityTimeoutSeconds: number;
  waitTimeSeconds: number;
}

export type IdGenerator = () => string;

export type Logger = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>;

export enum QueueErrorCode {
  INVALID_CONFIG = 'INVALID_CONFIG',
  INVALID_BATCH_SIZE = 'INVALID_BATCH_SIZE',
  QUEUE_RESOLUTION_FAILED = 'QUEUE_RESOLUTION_FAILED',
  INVALID_RESPONSE = 'INVALID_RESPONSE',
  PARTIAL_BATCH_FAILURE = 'PARTIAL_BATCH_FAILURE',
  PURGE_TIMEOUT = 'PURGE_TIMEOUT',
  PURGE_ABORTED = 'PURGE_ABORTED',
}

export class QueueError extends Error {
  constructor(
    message: string,
    public readonly code: QueueErrorCode,
    public readonly retryable: boolean = false,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'QueueError';
  }
}

/**
 * Some entries of a receive-then-delete batch were not deleted. `messages`
 * holds everything that was received; the ones listed in `failed` stay in the
 * queue and reappear after the visibility timeout.
 */
export class PartialBatchError extends QueueError {
  constructor(
    message: string,
    public readonly messages: QueueMessage[],
    public readonly failed: BatchFailure[]
  ) {
    super(message, QueueErrorCode.PARTIAL_BATCH_FAILURE, false, { messages, failed });
    this.name = 'PartialBatchError';
  }
}
