import type { Message } from '@aws-sdk/client-sqs';
import { QueueConfig, QueueMessage } from '../types';

export const TEST_QUEUE_URL = 'https://sqs.us-east-1.amazonaws.com/123456789012/test-queue';

export const mockQueueConfig: QueueConfig = {
  region: 'us-east-1',
  name: 'test-queue',
  visibilityTimeoutSeconds: 5,
};

export const mockSQSMessage: Message = {
  MessageId: 'msg-1',
  ReceiptHandle: 'receipt-1',
  Body: 'Test item',
  Attributes: { SentTimestamp: '1672574400000' },
  MessageAttributes: { trace: { DataType: 'String', StringValue: 'abc' } },
};

export const mockQueueMessage: QueueMessage = {
  messageId: 'msg-1',
  receiptHandle: 'receipt-1',
  body: 'Test item',
  attributes: { SentTimestamp: '1672574400000' },
  messageAttributes: { trace: { dataType: 'String', stringValue: 'abc', binaryValue: undefined } },
};

export function sqsMessages(count: number): Message[] {
  return Array.from({ length: count }, (_, i) => ({
    MessageId: `msg-${i + 1}`,
    ReceiptHandle: `receipt-${i + 1}`,
    Body: `test_message_${i + 1}`,
  }));
}

/**
 * Returns an ID generator yielding id-1, id-2, ...
 */
export function sequentialIds(prefix = 'id'): () => string {
  let next = 0;
  return () => `${prefix}-${++next}`;
}

/**
 * Runs a synchronous function and returns what it threw.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
