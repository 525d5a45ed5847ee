import {
  DeleteBatchEntry,
  IdGenerator,
  QueueError,
  QueueErrorCode,
  QueueMessage,
  SendBatchEntry,
} from '../types';

export const MAX_BATCH_SIZE = 10;

export function assertBatchSize(count: number): void {
  if (!Number.isInteger(count) || count < 1 || count > MAX_BATCH_SIZE) {
    throw new QueueError(
      `Batch size must be between 1 and ${MAX_BATCH_SIZE}, got ${count}`,
      QueueErrorCode.INVALID_BATCH_SIZE,
      false,
      { count }
    );
  }
}

/**
 * Pairs each body with a freshly generated ID. The ID only correlates entries
 * within one batch call; SQS assigns its own message IDs.
 */
export function buildSendEntries(bodies: string[], generateId: IdGenerator): SendBatchEntry[] {
  return bodies.map(body => ({ id: generateId(), body }));
}

export function buildDeleteEntries(messages: QueueMessage[]): DeleteBatchEntry[] {
  return messages.map(message => ({
    id: message.messageId,
    receiptHandle: message.receiptHandle,
  }));
}
