export { QueueClient, DEFAULT_WAIT_TIME_SECONDS } from './queue/queue-client';
export type { QueueClientOptions, ConnectOptions, ClearOptions } from './queue/queue-client';
export type { QueueBackend } from './queue/queue-backend.interface';
export { SQSQueueBackend } from './queue/sqs-queue-backend';
export { InMemoryQueueBackend } from './queue/in-memory-queue-backend';
export { QueueManager, queueNameFromUrl } from './queue/queue-manager';
export { waitForEmpty, DEFAULT_PURGE_POLL_INTERVAL_MS } from './queue/purge-poller';
export type { WaitForEmptyOptions } from './queue/purge-poller';
export { assertBatchSize, buildSendEntries, buildDeleteEntries, MAX_BATCH_SIZE } from './queue/batch-entries';
export { randomId, defaultIdGenerator, DEFAULT_ID_LENGTH } from './queue/random-id';
export type { ISQSClient, SQSOperation } from './aws/sqs-client.interface';
export { SQSClientWrapper } from './aws/sqs-client.wrapper';
export { SQSClientFactory } from './aws/sqs-client.factory';
export {
  loadQueueConfig,
  validateQueueConfig,
  MAX_VISIBILITY_TIMEOUT_SECONDS,
  DEFAULT_REGION,
  DEFAULT_VISIBILITY_TIMEOUT_SECONDS,
} from './config';
export { QueueError, QueueErrorCode, PartialBatchError } from './types';
export type {
  QueueConfig,
  QueueMessage,
  QueueMessageAttribute,
  SendBatchEntry,
  DeleteBatchEntry,
  BatchFailure,
  BatchResult,
  ReceiveRequest,
  IdGenerator,
  Logger,
} from './types';
