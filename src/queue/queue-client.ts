import { ISQSClient } from '../aws/sqs-client.interface';
import { SQSClientFactory } from '../aws/sqs-client.factory';
import { validateQueueConfig } from '../config';
import {
  BatchResult,
  IdGenerator,
  Logger,
  PartialBatchError,
  QueueConfig,
  QueueMessage,
} from '../types';
import { assertBatchSize, buildDeleteEntries, buildSendEntries, MAX_BATCH_SIZE } from './batch-entries';
import { InMemoryQueueBackend } from './in-memory-queue-backend';
import { waitForEmpty, WaitForEmptyOptions } from './purge-poller';
import { QueueBackend } from './queue-backend.interface';
import { QueueManager } from './queue-manager';
import { defaultIdGenerator } from './random-id';
import { SQSQueueBackend } from './sqs-queue-backend';

/** Longest long-poll SQS allows on a receive. */
export const DEFAULT_WAIT_TIME_SECONDS = 20;

export interface QueueClientOptions {
  /** Generates the per-entry IDs of insert batches. */
  idGenerator?: IdGenerator;
  logger?: Logger;
  /** Long-poll wait for receives, 0-20 seconds. */
  waitTimeSeconds?: number;
}

export interface ConnectOptions extends QueueClientOptions {
  /** Use this client instead of creating one for the configured region. */
  sqsClient?: ISQSClient;
  /** Create the queue before resolving it. */
  createIfMissing?: boolean;
}

export type ClearOptions = Omit<WaitForEmptyOptions, 'logger'>;

/**
 * Unordered, at-least-once queue.
 *
 * Received messages stay in the queue, hidden for the configured visibility
 * timeout, until they are deleted with their receipt handle. A message that is
 * not deleted in time becomes visible again and can be received by anyone.
 */
export class QueueClient {
  private readonly config: Readonly<QueueConfig>;
  private readonly backend: QueueBackend;
  private readonly url: string;
  private readonly generateId: IdGenerator;
  private readonly logger: Logger;
  private readonly waitTimeSeconds: number;

  constructor(config: QueueConfig, backend: QueueBackend, options: QueueClientOptions = {}) {
    this.config = validateQueueConfig(config);
    this.backend = backend;
    this.url = backend.queueUrl;
    this.generateId = options.idGenerator ?? defaultIdGenerator;
    this.logger = options.logger ?? console;
    this.waitTimeSeconds = options.waitTimeSeconds ?? DEFAULT_WAIT_TIME_SECONDS;
  }

  /**
   * Creates a client bound to SQS. The queue URL is resolved once here and
   * reused for every call.
   */
  static async connect(config: QueueConfig, options: ConnectOptions = {}): Promise<QueueClient> {
    const validated = validateQueueConfig(config);
    const logger = options.logger ?? console;
    const sqsClient = options.sqsClient || new SQSClientFactory().createClient(validated.region);
    const manager = new QueueManager(sqsClient, logger);

    const queueUrl = options.createIfMissing
      ? await manager.createQueue(validated.name)
      : await manager.resolveQueueUrl(validated.name);

    return new QueueClient(validated, new SQSQueueBackend(queueUrl, sqsClient, logger), options);
  }

  /**
   * Creates a client backed by an in-process queue. See InMemoryQueueBackend
   * for how it differs from SQS.
   */
  static inMemory(config: QueueConfig, options: QueueClientOptions = {}): QueueClient {
    return new QueueClient(config, new InMemoryQueueBackend(config.name), options);
  }

  get queueUrl(): string {
    return this.url;
  }

  get queueConfig(): Readonly<QueueConfig> {
    return this.config;
  }

  async insert(body: string): Promise<void> {
    await this.backend.sendMessage(body);
  }

  /**
   * Inserts up to 10 bodies in one call. SQS accepts or rejects each entry
   * separately; rejected entries are listed in the result, not thrown.
   */
  async insertBatch(bodies: string[]): Promise<BatchResult> {
    assertBatchSize(bodies.length);
    const result = await this.backend.sendMessageBatch(buildSendEntries(bodies, this.generateId));
    this.warnOnFailures('insert', result);
    return result;
  }

  /**
   * Returns a message without deleting it, or null when the queue is empty.
   * The visibility timeout starts now.
   */
  async peek(): Promise<QueueMessage | null> {
    const messages = await this.receive(1);
    return messages[0] ?? null;
  }

  /**
   * Returns up to `max` messages without deleting them. May return fewer than
   * are in the queue.
   */
  async peekBatch(max: number = MAX_BATCH_SIZE): Promise<QueueMessage[]> {
    assertBatchSize(max);
    return this.receive(max);
  }

  /**
   * Receives and deletes one message. If the delete fails the call rejects
   * and the message reappears once its visibility timeout runs out.
   */
  async pop(): Promise<QueueMessage | null> {
    const message = await this.peek();
    if (!message) {
      return null;
    }

    await this.delete(message);
    return message;
  }

  async popBatch(max: number = MAX_BATCH_SIZE): Promise<QueueMessage[]> {
    const messages = await this.peekBatch(max);
    if (messages.length === 0) {
      return messages;
    }

    const result = await this.deleteBatch(messages);
    if (result.failed.length > 0) {
      throw new PartialBatchError(
        `Received ${messages.length} message(s) but failed to delete ${result.failed.length}`,
        messages,
        result.failed
      );
    }

    return messages;
  }

  /**
   * Deletes a received message. Must happen within the visibility timeout.
   */
  async delete(message: QueueMessage): Promise<void> {
    await this.backend.deleteMessage(message.receiptHandle);
  }

  async deleteBatch(messages: QueueMessage[]): Promise<BatchResult> {
    assertBatchSize(messages.length);
    const result = await this.backend.deleteMessageBatch(buildDeleteEntries(messages));
    this.warnOnFailures('delete', result);
    return result;
  }

  /**
   * Purges the queue and resolves once its length reads zero. SQS allows one
   * purge per queue every 60 seconds; a second call inside that window fails.
   */
  async clear(options: ClearOptions = {}): Promise<void> {
    await this.backend.purge();
    await waitForEmpty(() => this.backend.getApproximateSize(), {
      ...options,
      logger: this.logger,
    });
  }

  /**
   * Approximate number of visible messages. On SQS this can lag by up to 30
   * seconds, so never rely on it for exact counts.
   */
  async approximateLength(): Promise<number> {
    return this.backend.getApproximateSize();
  }

  private receive(maxMessages: number): Promise<QueueMessage[]> {
    return this.backend.receiveMessages({
      maxMessages,
      visibilityTimeoutSeconds: this.config.visibilityTimeoutSeconds,
      waitTimeSeconds: this.waitTimeSeconds,
    });
  }

  private warnOnFailures(operation: string, result: BatchResult): void {
    if (result.failed.length === 0) {
      return;
    }
    this.logger.warn(
      `Batch ${operation} failed for ${result.failed.length} entr${result.failed.length === 1 ? 'y' : 'ies'}:`,
      result.failed.map(failure => `${failure.id} (${failure.code})`).join(', ')
    );
  }
}
