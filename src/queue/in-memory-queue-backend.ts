import {
  BatchResult,
  DeleteBatchEntry,
  IdGenerator,
  QueueMessage,
  ReceiveRequest,
  SendBatchEntry,
} from '../types';
import { QueueBackend } from './queue-backend.interface';
import { defaultIdGenerator } from './random-id';

type BackendOperation = Exclude<keyof QueueBackend, 'queueUrl'>;

interface StoredMessage {
  messageId: string;
  body: string;
}

/**
 * In-process stand-in for SQS, for tests and local development.
 *
 * Messages are kept in insertion order. Receive hands out messages from the
 * head without hiding them, so there is no visibility timeout: the same
 * message comes back on every receive until it is deleted. Deletes always
 * remove from the head and ignore the receipt handle, which only matches SQS
 * when callers delete in the order they received. Size and purge are exact.
 */
export class InMemoryQueueBackend implements QueueBackend {
  readonly queueUrl: string;
  private messages: StoredMessage[] = [];
  private callCounts: Map<BackendOperation, number> = new Map();
  private generateId: IdGenerator;

  constructor(name: string, generateId: IdGenerator = defaultIdGenerator) {
    this.queueUrl = `memory://queue/${name}`;
    this.generateId = generateId;
  }

  async sendMessage(body: string): Promise<void> {
    this.record('sendMessage');
    this.messages.push({ messageId: this.generateId(), body });
  }

  async sendMessageBatch(entries: SendBatchEntry[]): Promise<BatchResult> {
    this.record('sendMessageBatch');
    for (const entry of entries) {
      this.messages.push({ messageId: this.generateId(), body: entry.body });
    }
    return { successful: entries.map(entry => entry.id), failed: [] };
  }

  async deleteMessage(_receiptHandle: string): Promise<void> {
    this.record('deleteMessage');
    this.messages = this.messages.slice(1);
  }

  async deleteMessageBatch(entries: DeleteBatchEntry[]): Promise<BatchResult> {
    this.record('deleteMessageBatch');
    this.messages = this.messages.slice(entries.length);
    return { successful: entries.map(entry => entry.id), failed: [] };
  }

  async receiveMessages(request: ReceiveRequest): Promise<QueueMessage[]> {
    this.record('receiveMessages');
    return this.messages.slice(0, request.maxMessages).map(message => ({
      messageId: message.messageId,
      receiptHandle: `receipt-${message.messageId}`,
      body: message.body,
      attributes: {},
      messageAttributes: {},
    }));
  }

  async getApproximateSize(): Promise<number> {
    this.record('getApproximateSize');
    return this.messages.length;
  }

  async purge(): Promise<void> {
    this.record('purge');
    this.messages = [];
  }

  /**
   * Bodies currently stored, head first.
   */
  snapshot(): string[] {
    return this.messages.map(message => message.body);
  }

  getCallCount(operation: BackendOperation): number {
    return this.callCounts.get(operation) ?? 0;
  }

  private record(operation: BackendOperation): void {
    this.callCounts.set(operation, this.getCallCount(operation) + 1);
  }
}
