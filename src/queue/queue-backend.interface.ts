import {
  BatchResult,
  DeleteBatchEntry,
  QueueMessage,
  ReceiveRequest,
  SendBatchEntry,
} from '../types';

/**
 * Message-flow operations a queue backend must support. Implemented by the
 * SQS adapter and by the in-memory double, so the client never sees SDK
 * types, credentials or transport settings.
 */
export interface QueueBackend {
  /** Address of the queue this backend is bound to. */
  readonly queueUrl: string;

  sendMessage(body: string): Promise<void>;

  sendMessageBatch(entries: SendBatchEntry[]): Promise<BatchResult>;

  deleteMessage(receiptHandle: string): Promise<void>;

  deleteMessageBatch(entries: DeleteBatchEntry[]): Promise<BatchResult>;

  /**
   * Receives up to `maxMessages` messages. Resolves with an empty array when
   * nothing is available.
   */
  receiveMessages(request: ReceiveRequest): Promise<QueueMessage[]>;

  /**
   * Number of visible messages. Eventually consistent on SQS.
   */
  getApproximateSize(): Promise<number>;

  purge(): Promise<void>;
}
