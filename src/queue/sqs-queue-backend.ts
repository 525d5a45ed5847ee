import type { BatchResultErrorEntry, Message, MessageAttributeValue } from '@aws-sdk/client-sqs';
import { ISQSClient } from '../aws/sqs-client.interface';
import {
  BatchFailure,
  BatchResult,
  DeleteBatchEntry,
  Logger,
  QueueError,
  QueueErrorCode,
  QueueMessage,
  QueueMessageAttribute,
  ReceiveRequest,
  SendBatchEntry,
} from '../types';
import { QueueBackend } from './queue-backend.interface';

const LENGTH_ATTRIBUTE = 'ApproximateNumberOfMessages';

/**
 * Queue backend that forwards every operation to SQS with the queue URL
 * attached. Failures are returned as-is; nothing is retried here.
 */
export class SQSQueueBackend implements QueueBackend {
  constructor(
    readonly queueUrl: string,
    private readonly sqsClient: ISQSClient,
    private readonly logger: Logger = console
  ) {}

  async sendMessage(body: string): Promise<void> {
    await this.sqsClient.sendMessage({
      QueueUrl: this.queueUrl,
      MessageBody: body,
    });
  }

  async sendMessageBatch(entries: SendBatchEntry[]): Promise<BatchResult> {
    const response = await this.sqsClient.sendMessageBatch({
      QueueUrl: this.queueUrl,
      Entries: entries.map(entry => ({ Id: entry.id, MessageBody: entry.body })),
    });

    return toBatchResult(response.Successful, response.Failed);
  }

  async deleteMessage(receiptHandle: string): Promise<void> {
    await this.sqsClient.deleteMessage({
      QueueUrl: this.queueUrl,
      ReceiptHandle: receiptHandle,
    });
  }

  async deleteMessageBatch(entries: DeleteBatchEntry[]): Promise<BatchResult> {
    const response = await this.sqsClient.deleteMessageBatch({
      QueueUrl: this.queueUrl,
      Entries: entries.map(entry => ({ Id: entry.id, ReceiptHandle: entry.receiptHandle })),
    });

    return toBatchResult(response.Successful, response.Failed);
  }

  async receiveMessages(request: ReceiveRequest): Promise<QueueMessage[]> {
    const response = await this.sqsClient.receiveMessage({
      QueueUrl: this.queueUrl,
      MaxNumberOfMessages: request.maxMessages,
      VisibilityTimeout: request.visibilityTimeoutSeconds,
      WaitTimeSeconds: request.waitTimeSeconds,
      MessageSystemAttributeNames: ['SentTimestamp'],
      MessageAttributeNames: ['All'],
    });

    const messages: QueueMessage[] = [];
    for (const message of response.Messages ?? []) {
      const converted = toQueueMessage(message);
      if (!converted) {
        this.logger.warn(`Received message without body, receipt handle or id, skipping: ${message.MessageId}`);
        continue;
      }
      messages.push(converted);
    }
    return messages;
  }

  async getApproximateSize(): Promise<number> {
    const response = await this.sqsClient.getQueueAttributes({
      QueueUrl: this.queueUrl,
      AttributeNames: [LENGTH_ATTRIBUTE],
    });

    const raw = response.Attributes?.[LENGTH_ATTRIBUTE];
    if (raw === undefined || !/^\d+$/.test(raw)) {
      throw new QueueError(
        `Queue attribute ${LENGTH_ATTRIBUTE} is missing or not a number`,
        QueueErrorCode.INVALID_RESPONSE,
        true,
        { queueUrl: this.queueUrl, value: raw }
      );
    }

    return Number.parseInt(raw, 10);
  }

  async purge(): Promise<void> {
    await this.sqsClient.purgeQueue({ QueueUrl: this.queueUrl });
  }
}

function toQueueMessage(message: Message): QueueMessage | null {
  if (message.Body === undefined || !message.ReceiptHandle || !message.MessageId) {
    return null;
  }

  const attributes: Record<string, string> = {};
  for (const [name, value] of Object.entries(message.Attributes ?? {})) {
    if (value !== undefined) {
      attributes[name] = value;
    }
  }

  return {
    messageId: message.MessageId,
    receiptHandle: message.ReceiptHandle,
    body: message.Body,
    attributes,
    messageAttributes: toMessageAttributes(message.MessageAttributes),
  };
}

function toMessageAttributes(
  values: Record<string, MessageAttributeValue> | undefined
): Record<string, QueueMessageAttribute> {
  const converted: Record<string, QueueMessageAttribute> = {};
  for (const [name, value] of Object.entries(values ?? {})) {
    converted[name] = {
      dataType: value.DataType ?? 'String',
      stringValue: value.StringValue,
      binaryValue: value.BinaryValue,
    };
  }
  return converted;
}

function toBatchResult(
  successful: Array<{ Id?: string }> | undefined,
  failed: BatchResultErrorEntry[] | undefined
): BatchResult {
  return {
    successful: (successful ?? []).flatMap(entry => (entry.Id ? [entry.Id] : [])),
    failed: (failed ?? []).map(toBatchFailure),
  };
}

function toBatchFailure(entry: BatchResultErrorEntry): BatchFailure {
  return {
    id: entry.Id ?? '',
    code: entry.Code ?? 'Unknown',
    message: entry.Message,
    senderFault: entry.SenderFault ?? false,
  };
}
