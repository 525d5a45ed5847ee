import {
  SQSClient,
  SendMessageCommand,
  SendMessageBatchCommand,
  DeleteMessageCommand,
  DeleteMessageBatchCommand,
  ReceiveMessageCommand,
  GetQueueAttributesCommand,
  PurgeQueueCommand,
  CreateQueueCommand,
  DeleteQueueCommand,
  GetQueueUrlCommand,
  ListQueuesCommand,
  SendMessageCommandInput,
  SendMessageCommandOutput,
  SendMessageBatchCommandInput,
  SendMessageBatchCommandOutput,
  DeleteMessageCommandInput,
  DeleteMessageCommandOutput,
  DeleteMessageBatchCommandInput,
  DeleteMessageBatchCommandOutput,
  ReceiveMessageCommandInput,
  ReceiveMessageCommandOutput,
  GetQueueAttributesCommandInput,
  GetQueueAttributesCommandOutput,
  PurgeQueueCommandInput,
  PurgeQueueCommandOutput,
  CreateQueueCommandInput,
  CreateQueueCommandOutput,
  DeleteQueueCommandInput,
  DeleteQueueCommandOutput,
  GetQueueUrlCommandInput,
  GetQueueUrlCommandOutput,
  ListQueuesCommandInput,
  ListQueuesCommandOutput,
} from '@aws-sdk/client-sqs';
import { ISQSClient } from './sqs-client.interface';

/**
 * Wrapper for AWS SDK SQSClient that implements our ISQSClient interface.
 * Each method sends exactly one command; nothing is retried here beyond what
 * the SDK itself is configured to do.
 */
export class SQSClientWrapper implements ISQSClient {
  private client: SQSClient;

  constructor(region: string) {
    this.client = new SQSClient({ region });
  }

  sendMessage(input: SendMessageCommandInput): Promise<SendMessageCommandOutput> {
    return this.client.send(new SendMessageCommand(input));
  }

  sendMessageBatch(input: SendMessageBatchCommandInput): Promise<SendMessageBatchCommandOutput> {
    return this.client.send(new SendMessageBatchCommand(input));
  }

  deleteMessage(input: DeleteMessageCommandInput): Promise<DeleteMessageCommandOutput> {
    return this.client.send(new DeleteMessageCommand(input));
  }

  deleteMessageBatch(input: DeleteMessageBatchCommandInput): Promise<DeleteMessageBatchCommandOutput> {
    return this.client.send(new DeleteMessageBatchCommand(input));
  }

  receiveMessage(input: ReceiveMessageCommandInput): Promise<ReceiveMessageCommandOutput> {
    return this.client.send(new ReceiveMessageCommand(input));
  }

  getQueueAttributes(input: GetQueueAttributesCommandInput): Promise<GetQueueAttributesCommandOutput> {
    return this.client.send(new GetQueueAttributesCommand(input));
  }

  purgeQueue(input: PurgeQueueCommandInput): Promise<PurgeQueueCommandOutput> {
    return this.client.send(new PurgeQueueCommand(input));
  }

  createQueue(input: CreateQueueCommandInput): Promise<CreateQueueCommandOutput> {
    return this.client.send(new CreateQueueCommand(input));
  }

  deleteQueue(input: DeleteQueueCommandInput): Promise<DeleteQueueCommandOutput> {
    return this.client.send(new DeleteQueueCommand(input));
  }

  getQueueUrl(input: GetQueueUrlCommandInput): Promise<GetQueueUrlCommandOutput> {
    return this.client.send(new GetQueueUrlCommand(input));
  }

  listQueues(input: ListQueuesCommandInput): Promise<ListQueuesCommandOutput> {
    return this.client.send(new ListQueuesCommand(input));
  }
}
