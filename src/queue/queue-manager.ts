import { ISQSClient } from '../aws/sqs-client.interface';
import { Logger, QueueError, QueueErrorCode } from '../types';

/**
 * Management-plane operations on the queue resource itself. Only needed when
 * setting up a client or in test fixtures; message flow goes through
 * QueueBackend.
 */
export class QueueManager {
  constructor(
    private readonly sqsClient: ISQSClient,
    private readonly logger: Logger = console
  ) {}

  /**
   * Creates the queue and returns its URL. SQS treats creating an existing
   * queue with the same attributes as a no-op.
   */
  async createQueue(name: string): Promise<string> {
    const response = await this.sqsClient.createQueue({ QueueName: name });
    if (!response.QueueUrl) {
      throw new QueueError(
        `CreateQueue for ${name} returned no queue URL`,
        QueueErrorCode.INVALID_RESPONSE,
        false,
        { name }
      );
    }

    this.logger.info(`Created queue ${name}: ${response.QueueUrl}`);
    return response.QueueUrl;
  }

  async resolveQueueUrl(name: string): Promise<string> {
    let queueUrl: string | undefined;
    try {
      const response = await this.sqsClient.getQueueUrl({ QueueName: name });
      queueUrl = response.QueueUrl;
    } catch (error) {
      throw new QueueError(
        `Failed to resolve queue URL for ${name}: ${error instanceof Error ? error.message : 'Unknown error'}`,
        QueueErrorCode.QUEUE_RESOLUTION_FAILED,
        false,
        { name, cause: error }
      );
    }

    if (!queueUrl) {
      throw new QueueError(
        `Failed to resolve queue URL for ${name}: no URL returned`,
        QueueErrorCode.QUEUE_RESOLUTION_FAILED,
        false,
        { name }
      );
    }

    return queueUrl;
  }

  async deleteQueue(name: string): Promise<void> {
    const queueUrl = await this.resolveQueueUrl(name);
    await this.sqsClient.deleteQueue({ QueueUrl: queueUrl });
    this.logger.info(`Deleted queue ${name}`);
  }

  /**
   * True when a queue with exactly this name exists. ListQueues matches by
   * prefix, so the last URL segment is compared.
   */
  async queueExists(name: string): Promise<boolean> {
    let nextToken: string | undefined;
    do {
      const response = await this.sqsClient.listQueues({
        QueueNamePrefix: name,
        NextToken: nextToken,
      });

      if ((response.QueueUrls ?? []).some(url => queueNameFromUrl(url) === name)) {
        return true;
      }
      nextToken = response.NextToken;
    } while (nextToken);

    return false;
  }
}

export function queueNameFromUrl(queueUrl: string): string {
  const segments = queueUrl.split('/');
  return segments[segments.length - 1] ?? '';
}
