import { ISQSClient, SQSOperation } from './sqs-client.interface';

type SQSInputs = { [K in SQSOperation]: Parameters<ISQSClient[K]>[0] };
type SQSOutputs = { [K in SQSOperation]: Awaited<ReturnType<ISQSClient[K]>> };

export type SQSInput<K extends SQSOperation> = SQSInputs[K];
export type SQSOutput<K extends SQSOperation> = SQSOutputs[K];

type CallLog = { [K in SQSOperation]: SQSInputs[K][] };
type ResponseMap = { [K in SQSOperation]?: SQSOutputs[K] };
type SQSOutputLists = { [K in SQSOperation]: SQSOutputs[K][] };
type QueuedResponseMap = Partial<SQSOutputLists>;

function emptyCallLog(): CallLog {
  return {
    sendMessage: [],
    sendMessageBatch: [],
    deleteMessage: [],
    deleteMessageBatch: [],
    receiveMessage: [],
    getQueueAttributes: [],
    purgeQueue: [],
    createQueue: [],
    deleteQueue: [],
    getQueueUrl: [],
    listQueues: [],
  };
}

/**
 * Mock implementation of ISQSClient for testing.
 * Provides configurable responses and tracks method calls.
 */
export class MockSQSClient implements ISQSClient {
  private responses: ResponseMap = {};
  private queuedResponses: QueuedResponseMap = {};
  private errors: Map<SQSOperation, Error> = new Map();
  private calls: CallLog = emptyCallLog();
  private history: Array<{ operation: SQSOperation; timestamp: Date }> = [];

  sendMessage(input: SQSInput<'sendMessage'>): Promise<SQSOutput<'sendMessage'>> {
    return this.handle('sendMessage', input, { $metadata: {} });
  }

  sendMessageBatch(input: SQSInput<'sendMessageBatch'>): Promise<SQSOutput<'sendMessageBatch'>> {
    // Accept every entry unless told otherwise
    const successful = (input.Entries ?? []).map(entry => ({
      Id: entry.Id,
      MessageId: `msg-${entry.Id}`,
      MD5OfMessageBody: 'md5',
    }));
    return this.handle('sendMessageBatch', input, { Successful: successful, Failed: [], $metadata: {} });
  }

  deleteMessage(input: SQSInput<'deleteMessage'>): Promise<SQSOutput<'deleteMessage'>> {
    return this.handle('deleteMessage', input, { $metadata: {} });
  }

  deleteMessageBatch(input: SQSInput<'deleteMessageBatch'>): Promise<SQSOutput<'deleteMessageBatch'>> {
    const successful = (input.Entries ?? []).map(entry => ({ Id: entry.Id }));
    return this.handle('deleteMessageBatch', input, { Successful: successful, Failed: [], $metadata: {} });
  }

  receiveMessage(input: SQSInput<'receiveMessage'>): Promise<SQSOutput<'receiveMessage'>> {
    return this.handle('receiveMessage', input, { Messages: [], $metadata: {} });
  }

  getQueueAttributes(input: SQSInput<'getQueueAttributes'>): Promise<SQSOutput<'getQueueAttributes'>> {
    return this.handle('getQueueAttributes', input, {
      Attributes: { ApproximateNumberOfMessages: '0' },
      $metadata: {},
    });
  }

  purgeQueue(input: SQSInput<'purgeQueue'>): Promise<SQSOutput<'purgeQueue'>> {
    return this.handle('purgeQueue', input, { $metadata: {} });
  }

  createQueue(input: SQSInput<'createQueue'>): Promise<SQSOutput<'createQueue'>> {
    return this.handle('createQueue', input, {
      QueueUrl: `https://sqs.us-east-1.amazonaws.com/123456789012/${input.QueueName}`,
      $metadata: {},
    });
  }

  deleteQueue(input: SQSInput<'deleteQueue'>): Promise<SQSOutput<'deleteQueue'>> {
    return this.handle('deleteQueue', input, { $metadata: {} });
  }

  getQueueUrl(input: SQSInput<'getQueueUrl'>): Promise<SQSOutput<'getQueueUrl'>> {
    return this.handle('getQueueUrl', input, {
      QueueUrl: `https://sqs.us-east-1.amazonaws.com/123456789012/${input.QueueName}`,
      $metadata: {},
    });
  }

  listQueues(input: SQSInput<'listQueues'>): Promise<SQSOutput<'listQueues'>> {
    return this.handle('listQueues', input, { QueueUrls: [], $metadata: {} });
  }

  /**
   * Configure a response for an operation, returned on every call.
   */
  setResponse<K extends SQSOperation>(operation: K, response: SQSOutput<K>): void {
    this.responses[operation] = response;
  }

  /**
   * Queue one-shot responses, consumed in order before the configured response.
   */
  queueResponses<K extends SQSOperation>(operation: K, responses: SQSOutputLists[K]): void {
    const queued: SQSOutputLists[K] = this.queuedResponses[operation] ?? [];
    queued.push(...responses);
    this.queuedResponses[operation] = queued;
  }

  /**
   * Configure an error to throw for an operation.
   */
  setError(operation: SQSOperation, error: Error): void {
    this.errors.set(operation, error);
  }

  getCalls<K extends SQSOperation>(operation: K): SQSInput<K>[] {
    const calls: SQSInput<K>[] = this.calls[operation];
    return [...calls];
  }

  /**
   * Operation names in the order they were called.
   */
  getCallOrder(): SQSOperation[] {
    return this.history.map(call => call.operation);
  }

  getCallCount(): number {
    return this.history.length;
  }

  getCallCountFor(operation: SQSOperation): number {
    return this.calls[operation].length;
  }

  /**
   * Clear all recorded calls and configured responses/errors.
   */
  reset(): void {
    this.calls = emptyCallLog();
    this.history = [];
    this.responses = {};
    this.queuedResponses = {};
    this.errors.clear();
  }

  private async handle<K extends SQSOperation>(
    operation: K,
    input: SQSInput<K>,
    fallback: SQSOutput<K>
  ): Promise<SQSOutput<K>> {
    this.calls[operation].push(input);
    this.history.push({ operation, timestamp: new Date() });

    const error = this.errors.get(operation);
    if (error) {
      throw error;
    }

    const next = this.queuedResponses[operation]?.shift();
    if (next) {
      return next;
    }

    return this.responses[operation] ?? fallback;
  }
}
