import { describe, it, expect, vi, beforeEach } from 'vitest';

const { mockSend } = vi.hoisted(() => ({ mockSend: vi.fn() }));

// Mock AWS SDK so commands carry their input and nothing reaches the network
vi.mock('@aws-sdk/client-sqs', () => {
  const command = (name: string) =>
    vi.fn(function (input: unknown) {
      return { name, input };
    });

  return {
    SQSClient: vi.fn(function () {
      return { send: mockSend };
    }),
    SendMessageCommand: command('SendMessageCommand'),
    SendMessageBatchCommand: command('SendMessageBatchCommand'),
    DeleteMessageCommand: command('DeleteMessageCommand'),
    DeleteMessageBatchCommand: command('DeleteMessageBatchCommand'),
    ReceiveMessageCommand: command('ReceiveMessageCommand'),
    GetQueueAttributesCommand: command('GetQueueAttributesCommand'),
    PurgeQueueCommand: command('PurgeQueueCommand'),
    CreateQueueCommand: command('CreateQueueCommand'),
    DeleteQueueCommand: command('DeleteQueueCommand'),
    GetQueueUrlCommand: command('GetQueueUrlCommand'),
    ListQueuesCommand: command('ListQueuesCommand'),
  };
});

import { SQSClient } from '@aws-sdk/client-sqs';
import { SQSClientWrapper } from './sqs-client.wrapper';
import { TEST_QUEUE_URL } from '../test/fixtures';

describe('SQSClientWrapper', () => {
  let wrapper: SQSClientWrapper;

  beforeEach(() => {
    mockSend.mockReset();
    mockSend.mockResolvedValue({ $metadata: {} });
    wrapper = new SQSClientWrapper('us-west-2');
  });

  it('should create the SDK client for the given region', () => {
    expect(SQSClient).toHaveBeenCalledWith({ region: 'us-west-2' });
  });

  it('should send a SendMessageCommand with the input', async () => {
    await wrapper.sendMessage({ QueueUrl: TEST_QUEUE_URL, MessageBody: 'hello' });

    expect(mockSend).toHaveBeenCalledWith({
      name: 'SendMessageCommand',
      input: { QueueUrl: TEST_QUEUE_URL, MessageBody: 'hello' },
    });
  });

  it('should send one command per operation', async () => {
    await wrapper.sendMessageBatch({ QueueUrl: TEST_QUEUE_URL, Entries: [] });
    await wrapper.deleteMessage({ QueueUrl: TEST_QUEUE_URL, ReceiptHandle: 'r' });
    await wrapper.deleteMessageBatch({ QueueUrl: TEST_QUEUE_URL, Entries: [] });
    await wrapper.receiveMessage({ QueueUrl: TEST_QUEUE_URL });
    await wrapper.getQueueAttributes({ QueueUrl: TEST_QUEUE_URL });
    await wrapper.purgeQueue({ QueueUrl: TEST_QUEUE_URL });
    await wrapper.createQueue({ QueueName: 'test-queue' });
    await wrapper.deleteQueue({ QueueUrl: TEST_QUEUE_URL });
    await wrapper.getQueueUrl({ QueueName: 'test-queue' });
    await wrapper.listQueues({ QueueNamePrefix: 'test' });

    const names = mockSend.mock.calls.map(([command]) => command.name);
    expect(names).toEqual([
      'SendMessageBatchCommand',
      'DeleteMessageCommand',
      'DeleteMessageBatchCommand',
      'ReceiveMessageCommand',
      'GetQueueAttributesCommand',
      'PurgeQueueCommand',
      'CreateQueueCommand',
      'DeleteQueueCommand',
      'GetQueueUrlCommand',
      'ListQueuesCommand',
    ]);
  });

  it('should return the SDK response', async () => {
    mockSend.mockResolvedValue({ QueueUrl: TEST_QUEUE_URL, $metadata: {} });

    const response = await wrapper.getQueueUrl({ QueueName: 'test-queue' });

    expect(response.QueueUrl).toBe(TEST_QUEUE_URL);
  });

  it('should propagate SDK errors unchanged', async () => {
    const error = new Error('AccessDenied');
    mockSend.mockRejectedValue(error);

    await expect(wrapper.purgeQueue({ QueueUrl: TEST_QUEUE_URL })).rejects.toBe(error);
  });
});
