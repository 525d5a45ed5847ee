import { ISQSClient } from './sqs-client.interface';
import { SQSClientWrapper } from './sqs-client.wrapper';

/**
 * Factory for creating SQS client instances.
 * Provides a single source of truth for client creation and configuration.
 */
export class SQSClientFactory {
  /**
   * Creates a real SQS client for the specified region.
   */
  createClient(region: string): ISQSClient {
    return new SQSClientWrapper(region);
  }
}
