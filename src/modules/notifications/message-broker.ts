import { EventEmitter } from 'events';
import { RedisClient } from '../../connections/redis';
import { logger, errorMeta } from '../../utils/logging';

export type MessageListener = (payload: string) => void;

/**
 * Topic-based pub/sub. Delivery is at-most-once with no history.
 */
export interface MessageBroker {
  publish(topic: string, payload: string): Promise<void>;
  subscribe(topic: string, listener: MessageListener): Promise<void>;
  unsubscribe(topic: string, listener: MessageListener): Promise<void>;
  close(): Promise<void>;
}

export class InMemoryMessageBroker implements MessageBroker {
  private readonly emitter = new EventEmitter();

  constructor() {
    // One listener per connected socket
    this.emitter.setMaxListeners(0);
  }

  async publish(topic: string, payload: string): Promise<void> {
    this.emitter.emit(topic, payload);
  }

  async subscribe(topic: string, listener: MessageListener): Promise<void> {
    this.emitter.on(topic, listener);
  }

  async unsubscribe(topic: string, listener: MessageListener): Promise<void> {
    this.emitter.off(topic, listener);
  }

  listenerCount(topic: string): number {
    return this.emitter.listenerCount(topic);
  }

  async close(): Promise<void> {
    this.emitter.removeAllListeners();
  }
}

/**
 * Redis pub/sub. A connection in subscriber mode cannot issue other commands,
 * so subscriptions go through a dedicated duplicate of the main client.
 */
export class RedisMessageBroker implements MessageBroker {
  constructor(
    private readonly publisher: RedisClient,
    private readonly subscriber: RedisClient
  ) {}

  static async create(client: RedisClient): Promise<RedisMessageBroker> {
    const subscriber = client.duplicate();
    subscriber.on('error', (err: Error) => {
      logger.error('Redis subscriber error', errorMeta(err));
    });
    await subscriber.connect();
    return new RedisMessageBroker(client, subscriber);
  }

  async publish(topic: string, payload: string): Promise<void> {
    await this.publisher.publish(topic, payload);
  }

  async subscribe(topic: string, listener: MessageListener): Promise<void> {
    await this.subscriber.subscribe(topic, listener);
  }

  async unsubscribe(topic: string, listener: MessageListener): Promise<void> {
    await this.subscriber.unsubscribe(topic, listener);
  }

  async close(): Promise<void> {
    if (this.subscriber.isOpen) {
      await this.subscriber.quit();
    }
  }
}
