/**
 * Event Publisher
 * Broadcasts domain events after the triggering write has committed.
 * Channel per event type: `<prefix>:<eventType>`, JSON message body.
 */

import type { MaturityEvent, MaturityEventPayload, MaturityEventType } from '@maturity/shared';
import { systemClock, type Clock } from '../../lib/clock.js';
import { getConfig } from '../../lib/config.js';
import { createLogger } from '../../lib/logger.js';
import { getRedis } from '../../lib/redis.js';

const logger = createLogger('EventPublisher');

export interface EventPublisher {
  publish(eventType: MaturityEventType, payload: MaturityEventPayload): Promise<void>;
}

/** The slice of the ioredis client the publisher needs. */
export interface PubSubClient {
  publish(channel: string, message: string): Promise<number>;
}

export function buildEventPayload(
  entityId: string,
  tenantId: string,
  data: Record<string, unknown>,
  clock: Clock = systemClock
): MaturityEventPayload {
  return {
    entityId,
    tenantId,
    occurredAt: clock.now().toISOString(),
    data,
  };
}

export function eventChannel(prefix: string, eventType: MaturityEventType): string {
  return `${prefix}:${eventType}`;
}

export class RedisEventPublisher implements EventPublisher {
  constructor(
    private readonly client: PubSubClient = getRedis(),
    private readonly channelPrefix: string = getConfig().eventChannelPrefix
  ) {}

  async publish(eventType: MaturityEventType, payload: MaturityEventPayload): Promise<void> {
    const channel = eventChannel(this.channelPrefix, eventType);
    const event: MaturityEvent = { eventType, ...payload };

    try {
      const receivers = await this.client.publish(channel, JSON.stringify(event));
      logger.debug({ channel, entityId: payload.entityId, receivers }, 'Event published');
    } catch (error) {
      logger.error(
        { channel, entityId: payload.entityId, error: error instanceof Error ? error.message : String(error) },
        'Event publish failed'
      );
      throw error;
    }
  }
}

let publisherInstance: EventPublisher | null = null;

export function getEventPublisher(): EventPublisher {
  if (!publisherInstance) {
    publisherInstance = new RedisEventPublisher();
  }
  return publisherInstance;
}

export function resetEventPublisher(): void {
  publisherInstance = null;
}
