import type { MaturityEvent, MaturityEventPayload, MaturityEventType } from '@maturity/shared';
import type { EventPublisher } from '../../src/services/events/eventPublisher.js';

/**
 * Keeps every published event in memory, in publish order.
 */
export class RecordingEventPublisher implements EventPublisher {
  readonly events: MaturityEvent[] = [];

  async publish(eventType: MaturityEventType, payload: MaturityEventPayload): Promise<void> {
    this.events.push({ eventType, ...payload });
  }

  types(): MaturityEventType[] {
    return this.events.map((event) => event.eventType);
  }
}
