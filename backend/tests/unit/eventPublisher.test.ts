import { describe, it, expect, vi } from 'vitest';
import {
  RedisEventPublisher,
  buildEventPayload,
  eventChannel,
  type PubSubClient,
} from '../../src/services/events/eventPublisher.js';
import { ManualClock } from '../utils/testHelpers.js';

describe('buildEventPayload', () => {
  it('stamps the event with the clock time', () => {
    expect(buildEventPayload('assessment-1', 'tenant-a', { overallScore: 55 }, new ManualClock())).toEqual({
      entityId: 'assessment-1',
      tenantId: 'tenant-a',
      occurredAt: '2024-03-04T09:00:00.000Z',
      data: { overallScore: 55 },
    });
  });
});

describe('RedisEventPublisher', () => {
  const payload = buildEventPayload('roadmap-1', 'tenant-a', { initiativeCount: 4 }, new ManualClock());

  it('publishes JSON on a channel per event type', async () => {
    const publish = vi.fn<(channel: string, message: string) => Promise<number>>().mockResolvedValue(1);
    const client: PubSubClient = { publish };

    await new RedisEventPublisher(client, 'maturity').publish('roadmap.generated', payload);

    expect(eventChannel('maturity', 'roadmap.generated')).toBe('maturity:roadmap.generated');
    expect(publish).toHaveBeenCalledTimes(1);
    const [channel, message] = publish.mock.calls[0] ?? [];
    expect(channel).toBe('maturity:roadmap.generated');
    expect(JSON.parse(message ?? '')).toEqual({
      eventType: 'roadmap.generated',
      entityId: 'roadmap-1',
      tenantId: 'tenant-a',
      occurredAt: '2024-03-04T09:00:00.000Z',
      data: { initiativeCount: 4 },
    });
  });

  it('propagates transport failures', async () => {
    const client: PubSubClient = {
      publish: vi.fn<(channel: string, message: string) => Promise<number>>().mockRejectedValue(new Error('connection reset')),
    };

    await expect(new RedisEventPublisher(client, 'maturity').publish('report.generated', payload)).rejects.toThrow(
      'connection reset'
    );
  });
});
