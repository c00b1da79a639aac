/**
 * EventBus Unit Tests
 *
 * Tests publication of staking events over Redis pub/sub.
 */

import { EventBus } from '../../../src/events/eventBus';
import { InMemoryEventLog } from '../../../src/events/eventLog';
import { DepositedEvent, EventType, RewardClaimedEvent } from '../../../src/types/events';

// Mock Redis
const mockOn = jest.fn();
const mockQuit = jest.fn().mockResolvedValue('OK');
const mockPublish = jest.fn().mockResolvedValue(1);
const mockRedis = jest.fn();

jest.mock('ioredis', () => {
  return jest.fn().mockImplementation((...args: unknown[]) => {
    mockRedis(...args);
    return {
      on: mockOn,
      quit: mockQuit,
      publish: mockPublish,
    };
  });
});

const deposited: DepositedEvent = {
  eventId: 'evt-1',
  eventType: EventType.DEPOSITED,
  participantId: 'alice',
  timestamp: new Date(0),
  payload: { amount: '1000', principal: '1000' },
};

describe('EventBus', () => {
  let eventBus: EventBus;

  beforeEach(() => {
    jest.clearAllMocks();
    eventBus = new EventBus();

    // Simulate immediate connection
    mockOn.mockImplementation((event: string, callback: () => void) => {
      if (event === 'connect') {
        setImmediate(() => callback());
      }
    });
  });

  describe('getStatus', () => {
    it('should return connected: false initially', () => {
      expect(eventBus.getStatus()).toEqual({ connected: false });
    });
  });

  describe('connect', () => {
    it('should connect successfully when Redis connects', async () => {
      await eventBus.connect();
      expect(eventBus.getStatus().connected).toBe(true);
    });

    it('should not reconnect if already connected', async () => {
      await eventBus.connect();
      await eventBus.connect();

      expect(mockRedis).toHaveBeenCalledTimes(1);
    });

    it('should handle connection errors', async () => {
      mockOn.mockImplementation((event: string, callback: (err?: Error) => void) => {
        if (event === 'error') {
          setImmediate(() => callback(new Error('Connection refused')));
        }
      });

      await expect(eventBus.connect()).rejects.toThrow('Connection refused');
      expect(eventBus.getStatus().connected).toBe(false);
    });
  });

  describe('disconnect', () => {
    it('should quit the publisher', async () => {
      await eventBus.connect();
      await eventBus.disconnect();

      expect(mockQuit).toHaveBeenCalledTimes(1);
      expect(eventBus.getStatus().connected).toBe(false);
    });

    it('should be a no-op when not connected', async () => {
      await eventBus.disconnect();
      expect(mockQuit).not.toHaveBeenCalled();
    });
  });

  describe('publish', () => {
    it('should throw if not connected', async () => {
      await expect(eventBus.publish(deposited)).rejects.toThrow('Event bus not connected');
    });

    it('should publish to the channel named after the event type', async () => {
      await eventBus.connect();
      await eventBus.publish(deposited);

      expect(mockPublish).toHaveBeenCalledWith(
        'DEPOSITED',
        '{"eventId":"evt-1","eventType":"DEPOSITED","participantId":"alice","timestamp":"1970-01-01T00:00:00.000Z","payload":{"amount":"1000","principal":"1000"}}'
      );
    });

    it('should propagate publish failures', async () => {
      await eventBus.connect();
      mockPublish.mockRejectedValueOnce(new Error('READONLY'));

      await expect(eventBus.publish(deposited)).rejects.toThrow('READONLY');
    });
  });
});

describe('InMemoryEventLog', () => {
  it('should record events in order and filter by type', async () => {
    const log = new InMemoryEventLog();
    const claimed: RewardClaimedEvent = {
      eventId: 'evt-2',
      eventType: EventType.REWARD_CLAIMED,
      participantId: 'alice',
      timestamp: new Date(1000),
      payload: { reward: '10', principal: '1000' },
    };

    await log.publish(deposited);
    await log.publish(claimed);

    expect(log.list()).toEqual([deposited, claimed]);
    expect(log.list(EventType.REWARD_CLAIMED)).toEqual([claimed]);

    log.clear();
    expect(log.list()).toEqual([]);
  });
});
