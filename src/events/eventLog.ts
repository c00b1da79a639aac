import { createServiceLogger } from '../observability/logger';
import { EventPublisher, EventType, StakingEvent } from '../types/events';

const log = createServiceLogger('event-log');

/**
 * In-process event sink used when Redis publication is disabled
 * (STAKING_EVENTS_REDIS=false) and by the test suite.
 */
export class InMemoryEventLog implements EventPublisher {
  private readonly events: StakingEvent[] = [];

  async publish(event: StakingEvent): Promise<void> {
    this.events.push(event);
    log.info(
      { eventId: event.eventId, participantId: event.participantId, payload: event.payload },
      `Event recorded: ${event.eventType}`
    );
  }

  list(eventType?: EventType): StakingEvent[] {
    return eventType ? this.events.filter((e) => e.eventType === eventType) : [...this.events];
  }

  clear(): void {
    this.events.length = 0;
  }
}
