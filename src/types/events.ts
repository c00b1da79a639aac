export enum EventType {
  DEPOSITED = 'DEPOSITED',
  WITHDRAWN = 'WITHDRAWN',
  REWARD_CLAIMED = 'REWARD_CLAIMED',
}

/**
 * Asset amounts travel as decimal strings so arbitrary-precision
 * values survive JSON encoding.
 */
export interface BaseEvent {
  eventId: string;
  eventType: EventType;
  participantId: string;
  timestamp: Date;
  payload: Record<string, string>;
}

export interface DepositedEvent extends BaseEvent {
  eventType: EventType.DEPOSITED;
  payload: {
    amount: string;
    principal: string;
  };
}

export interface WithdrawnEvent extends BaseEvent {
  eventType: EventType.WITHDRAWN;
  payload: {
    amount: string;
    principal: string;
  };
}

export interface RewardClaimedEvent extends BaseEvent {
  eventType: EventType.REWARD_CLAIMED;
  payload: {
    reward: string;
    principal: string;
  };
}

export type StakingEvent = DepositedEvent | WithdrawnEvent | RewardClaimedEvent;

/**
 * Sink for domain events. Implemented by the Redis event bus and by the
 * in-process event log.
 */
export interface EventPublisher {
  publish(event: StakingEvent): Promise<void>;
}
