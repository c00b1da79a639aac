import { AsyncLocalStorage } from 'async_hooks';

import { stakingLockedParticipants } from '../../observability/metrics';

/**
 * Per-participant async mutex.
 *
 * Mutating operations for one participant run one at a time; different
 * participants never wait on each other. The lock is reentrant along a
 * single async call chain: an asset transfer that calls back into the
 * ledger for the participant whose operation is in flight runs immediately
 * (and sees the already persisted debit) instead of deadlocking.
 */
export class ParticipantLock {
  private readonly tails = new Map<string, Promise<void>>();
  private readonly held = new AsyncLocalStorage<ReadonlySet<string>>();

  async run<T>(participantId: string, fn: () => Promise<T>): Promise<T> {
    const heldByCaller = this.held.getStore();
    if (heldByCaller?.has(participantId)) {
      return fn();
    }

    const previous = this.tails.get(participantId) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(participantId, tail);
    stakingLockedParticipants.set(this.activeCount());

    await previous;
    try {
      const held = new Set(heldByCaller);
      held.add(participantId);
      return await this.held.run(held, fn);
    } finally {
      release();
      if (this.tails.get(participantId) === tail) {
        this.tails.delete(participantId);
        stakingLockedParticipants.set(this.activeCount());
      }
    }
  }

  /**
   * Participants with an operation running or queued.
   */
  activeCount(): number {
    return this.tails.size;
  }
}
