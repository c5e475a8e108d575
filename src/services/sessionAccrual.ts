import { NotFoundError } from '../errors';
import type { FocusStore } from '../store/focusStore';
import type { Classification, CounterIncrement, SessionCounters } from '../types';

/**
 * Seconds credited per relevant report. Clients poll about every 30 seconds;
 * the real gap between reports is not measured.
 */
export const FOCUS_TICK_SECONDS = 30;

export function incrementFor(classification: Classification): CounterIncrement {
  return classification.decision === 'irrelevant'
    ? { distractionsBlocked: 1 }
    : { totalFocusSeconds: FOCUS_TICK_SECONDS };
}

export class SessionAccrualService {
  constructor(
    private readonly store: FocusStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Credits one classified report to the session. The increment happens in
   * the store as a single find-and-increment, so concurrent reports for the
   * same session are all counted.
   */
  async applyEvent(sessionId: string, classification: Classification): Promise<SessionCounters> {
    const updated = await this.store.incrementSessionCounters(
      sessionId,
      incrementFor(classification),
      this.now()
    );

    if (!updated) {
      throw new NotFoundError();
    }

    return {
      totalFocusSeconds: updated.totalFocusSeconds,
      totalIdleSeconds: updated.totalIdleSeconds,
      distractionsBlocked: updated.distractionsBlocked,
    };
  }
}
