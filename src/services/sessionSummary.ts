import type { FocusStore } from '../store/focusStore';
import type { Session, SessionSummary } from '../types';

export const SUMMARY_SESSION_LIMIT = 50;

// Not a consecutive-day streak: session count, capped at a week.
export const STREAK_DAYS_CAP = 7;

export function summarizeSessions(sessions: readonly Session[]): SessionSummary {
  return sessions.reduce<SessionSummary>(
    (summary, session) => ({
      sessionCount: summary.sessionCount + 1,
      totalFocusSeconds: summary.totalFocusSeconds + session.totalFocusSeconds,
      totalIdleSeconds: summary.totalIdleSeconds + session.totalIdleSeconds,
      distractionsBlocked: summary.distractionsBlocked + session.distractionsBlocked,
      streakDays: Math.min(summary.sessionCount + 1, STREAK_DAYS_CAP),
    }),
    {
      sessionCount: 0,
      totalFocusSeconds: 0,
      totalIdleSeconds: 0,
      distractionsBlocked: 0,
      streakDays: 0,
    }
  );
}

export class SessionSummaryService {
  constructor(private readonly store: FocusStore) {}

  async summarize(userId: string): Promise<SessionSummary> {
    const sessions = await this.store.listSessionsByUser(userId, SUMMARY_SESSION_LIMIT);
    return summarizeSessions(sessions);
  }
}
