import { NotFoundError, SessionEndedError } from '../errors';
import type { FocusStore } from '../store/focusStore';
import type { Classification } from '../types';
import { logger, type Logger } from '../utils/logger';
import { classify } from './relevanceClassifier';
import type { SessionAccrualService } from './sessionAccrual';

export interface ActivityReport {
  sessionId: string;
  userId: string;
  app?: string | null;
  url?: string | null;
  title?: string | null;
  idle: boolean;
  device?: string;
}

export interface ActivityTrackingOptions {
  rejectEndedSessions: boolean;
  log?: Logger;
}

const DEFAULT_DEVICE = 'web';

export class ActivityTrackingService {
  private readonly log: Logger;

  constructor(
    private readonly store: FocusStore,
    private readonly accrual: SessionAccrualService,
    private readonly options: ActivityTrackingOptions,
    private readonly now: () => Date = () => new Date()
  ) {
    this.log = (options.log ?? logger).child({ component: 'activity' });
  }

  async recordActivity(report: ActivityReport): Promise<Classification> {
    const session = await this.store.findSession(report.sessionId);
    if (!session) {
      throw new NotFoundError();
    }

    if (session.status === 'ended') {
      if (this.options.rejectEndedSessions) {
        throw new SessionEndedError();
      }
      this.log.warn({ sessionId: session.id }, 'Activity reported for an ended session');
    }

    const classification = classify(
      session.goal,
      report.title,
      report.url,
      session.categories
    );

    await this.store.appendActivityEvent({
      sessionId: report.sessionId,
      userId: report.userId,
      timestamp: this.now(),
      device: report.device ?? DEFAULT_DEVICE,
      app: report.app ?? null,
      url: report.url ?? null,
      title: report.title ?? null,
      idle: report.idle,
      decision: classification.decision,
      reason: classification.reason,
    });

    const counters = await this.accrual.applyEvent(session.id, classification);
    this.log.debug({ sessionId: session.id, ...classification, counters }, 'Activity recorded');

    return classification;
  }
}
