import { NotFoundError } from '../errors';
import { DEFAULT_VOICE } from '../models/Session';
import type { FocusStore } from '../store/focusStore';
import type { SessionStatus } from '../types';
import { logger, type Logger } from '../utils/logger';

export interface StartSessionInput {
  userId: string;
  goal: string;
  durationMinutes: number;
  categories: string[];
  voice?: string | null;
}

export interface SessionStatusResult {
  sessionId: string;
  status: SessionStatus;
}

/**
 * Session state machine: created active, moved to ended by an explicit
 * request, never leaves ended.
 */
export class SessionLifecycleService {
  constructor(
    private readonly store: FocusStore,
    private readonly log: Logger = logger,
    private readonly now: () => Date = () => new Date()
  ) {}

  async start(input: StartSessionInput): Promise<SessionStatusResult> {
    const session = await this.store.createSession({
      userId: input.userId,
      goal: input.goal,
      durationMinutes: input.durationMinutes,
      categories: [...new Set(input.categories)],
      voice: input.voice || DEFAULT_VOICE,
      startedAt: this.now(),
    });

    this.log.info(
      { sessionId: session.id, userId: session.userId, durationMinutes: session.durationMinutes },
      'Session started'
    );

    return { sessionId: session.id, status: session.status };
  }

  async end(sessionId: string): Promise<SessionStatusResult> {
    const session = await this.store.endSession(sessionId, this.now());
    if (!session) {
      throw new NotFoundError();
    }

    this.log.info({ sessionId: session.id }, 'Session ended');

    return { sessionId: session.id, status: session.status };
  }
}
