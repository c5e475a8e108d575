import type {
  CounterIncrement,
  NewActivityEvent,
  NewSession,
  NewUser,
  Session,
  StoreDiagnostics,
} from '../types';

/**
 * Persistence gateway over the document store. Identifiers are opaque
 * strings; any conversion to a native id format stays behind this interface.
 */
export interface FocusStore {
  createUser(user: NewUser): Promise<string>;

  createSession(session: NewSession): Promise<Session>;

  /** Resolves to null for unknown or malformed ids. */
  findSession(sessionId: string): Promise<Session | null>;

  appendActivityEvent(event: NewActivityEvent): Promise<string>;

  /**
   * Applies the increment and stamps updatedAt in one atomic store operation,
   * resolving to the updated session, or null if it does not exist.
   */
  incrementSessionCounters(
    sessionId: string,
    increment: CounterIncrement,
    updatedAt: Date
  ): Promise<Session | null>;

  /**
   * Moves an active session to ended. An already-ended session is returned
   * unchanged. Resolves to null if the session does not exist.
   */
  endSession(sessionId: string, endedAt: Date): Promise<Session | null>;

  listSessionsByUser(userId: string, limit: number): Promise<Session[]>;

  diagnose(): Promise<StoreDiagnostics>;
}
