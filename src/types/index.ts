export type Decision = 'relevant' | 'irrelevant';

export type SessionStatus = 'active' | 'ended';

export interface Classification {
  decision: Decision;
  reason: string;
}

export interface SessionCounters {
  totalFocusSeconds: number;
  totalIdleSeconds: number;
  distractionsBlocked: number;
}

export type CounterIncrement = Partial<SessionCounters>;

export interface User {
  id: string;
  name: string | null;
  email: string | null;
  deviceId: string;
  voice: string;
  createdAt: Date;
}

export type NewUser = Omit<User, 'id' | 'createdAt'>;

export interface Session extends SessionCounters {
  id: string;
  userId: string;
  goal: string;
  durationMinutes: number;
  categories: string[];
  voice: string;
  startedAt: Date;
  endedAt: Date | null;
  updatedAt: Date | null;
  status: SessionStatus;
}

export type NewSession = Pick<
  Session,
  'userId' | 'goal' | 'durationMinutes' | 'categories' | 'voice' | 'startedAt'
>;

export interface ActivityEvent extends Classification {
  id: string;
  sessionId: string;
  userId: string;
  timestamp: Date;
  device: string;
  app: string | null;
  url: string | null;
  title: string | null;
  idle: boolean;
}

export type NewActivityEvent = Omit<ActivityEvent, 'id'>;

export interface SessionSummary {
  sessionCount: number;
  totalFocusSeconds: number;
  totalIdleSeconds: number;
  distractionsBlocked: number;
  streakDays: number;
}

export interface StoreDiagnostics {
  connected: boolean;
  databaseName: string | null;
  collections: string[];
  error?: string;
}
