import { Types, type Connection } from 'mongoose';
import type { Database } from '../db/database';
import { createModels, type FocusModels } from '../models';
import type { LeanSession, SessionDocument } from '../models/Session';
import type {
  CounterIncrement,
  NewActivityEvent,
  NewSession,
  NewUser,
  Session,
  SessionCounters,
  StoreDiagnostics,
} from '../types';
import type { FocusStore } from './focusStore';

const COUNTER_FIELDS = {
  totalFocusSeconds: 'total_focus_seconds',
  totalIdleSeconds: 'total_idle_seconds',
  distractionsBlocked: 'distractions_blocked',
} as const satisfies Record<keyof SessionCounters, keyof SessionDocument>;

const COUNTER_KEYS: Array<keyof SessionCounters> = [
  'totalFocusSeconds',
  'totalIdleSeconds',
  'distractionsBlocked',
];

function toObjectId(id: string): Types.ObjectId | null {
  // ObjectId.isValid also accepts arbitrary 12-character strings
  if (!/^[0-9a-fA-F]{24}$/.test(id)) {
    return null;
  }
  return new Types.ObjectId(id);
}

export function toSession(doc: LeanSession): Session {
  return {
    id: doc._id.toString(),
    userId: doc.user_id,
    goal: doc.goal,
    durationMinutes: doc.duration_minutes,
    categories: [...doc.categories],
    voice: doc.voice,
    startedAt: doc.started_at,
    endedAt: doc.ended_at ?? null,
    updatedAt: doc.updated_at ?? null,
    totalFocusSeconds: doc.total_focus_seconds,
    totalIdleSeconds: doc.total_idle_seconds,
    distractionsBlocked: doc.distractions_blocked,
    status: doc.status,
  };
}

export function toIncrementUpdate(increment: CounterIncrement): Record<string, number> {
  const update: Record<string, number> = {};
  for (const key of COUNTER_KEYS) {
    const amount = increment[key];
    if (amount !== undefined && amount !== 0) {
      update[COUNTER_FIELDS[key]] = amount;
    }
  }
  return update;
}

export class MongoFocusStore implements FocusStore {
  private models: FocusModels | null = null;
  private modelsConnection: Connection | null = null;

  constructor(private readonly database: Database) {}

  private async getModels(): Promise<FocusModels> {
    const connection = await this.database.getConnection();
    if (!this.models || this.modelsConnection !== connection) {
      this.models = createModels(connection);
      this.modelsConnection = connection;
    }
    return this.models;
  }

  async createUser(user: NewUser): Promise<string> {
    const { User } = await this.getModels();
    const doc = await User.create({
      name: user.name,
      email: user.email,
      device_id: user.deviceId,
      voice: user.voice,
    });
    return doc._id.toString();
  }

  async createSession(session: NewSession): Promise<Session> {
    const { Session: sessions } = await this.getModels();
    const doc = await sessions.create({
      user_id: session.userId,
      goal: session.goal,
      duration_minutes: session.durationMinutes,
      categories: session.categories,
      voice: session.voice,
      started_at: session.startedAt,
      ended_at: null,
      updated_at: null,
      total_focus_seconds: 0,
      total_idle_seconds: 0,
      distractions_blocked: 0,
      status: 'active',
    });
    return toSession(doc.toObject<LeanSession>());
  }

  async findSession(sessionId: string): Promise<Session | null> {
    const id = toObjectId(sessionId);
    if (!id) {
      return null;
    }

    const { Session: sessions } = await this.getModels();
    const doc = await sessions.findById(id).lean<LeanSession>().exec();
    return doc ? toSession(doc) : null;
  }

  async appendActivityEvent(event: NewActivityEvent): Promise<string> {
    const { ActivityEvent } = await this.getModels();
    const doc = await ActivityEvent.create({
      session_id: event.sessionId,
      user_id: event.userId,
      timestamp: event.timestamp,
      device: event.device,
      app: event.app,
      url: event.url,
      title: event.title,
      idle: event.idle,
      decision: event.decision,
      reason: event.reason,
    });
    return doc._id.toString();
  }

  async incrementSessionCounters(
    sessionId: string,
    increment: CounterIncrement,
    updatedAt: Date
  ): Promise<Session | null> {
    const id = toObjectId(sessionId);
    if (!id) {
      return null;
    }

    const { Session: sessions } = await this.getModels();
    const doc = await sessions.findByIdAndUpdate(
      id,
      { $inc: toIncrementUpdate(increment), $set: { updated_at: updatedAt } },
      { new: true }
    )
      .lean<LeanSession>()
      .exec();
    return doc ? toSession(doc) : null;
  }

  async endSession(sessionId: string, endedAt: Date): Promise<Session | null> {
    const id = toObjectId(sessionId);
    if (!id) {
      return null;
    }

    const { Session: sessions } = await this.getModels();
    const ended = await sessions.findOneAndUpdate(
      { _id: id, status: 'active' },
      { $set: { status: 'ended', ended_at: endedAt } },
      { new: true }
    )
      .lean<LeanSession>()
      .exec();
    if (ended) {
      return toSession(ended);
    }

    // Either unknown or already ended; ended_at is never restamped.
    const existing = await sessions.findById(id).lean<LeanSession>().exec();
    return existing ? toSession(existing) : null;
  }

  async listSessionsByUser(userId: string, limit: number): Promise<Session[]> {
    const { Session: sessions } = await this.getModels();
    const docs = await sessions.find({ user_id: userId })
      .sort({ started_at: -1 })
      .limit(limit)
      .lean<LeanSession[]>()
      .exec();
    return docs.map(toSession);
  }

  diagnose(): Promise<StoreDiagnostics> {
    return this.database.diagnose();
  }
}
