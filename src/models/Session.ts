import { Schema, type Types } from 'mongoose';
import type { SessionStatus } from '../types';

export const SESSION_COLLECTION = 'session';

export const DEFAULT_VOICE = 'Cluely';

export interface SessionDocument {
  user_id: string;
  goal: string;
  duration_minutes: number;
  categories: string[];
  voice: string;
  started_at: Date;
  ended_at: Date | null;
  updated_at: Date | null;
  total_focus_seconds: number;
  total_idle_seconds: number;
  distractions_blocked: number;
  status: SessionStatus;
  created_at?: Date;
}

export type LeanSession = SessionDocument & { _id: Types.ObjectId };

export const sessionSchema = new Schema<SessionDocument>(
  {
    user_id: { type: String, required: true, index: true },
    goal: { type: String, required: true },
    duration_minutes: { type: Number, required: true, min: 1, max: 480 },
    categories: { type: [String], default: [] },
    voice: { type: String, default: DEFAULT_VOICE },
    started_at: { type: Date, required: true },
    ended_at: { type: Date, default: null },
    updated_at: { type: Date, default: null },
    total_focus_seconds: { type: Number, default: 0, min: 0 },
    total_idle_seconds: { type: Number, default: 0, min: 0 },
    distractions_blocked: { type: Number, default: 0, min: 0 },
    status: {
      type: String,
      enum: ['active', 'ended'],
      default: 'active',
    },
  },
  {
    timestamps: { createdAt: 'created_at', updatedAt: false },
    versionKey: false,
  }
);

sessionSchema.index({ user_id: 1, started_at: -1 });
