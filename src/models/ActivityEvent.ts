import { Schema } from 'mongoose';
import type { Decision } from '../types';

export const ACTIVITY_EVENT_COLLECTION = 'activityevent';

export interface ActivityEventDocument {
  session_id: string;
  user_id: string;
  timestamp: Date;
  device: string;
  app: string | null;
  url: string | null;
  title: string | null;
  idle: boolean;
  decision: Decision;
  reason: string;
}

// Append-only; nothing reads these back.
export const activityEventSchema = new Schema<ActivityEventDocument>(
  {
    session_id: { type: String, required: true },
    user_id: { type: String, required: true },
    timestamp: { type: Date, required: true },
    device: { type: String, default: 'web' },
    app: { type: String, default: null },
    url: { type: String, default: null },
    title: { type: String, default: null },
    idle: { type: Boolean, default: false },
    decision: { type: String, enum: ['relevant', 'irrelevant'], required: true },
    reason: { type: String, required: true },
  },
  {
    versionKey: false,
  }
);
