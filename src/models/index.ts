import type { Connection, Model } from 'mongoose';
import {
  ACTIVITY_EVENT_COLLECTION,
  type ActivityEventDocument,
  activityEventSchema,
} from './ActivityEvent';
import { SESSION_COLLECTION, type SessionDocument, sessionSchema } from './Session';
import { USER_COLLECTION, type UserDocument, userSchema } from './User';

export interface FocusModels {
  User: Model<UserDocument>;
  Session: Model<SessionDocument>;
  ActivityEvent: Model<ActivityEventDocument>;
}

/**
 * Registers the models on a specific connection rather than the global
 * mongoose instance, so each Database owns its own set.
 */
export function createModels(connection: Connection): FocusModels {
  return {
    User: connection.model<UserDocument>('User', userSchema, USER_COLLECTION),
    Session: connection.model<SessionDocument>('Session', sessionSchema, SESSION_COLLECTION),
    ActivityEvent: connection.model<ActivityEventDocument>(
      'ActivityEvent',
      activityEventSchema,
      ACTIVITY_EVENT_COLLECTION
    ),
  };
}
