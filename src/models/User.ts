import { Schema } from 'mongoose';
import { DEFAULT_VOICE } from './Session';

export const USER_COLLECTION = 'user';

export interface UserDocument {
  name: string | null;
  email: string | null;
  device_id: string;
  voice: string;
  created_at?: Date;
}

export const userSchema = new Schema<UserDocument>(
  {
    name: { type: String, default: null },
    email: { type: String, default: null },
    device_id: { type: String, required: true },
    voice: { type: String, default: DEFAULT_VOICE },
  },
  {
    timestamps: { createdAt: 'created_at', updatedAt: false },
    versionKey: false,
  }
);
