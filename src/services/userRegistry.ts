import { DEFAULT_VOICE } from '../models/Session';
import type { FocusStore } from '../store/focusStore';

export interface RegisterUserInput {
  name?: string | null;
  email?: string | null;
  deviceId: string;
  voice?: string | null;
}

export class UserRegistryService {
  constructor(private readonly store: FocusStore) {}

  register(input: RegisterUserInput): Promise<string> {
    return this.store.createUser({
      name: input.name ?? null,
      email: input.email ?? null,
      deviceId: input.deviceId,
      voice: input.voice || DEFAULT_VOICE,
    });
  }
}
