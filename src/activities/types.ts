// --- Activity Registry Types ---

export interface Activity {
  name: string;
  description: string;
  schedule: string;
  maxParticipants: number;
  participants: Set<string>;
}

// Wire shape of an activity, as returned by GET /activities
export interface ActivityRecord {
  description: string;
  schedule: string;
  max_participants: number;
  participants: string[];
}

export type ActivitySeed = Omit<Activity, 'participants'> & { participants: string[] };

export type RegistryFailureReason = 'not_found' | 'conflict';

export type RegistryResult =
  | { ok: true; message: string }
  | { ok: false; error: string; reason: RegistryFailureReason };

export interface RegistryOptions {
  enforceCapacity?: boolean;
  log?: boolean;
}
