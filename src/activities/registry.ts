import { KeyedLock } from './lock.js';
import type { Activity, ActivityRecord, ActivitySeed, RegistryOptions, RegistryResult } from './types.js';

const NOT_FOUND = 'Activity not found';

function toRecord(activity: Activity): ActivityRecord {
  return {
    description: activity.description,
    schedule: activity.schedule,
    max_participants: activity.maxParticipants,
    participants: Array.from(activity.participants),
  };
}

/**
 * In-memory store of activities keyed by name.
 *
 * Signup and unregister are serialized per activity, so each check-then-mutate
 * sees the participant set left by the previous one. Reads never wait.
 */
export class ActivityRegistry {
  private readonly activities = new Map<string, Activity>();
  private readonly lock = new KeyedLock();
  private readonly enforceCapacity: boolean;
  private readonly log: boolean;

  constructor(seed: ActivitySeed[] = [], options: RegistryOptions = {}) {
    this.enforceCapacity = options.enforceCapacity ?? true;
    this.log = options.log ?? true;
    for (const s of seed) {
      if (!Number.isInteger(s.maxParticipants) || s.maxParticipants <= 0) {
        throw new Error(`max participants for "${s.name}" must be a positive integer`);
      }
      if (this.activities.has(s.name)) {
        throw new Error(`duplicate activity "${s.name}"`);
      }
      const participants = new Set(s.participants);
      if (participants.size !== s.participants.length) {
        throw new Error(`duplicate participant in seed for "${s.name}"`);
      }
      if (this.enforceCapacity && participants.size > s.maxParticipants) {
        throw new Error(`"${s.name}" seeds ${participants.size} participants but allows ${s.maxParticipants}`);
      }
      this.activities.set(s.name, { ...s, participants });
    }
  }

  get size(): number {
    return this.activities.size;
  }

  listActivities(): Record<string, ActivityRecord> {
    const result: Record<string, ActivityRecord> = {};
    for (const [name, activity] of this.activities) {
      result[name] = toRecord(activity);
    }
    return result;
  }

  getActivity(name: string): ActivityRecord | undefined {
    const activity = this.activities.get(name);
    return activity ? toRecord(activity) : undefined;
  }

  signup(activityName: string, email: string): Promise<RegistryResult> {
    return this.lock.run(activityName, (): RegistryResult => {
      const activity = this.activities.get(activityName);
      if (!activity) {
        return { ok: false, error: NOT_FOUND, reason: 'not_found' };
      }
      if (activity.participants.has(email)) {
        return { ok: false, error: 'Student is already signed up', reason: 'conflict' };
      }
      if (this.enforceCapacity && activity.participants.size >= activity.maxParticipants) {
        return { ok: false, error: 'Activity is full', reason: 'conflict' };
      }

      activity.participants.add(email);
      const message = `Signed up ${email} for ${activityName}`;
      if (this.log) console.log(`[Registry] ${message} (${activity.participants.size}/${activity.maxParticipants})`);
      return { ok: true, message };
    });
  }

  unregister(activityName: string, email: string): Promise<RegistryResult> {
    return this.lock.run(activityName, (): RegistryResult => {
      const activity = this.activities.get(activityName);
      if (!activity) {
        return { ok: false, error: NOT_FOUND, reason: 'not_found' };
      }
      if (!activity.participants.delete(email)) {
        return { ok: false, error: 'Student is not signed up for this activity', reason: 'conflict' };
      }

      const message = `Unregistered ${email} from ${activityName}`;
      if (this.log) console.log(`[Registry] ${message} (${activity.participants.size}/${activity.maxParticipants})`);
      return { ok: true, message };
    });
  }
}
