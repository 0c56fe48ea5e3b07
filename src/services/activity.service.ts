import { ConflictError, NotFoundError } from "../helpers/error.helper";
import { KeyedMutex } from "../helpers/lock.helper";
import type {
  Activity,
  ActivityMap,
  RosterAction,
  RosterListener,
} from "../types/activity.types";

const cloneActivity = (activity: Activity): Activity => ({
  ...activity,
  participants: [...activity.participants],
});

const cloneMap = (activities: ActivityMap): ActivityMap =>
  Object.fromEntries(
    Object.entries(activities).map(([name, activity]) => [
      name,
      cloneActivity(activity),
    ])
  );

/**
 * In-memory registry of extracurricular activities.
 *
 * Activities are fixed at construction; only participant rosters change,
 * through {@link enroll} and {@link withdraw}. Reads hand out copies.
 */
export class ActivityRegistry {
  private readonly seed: ActivityMap;
  private activities: ActivityMap;
  private readonly locks = new KeyedMutex();
  private readonly listeners = new Set<RosterListener>();

  constructor(seed: ActivityMap) {
    this.seed = cloneMap(seed);
    this.activities = cloneMap(seed);
  }

  list(): ActivityMap {
    return cloneMap(this.activities);
  }

  get(activityName: string): Activity {
    return cloneActivity(this.require(activityName));
  }

  async enroll(activityName: string, email: string): Promise<string> {
    this.require(activityName);

    return this.locks.runExclusive(activityName, () => {
      const activity = this.require(activityName);

      if (activity.participants.includes(email)) {
        throw new ConflictError("Student is already signed up for this activity");
      }

      activity.participants.push(email);
      console.log(`[REGISTRY] ${email} signed up for ${activityName}`);
      this.notify(activityName, "signup", email, activity);

      return `Signed up ${email} for ${activityName}`;
    });
  }

  async withdraw(activityName: string, email: string): Promise<string> {
    this.require(activityName);

    return this.locks.runExclusive(activityName, () => {
      const activity = this.require(activityName);
      const index = activity.participants.indexOf(email);

      if (index === -1) {
        throw new ConflictError("Student is not signed up for this activity");
      }

      activity.participants.splice(index, 1);
      console.log(`[REGISTRY] ${email} unregistered from ${activityName}`);
      this.notify(activityName, "unregister", email, activity);

      return `Unregistered ${email} from ${activityName}`;
    });
  }

  /** Puts every roster back to its seed state. */
  reset(): void {
    this.activities = cloneMap(this.seed);
    console.log("[REGISTRY] Rosters reset to seed state");
  }

  /** Returns an unsubscribe function. */
  onChange(listener: RosterListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private require(activityName: string): Activity {
    // Own keys only, so "constructor" and friends are not activities
    if (!Object.prototype.hasOwnProperty.call(this.activities, activityName)) {
      throw new NotFoundError("Activity not found");
    }
    return this.activities[activityName];
  }

  private notify(
    activityName: string,
    action: RosterAction,
    email: string,
    activity: Activity
  ): void {
    for (const listener of this.listeners) {
      try {
        listener({
          activity: activityName,
          action,
          email,
          participants: [...activity.participants],
        });
      } catch (error) {
        console.error(
          `[REGISTRY] Roster listener failed for ${activityName}:`,
          error
        );
      }
    }
  }
}
