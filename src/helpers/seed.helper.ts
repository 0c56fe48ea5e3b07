import seedData from "../data/activities.json";
import type { Activity, ActivityMap } from "../types/activity.types";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

function parseActivity(name: string, raw: unknown): Activity {
  if (!isRecord(raw)) {
    throw new Error(`Seed activity "${name}" must be an object`);
  }

  const { description, schedule, max_participants, participants } = raw;

  if (typeof description !== "string" || typeof schedule !== "string") {
    throw new Error(
      `Seed activity "${name}" needs string description and schedule`
    );
  }
  if (
    typeof max_participants !== "number" ||
    !Number.isInteger(max_participants) ||
    max_participants < 0
  ) {
    throw new Error(
      `Seed activity "${name}" has invalid max_participants: ${String(
        max_participants
      )}`
    );
  }
  if (
    !Array.isArray(participants) ||
    !participants.every((p): p is string => typeof p === "string")
  ) {
    throw new Error(`Seed activity "${name}" participants must be strings`);
  }
  if (new Set(participants).size !== participants.length) {
    throw new Error(`Seed activity "${name}" lists a participant twice`);
  }

  return {
    description,
    schedule,
    max_participants,
    participants: [...participants],
  };
}

/**
 * Validates raw seed data (name -> activity) and returns a fresh copy.
 * Throws on the first malformed entry.
 */
export function parseActivitySeed(raw: unknown): ActivityMap {
  if (!isRecord(raw)) {
    throw new Error("Activity seed must be an object keyed by activity name");
  }

  const activities: ActivityMap = {};
  for (const [name, entry] of Object.entries(raw)) {
    if (!name.trim()) {
      throw new Error("Activity names cannot be blank");
    }
    activities[name] = parseActivity(name, entry);
  }
  return activities;
}

export function loadDefaultSeed(): ActivityMap {
  return parseActivitySeed(seedData);
}
