export interface Activity {
  description: string;
  schedule: string;
  max_participants: number;
  participants: string[];
}

export type ActivityMap = Record<string, Activity>;

export type RosterAction = "signup" | "unregister";

export interface RosterChange {
  activity: string;
  action: RosterAction;
  email: string;
  participants: string[];
}

export type RosterListener = (change: RosterChange) => void;
