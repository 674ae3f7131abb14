export type IdentityFields = Record<string, string | null>;

export type RawExtractRow = {
  rowId: string;
  studentCode: string;
  compiledField: string | null;
  category: string | null;
  occurredAt: string | null;
  entryId: string | null;
  passthrough: IdentityFields;
};

export const GOAL_STATUSES = ['active', 'progressing', 'no_progress', 'met', 'not_applicable'] as const;

export type GoalStatus = (typeof GOAL_STATUSES)[number];

type RecordBase = {
  studentCode: string;
  date: string; // yyyy-MM-dd
  identity: IdentityFields;
};

export type SessionRecord = RecordBase & {
  factType: 'session';
  value: string;
};

export type GoalRecord = RecordBase & {
  factType: 'goal';
  category: string;
  goalType: string;
  status: GoalStatus;
};

// An education plan entry seen for the student, with or without goals.
export type PlanRecord = RecordBase & {
  factType: 'plan';
};

export type NormalizedRecord = SessionRecord | GoalRecord | PlanRecord;

export type SessionFact = {
  date: string;
  value: string;
};

export type GoalState = {
  status: GoalStatus;
  date: string;
};

export type StudentSummary = {
  studentCode: string;
  sessionCount: number;
  sessionFacts: SessionFact[];
  goals: Record<string, GoalState>;
  lastSeenDate: string | null;
  identity: IdentityFields;
};

export type MasterRow = StudentSummary;

export type MasterTable = readonly MasterRow[];

export type RowError = {
  rowId: string;
  studentCode: string;
  reason: string;
};

export type ChangeSummary = {
  appended: number;
  updated: number;
  unchanged: number;
  errors: RowError[];
};

export type RowChange = 'appended' | 'updated' | 'unchanged';
