/**
 * Goal data structures
 */

export const GOAL_CATEGORIES = [
  "emergency",
  "retirement",
  "debt",
  "health",
  "education",
  "home",
  "children",
  "marriage",
  "business",
  "vehicle",
  "travel",
  "wealth",
  "other",
] as const;

export type GoalCategory = (typeof GOAL_CATEGORIES)[number];

/** Priority given to text that matches no keyword; lower numbers rank first. */
export const OTHER_GOAL_PRIORITY = 99;

export interface GoalRecord {
  category: GoalCategory;
  priority: number;
  rawText: string;
}

/**
 * Sort goal records by priority, then category, then text.
 * The result does not depend on the order of the input.
 */
export function sortGoalRecords(records: GoalRecord[]): GoalRecord[] {
  return [...records].sort(
    (a, b) =>
      a.priority - b.priority ||
      compareText(a.category, b.category) ||
      compareText(a.rawText, b.rawText)
  );
}

/**
 * Get the highest-priority goal, if any
 */
export function getPrimaryGoal(records: GoalRecord[]): GoalRecord | null {
  return sortGoalRecords(records)[0] ?? null;
}

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
