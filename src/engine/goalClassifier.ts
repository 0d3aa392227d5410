import goalKeywordData from "../data/goalKeywords.json";
import { GoalCategory, GoalRecord, OTHER_GOAL_PRIORITY, sortGoalRecords } from "../models/Goal";
import { GoalKeywordTableSchema } from "../utils/validation";

/**
 * A category's keywords compiled to whole-word patterns.
 */
interface CategoryMatcher {
  category: GoalCategory;
  priority: number;
  patterns: RegExp[];
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Compile a keyword into a case-insensitive whole-word pattern.
 * A trailing plural "s" is accepted, so "car" matches "cars" but not "career".
 * The word may also be glued to one of `compoundHeads`: with "grand",
 * "children" matches "grandchildren".
 */
export function compileKeyword(keyword: string, compoundHeads: readonly string[] = []): RegExp {
  const phrase = keyword
    .trim()
    .toLowerCase()
    .split(/\s+/)
    .map(escapeRegExp)
    .join("\\s+");
  const heads = compoundHeads.length > 0 ? `(?:${compoundHeads.map(escapeRegExp).join("|")})?` : "";
  return new RegExp(`\\b${heads}${phrase}s?\\b`, "i");
}

const MATCHERS: CategoryMatcher[] = GoalKeywordTableSchema.parse(goalKeywordData).categories.map(
  (entry) => ({
    category: entry.category,
    priority: entry.priority,
    patterns: entry.keywords.map((keyword) => compileKeyword(keyword, entry.compoundHeads)),
  })
);

/**
 * Categories whose keywords appear in a single goal description.
 */
export function matchGoalCategories(text: string): Array<{ category: GoalCategory; priority: number }> {
  return MATCHERS.filter((matcher) => matcher.patterns.some((pattern) => pattern.test(text))).map(
    (matcher) => ({ category: matcher.category, priority: matcher.priority })
  );
}

/**
 * Classify goal descriptions into ordered goal records.
 *
 * Each description yields one record per matching category, or a single "other"
 * record when nothing matches. Identical (category, text) pairs collapse to one.
 * Records are ordered by priority, so security goals such as retirement come before
 * discretionary ones such as a vehicle purchase.
 */
export function classifyGoals(descriptions: readonly string[]): GoalRecord[] {
  const records = new Map<string, GoalRecord>();

  for (const description of descriptions) {
    const rawText = description.trim().replace(/\s+/g, " ");
    if (!rawText) continue;

    const matches = matchGoalCategories(rawText);
    const categories = matches.length > 0
      ? matches
      : [{ category: "other" as const, priority: OTHER_GOAL_PRIORITY }];

    for (const { category, priority } of categories) {
      const key = `${category}\u0000${rawText}`;
      if (!records.has(key)) {
        records.set(key, { category, priority, rawText });
      }
    }
  }

  return sortGoalRecords([...records.values()]);
}
