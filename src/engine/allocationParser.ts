import { AllocationCandidate, ASSET_CLASSES, AssetClass } from "../models/AssetClass";
import { fail, MalformedAllocationFailure, ok, Result } from "../models/PipelineResult";
import {
  AllocationBlockSchema,
  formatIssues,
  ProposalMeta,
  ProposalMetaSchema,
} from "../utils/validation";

/**
 * An allocation proposal that passed structural validation.
 * Weights are within [0, 100] but are not yet known to sum to 100.
 */
export interface ParsedProposal {
  allocation: AllocationCandidate;
  rationale: string | null;
  nextSteps: string[];
}

interface ExtractedBlock {
  block: string;
  surroundingText: string;
}

const META_KEYS = new Set(["rationale", "narrative", "nextSteps", "next_steps"]);
const NESTED_ALLOCATION_KEYS = ["allocation", "allocations"];

const CANONICAL_BY_NORMALIZED_KEY = new Map<string, AssetClass>(
  ASSET_CLASSES.map((assetClass) => [normalizeKey(assetClass), assetClass])
);

function normalizeKey(key: string): string {
  return key.toLowerCase().replace(/[^a-z0-9]/g, "");
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Index of the "}" closing the object that opens at `start`, or -1.
 * Braces inside JSON strings are not counted.
 */
function findClosingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i += 1) {
    const char = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === "\\") escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') {
      inString = true;
    } else if (char === "{") {
      depth += 1;
    } else if (char === "}") {
      depth -= 1;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function parseObject(block: string): Record<string, unknown> | null {
  try {
    const value: unknown = JSON.parse(block);
    return isPlainObject(value) ? value : null;
  } catch {
    return null;
  }
}

function looksLikeAllocation(value: Record<string, unknown>): boolean {
  return Object.keys(value).some(
    (key) => NESTED_ALLOCATION_KEYS.includes(key) || CANONICAL_BY_NORMALIZED_KEY.has(normalizeKey(key))
  );
}

/**
 * Locate the structured block inside free-form response text.
 *
 * A fenced code block wins. Otherwise every balanced {...} span is tried in order:
 * the first JSON object with an asset-class or allocation key is taken, then the first
 * JSON object of any shape, then the first span as-is so its parse error can be reported.
 */
export function extractAllocationBlock(text: string): ExtractedBlock | null {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  if (fenced && fenced.index !== undefined && fenced[1].includes("{")) {
    return {
      block: fenced[1].trim(),
      surroundingText: text.slice(0, fenced.index) + text.slice(fenced.index + fenced[0].length),
    };
  }

  const spans: Array<{ start: number; end: number; value: Record<string, unknown> | null }> = [];
  for (let start = text.indexOf("{"); start >= 0; start = text.indexOf("{", start + 1)) {
    const end = findClosingBrace(text, start);
    if (end >= 0) {
      spans.push({ start, end, value: parseObject(text.slice(start, end + 1)) });
    }
  }

  const chosen =
    spans.find((span) => span.value !== null && looksLikeAllocation(span.value)) ??
    spans.find((span) => span.value !== null) ??
    spans[0];
  if (!chosen) {
    return null;
  }
  return {
    block: text.slice(chosen.start, chosen.end + 1),
    surroundingText: text.slice(0, chosen.start) + text.slice(chosen.end + 1),
  };
}

/**
 * Pick the allocation map out of a parsed block: either a nested
 * "allocation"/"allocations" object or the block itself minus prose fields.
 */
function selectAllocationMap(block: Record<string, unknown>): Record<string, unknown> {
  for (const key of NESTED_ALLOCATION_KEYS) {
    const nested = block[key];
    if (isPlainObject(nested)) {
      return nested;
    }
  }
  const map: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(block)) {
    if (!META_KEYS.has(key)) {
      map[key] = value;
    }
  }
  return map;
}

/**
 * Map raw keys onto asset-class identifiers, ignoring case and separators.
 * Unknown and duplicate keys are reported as issues.
 */
function normalizeAllocationKeys(
  map: Record<string, unknown>
): { normalized: Record<string, unknown>; issues: string[] } {
  const normalized: Record<string, unknown> = {};
  const issues: string[] = [];

  for (const [rawKey, value] of Object.entries(map)) {
    const assetClass = CANONICAL_BY_NORMALIZED_KEY.get(normalizeKey(rawKey));
    if (!assetClass) {
      issues.push(`Unknown asset class "${rawKey}"`);
      continue;
    }
    if (assetClass in normalized) {
      issues.push(`Duplicate asset class "${rawKey}"`);
      continue;
    }
    normalized[assetClass] = value;
  }

  return { normalized, issues };
}

function toSteps(value: string | string[] | undefined): string[] {
  if (value === undefined) return [];
  const lines = Array.isArray(value) ? value : value.split(/\r?\n/);
  return lines
    .map((line) => line.replace(/^\s*(?:[-*•]|\d+[.)])\s*/, "").trim())
    .filter((line) => line.length > 0);
}

function extractMeta(
  block: Record<string, unknown>,
  surroundingText: string
): { rationale: string | null; nextSteps: string[] } {
  const meta = ProposalMetaSchema.safeParse(block);
  const fields: ProposalMeta = meta.success ? meta.data : {};
  const prose = surroundingText.trim();
  const rationale = (fields.rationale ?? fields.narrative ?? "").trim() || prose || null;

  return {
    rationale,
    nextSteps: toSteps(fields.nextSteps ?? fields.next_steps),
  };
}

/**
 * Parse raw completion text into a structurally valid allocation proposal.
 *
 * Rejects the whole proposal when any asset class is missing, unknown, duplicated,
 * non-numeric or outside [0, 100]. The sum is left to the constraint adjuster.
 */
export function parseAllocationResponse(
  text: string
): Result<ParsedProposal, MalformedAllocationFailure> {
  const malformed = (issues: string[]) =>
    fail<MalformedAllocationFailure>({ type: "malformed-allocation", issues });

  const extracted = extractAllocationBlock(text);
  if (!extracted) {
    return malformed(["No allocation block found in response"]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(extracted.block);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return malformed([`Allocation block is not valid JSON: ${message}`]);
  }

  if (!isPlainObject(parsed)) {
    return malformed(["Allocation block must be a JSON object"]);
  }

  const { normalized, issues } = normalizeAllocationKeys(selectAllocationMap(parsed));
  const validation = AllocationBlockSchema.safeParse(normalized);
  const allIssues = validation.success ? issues : [...issues, ...formatIssues(validation.error)];

  if (!validation.success || allIssues.length > 0) {
    return malformed(allIssues);
  }

  return ok({
    allocation: validation.data,
    ...extractMeta(parsed, extracted.surroundingText),
  });
}
