/**
 * Errors that are thrown rather than returned as stage results.
 */

/**
 * Raw input could not be turned into a UserProfile. Surfaced verbatim to the caller.
 */
export class InputValidationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid user profile: ${issues.join("; ")}`);
    this.name = "InputValidationError";
    this.issues = issues;
  }
}

/**
 * The allocation request payload is missing a required field.
 */
export class RequestConstructionError extends Error {
  readonly missingFields: string[];

  constructor(missingFields: string[]) {
    super(`Cannot build allocation request, missing: ${missingFields.join(", ")}`);
    this.name = "RequestConstructionError";
    this.missingFields = missingFields;
  }
}
