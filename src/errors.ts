/**
 * Fatal error types.
 *
 * Per-entity conditions (no history, column mismatch, non-finite cells) are
 * returned as data and never thrown; only inputs that no entity could be
 * processed from end up here.
 */

export class InvalidTableError extends Error {
  public readonly missingColumns: string[];

  constructor(missingColumns: string[]) {
    super(`Invalid observation table: missing reserved column(s) ${missingColumns.join(', ')}`);
    this.name = 'InvalidTableError';
    this.missingColumns = missingColumns;
  }
}

export class ModelFormatError extends Error {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid model file: ${issues.join('; ')}`);
    this.name = 'ModelFormatError';
    this.issues = issues;
  }
}
