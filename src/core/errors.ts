export type ValidatedField = 'version' | 'system' | 'architecture' | 'osarch';

/**
 * Raised when a filter refuses its input. Carries enough to tell the caller which
 * input was wrong and which check rejected it.
 */
export class ValidationError extends Error {
  readonly filter: string;
  readonly field: ValidatedField;
  readonly values: readonly string[];
  readonly check: string;

  constructor(filter: string, field: ValidatedField, values: readonly string[], check: string) {
    const shown = values.map(v => JSON.stringify(v)).join(', ');
    super(`Invalid ${field} ${shown}: rejected by ${check} in filter "${filter}"`);
    this.name = 'ValidationError';
    this.filter = filter;
    this.field = field;
    this.values = values;
    this.check = check;
  }
}
