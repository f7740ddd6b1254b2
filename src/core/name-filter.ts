import { type ValidatedField, ValidationError } from './errors';

export type Transform<A extends readonly string[]> = (...args: A) => string;
export type Check<A extends readonly string[]> = (...args: A) => boolean;

export interface NameFilterOptions<A extends readonly string[], T> {
  /** Shapes the inputs into a lookup key. Defaults to identity. */
  f?: Transform<A>;
  /** Overrides for particular keys; a key missing here is returned as is. */
  rules?: Readonly<Record<string, T>>;
  validate?: Check<A>;
}

export function identity(...args: readonly string[]): string {
  return args.join('-');
}

export function noValidate(): boolean {
  return true;
}

/** First character upper-cased, the rest lower-cased. */
export function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1).toLowerCase();
}

export class NameFilter<A extends readonly string[] = [string], T = string> {
  readonly name: string;
  readonly field: ValidatedField;
  private readonly f: Transform<A>;
  private readonly rules: Readonly<Record<string, T>>;
  private readonly validate: Check<A>;

  constructor(name: string, field: ValidatedField, options: NameFilterOptions<A, T> = {}) {
    this.name = name;
    this.field = field;
    this.f = options.f ?? identity;
    this.rules = options.rules ?? {};
    this.validate = options.validate ?? noValidate;
  }

  apply(...args: A): string | T {
    if (!this.validate(...args)) {
      throw new ValidationError(this.name, this.field, args, this.validate.name || 'validate');
    }
    const key = this.f(...args);
    if (Object.prototype.hasOwnProperty.call(this.rules, key)) {
      return this.rules[key];
    }
    return key;
  }
}
