import { ValidationError } from '@wxgate/domain';
import { isPresent, type RawFields } from './fields.js';

/** Fail on the first name, in order, whose value is absent, empty or zero. */
export function requireParams(fields: RawFields, names: readonly string[]): void {
  for (const name of names) {
    if (!isPresent(fields[name])) {
      throw new ValidationError(name);
    }
  }
}

/** At least one of `names` must be present. Returns the present names in order. */
export function requireAnyParam(fields: RawFields, names: readonly string[]): string[] {
  const present = names.filter((name) => isPresent(fields[name]));
  if (present.length === 0) {
    const joined = names.join('|');
    throw new ValidationError(joined, `Missing required parameters "${joined}": provide at least one.`);
  }
  return present;
}

/** Exactly one of `names` must be present. Returns its name. */
export function requireExactlyOneParam(fields: RawFields, names: readonly string[]): string {
  const present = requireAnyParam(fields, names);
  const [only] = present;
  if (present.length > 1 || only === undefined) {
    const joined = names.join('|');
    throw new ValidationError(joined, `Parameters "${joined}" are mutually exclusive: provide exactly one.`);
  }
  return only;
}
