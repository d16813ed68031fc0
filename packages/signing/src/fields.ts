export type FieldValue = string | number | null | undefined;

/** Caller-supplied request fields before they are rendered for the wire. */
export type RawFields = Readonly<Record<string, FieldValue>>;

/** Wire-ready fields: every value is a string. */
export type SignableFields = Readonly<Record<string, string>>;

export function isPresent(value: FieldValue): boolean {
  return value !== undefined && value !== null && value !== '' && value !== 0;
}

/** Drop absent values and render numbers, keeping empty strings as sent. */
export function toSignableFields(fields: RawFields): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined || value === null) {
      continue;
    }
    result[key] = String(value);
  }
  return result;
}
