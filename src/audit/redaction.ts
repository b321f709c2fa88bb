export const REDACTION_MARKER = "[REDACTED]";

export const DEFAULT_SENSITIVE_FIELDS: readonly string[] = [
  "ssn",
  "social_security",
  "password",
  "credit_card",
  "account_number",
  "tax_id",
  "dob",
  "date_of_birth",
  "driver_license",
  "passport",
];

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

export const isSensitiveKey = (
  key: string,
  fields: readonly string[],
): boolean => {
  const lowered = key.toLowerCase();
  return fields.some((field) => lowered.includes(field.toLowerCase()));
};

const redactValue = (value: unknown, fields: readonly string[]): unknown => {
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item, fields));
  }
  if (isRecord(value)) {
    return redactRecord(value, fields);
  }
  return value;
};

/** Returns a copy with every sensitive key, at any depth, masked. */
export const redactRecord = (
  record: Record<string, unknown>,
  fields: readonly string[] = DEFAULT_SENSITIVE_FIELDS,
): Record<string, unknown> =>
  Object.fromEntries(
    Object.entries(record).map(([key, value]) => [
      key,
      isSensitiveKey(key, fields) ? REDACTION_MARKER : redactValue(value, fields),
    ]),
  );
