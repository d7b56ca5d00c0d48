/** String fields of a parsed form body, for re-rendering a rejected form. */
export function pickFormValues<K extends string>(
  body: unknown,
  keys: readonly K[],
): Partial<Record<K, string>> {
  const values: Partial<Record<K, string>> = {};
  if (typeof body !== "object" || body === null) return values;
  for (const key of keys) {
    const value: unknown = Reflect.get(body, key);
    if (typeof value === "string") values[key] = value;
  }
  return values;
}

/** Redact email for logging (avoid logging the address in plain text). */
export function redactEmail(email: string): string {
  const s = email.trim();
  if (!s || !s.includes("@")) return "(invalid)";
  const [local, domain] = s.split("@");
  if (!domain) return "(invalid)";
  const showLocal = local.length <= 2 ? "**" : local.slice(0, 1) + "***";
  return `${showLocal}@${domain}`;
}
