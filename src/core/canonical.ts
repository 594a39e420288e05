function canonicalizeInternal(value: unknown): unknown {
  if (value === null) return null;
  if (value === undefined) return undefined;
  const type = typeof value;
  if (type === "string" || type === "boolean") return value;
  if (type === "number") return Number.isFinite(value) ? value : null;
  if (type === "symbol" || type === "function" || type === "bigint") return undefined;

  if (Array.isArray(value)) {
    return value.map((item) => {
      const normalized = canonicalizeInternal(item);
      return normalized === undefined ? null : normalized;
    });
  }

  if (typeof value === "object") {
    const output: Record<string, unknown> = {};
    const entries = Object.entries(value).sort(([leftKey], [rightKey]) =>
      leftKey < rightKey ? -1 : leftKey > rightKey ? 1 : 0,
    );
    for (const [key, entryValue] of entries) {
      const normalized = canonicalizeInternal(entryValue);
      if (normalized !== undefined) {
        output[key] = normalized;
      }
    }
    return output;
  }

  return JSON.stringify(String(value));
}

/**
 * Serialize an options record with sorted keys so equal configurations hash equally.
 */
export function canonicalModelStringify(value: unknown): string {
  const normalized = canonicalizeInternal(value);
  return JSON.stringify(normalized === undefined ? null : normalized);
}
