export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function getNested(obj: unknown, key: string): Record<string, unknown> | undefined {
  const v = isRecord(obj) ? obj[key] : undefined;
  return isRecord(v) ? v : undefined;
}

export function getString(obj: unknown, key: string): string | undefined {
  const v = isRecord(obj) ? obj[key] : undefined;
  return typeof v === 'string' ? v : undefined;
}

export function getArray(obj: unknown, key: string): unknown[] | undefined {
  const v = isRecord(obj) ? obj[key] : undefined;
  return Array.isArray(v) ? v : undefined;
}

/** Walks `keys` through nested records; undefined as soon as a step is not a record. */
export function getPath(obj: unknown, keys: readonly string[]): unknown {
  let current: unknown = obj;
  for (const key of keys) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

export function toNumeric(v: unknown): number | undefined {
  if (typeof v === 'number') {
    return Number.isFinite(v) ? v : undefined;
  }

  if (typeof v === 'string') {
    const trimmed = v.trim();
    if (trimmed.length === 0) return undefined;
    const normalized = trimmed.replace(/,/g, '');
    const n = Number(normalized);
    return Number.isFinite(n) ? n : undefined;
  }

  return undefined;
}

export function toText(v: unknown): string | undefined {
  return typeof v === 'string' && v.trim().length > 0 ? v : undefined;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
