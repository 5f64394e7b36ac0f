import { Timestamp } from 'firebase-admin/firestore';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value)
  );
}

export function readString(
  data: Record<string, unknown>,
  key: string
): string | null {
  const value = data[key];
  if (typeof value === 'string') {
    return value;
  }
  return null;
}

export function readNumber(
  data: Record<string, unknown>,
  key: string
): number | null {
  const value = data[key];
  if (typeof value === 'number') {
    return value;
  }
  return null;
}

export function readBoolean(
  data: Record<string, unknown>,
  key: string
): boolean | null {
  const value = data[key];
  if (typeof value === 'boolean') {
    return value;
  }
  return null;
}

export function readNullableString(
  data: Record<string, unknown>,
  key: string
): string | null | undefined {
  const value = data[key];
  if (value === null) {
    return null;
  }
  if (value === undefined) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  return undefined;
}

/**
 * Reads a list of strings. A delimited string is accepted too, since older
 * documents stored joints and instructions unsplit.
 */
export function readStringList(
  data: Record<string, unknown>,
  key: string,
  delimiter: string
): string[] | null {
  const value = data[key];
  if (typeof value === 'string') {
    return splitDelimited(value, delimiter);
  }
  if (!Array.isArray(value)) {
    return null;
  }
  if (!value.every((entry): entry is string => typeof entry === 'string')) {
    return null;
  }
  return value;
}

export function splitDelimited(value: string, delimiter: string): string[] {
  return value
    .split(delimiter)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/**
 * Timestamps written by this service are ISO strings; documents created by
 * other collaborators may hold Firestore Timestamps instead.
 */
export function readTimestamp(
  data: Record<string, unknown>,
  key: string
): string | null {
  const value = data[key];
  if (typeof value === 'string') {
    return value;
  }
  if (value instanceof Timestamp) {
    return value.toDate().toISOString();
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return null;
}

export function readEnum<T extends string>(
  data: Record<string, unknown>,
  key: string,
  allowed: readonly T[]
): T | null {
  const value = data[key];
  if (typeof value !== 'string') {
    return null;
  }
  return allowed.find((option) => option === value) ?? null;
}
