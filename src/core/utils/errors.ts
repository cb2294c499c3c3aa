import { inspect } from 'node:util';

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

/** Turns anything thrown into an Error; real Errors pass through untouched. */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  if (typeof value === 'string') return new Error(value);
  if (isRecord(value) && typeof value.message === 'string') {
    return new Error(value.message, { cause: value });
  }

  let text: string;
  try {
    text = JSON.stringify(value) ?? String(value);
  } catch {
    text = inspect(value, { depth: 2 });
  }
  return new Error(text, { cause: value });
}

/** Message for a user-facing reply; blank messages become `fallback`. */
export function getErrorMessage(value: unknown, fallback = 'Unknown error'): string {
  return toError(value).message.trim() || fallback;
}
