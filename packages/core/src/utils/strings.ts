/**
 * String helpers shared by the clients and the engine
 */

import type { PersonName } from '../types/index.js';

/**
 * Trim a value and remove one enclosing pair of matching quotes.
 * Custom property values come back from the query endpoint as `"value"`.
 */
export function stripQuotes(value: string): string {
  const trimmed = value.trim();
  if (trimmed.length >= 2) {
    const first = trimmed[0];
    const last = trimmed[trimmed.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return trimmed.slice(1, -1);
    }
  }
  return trimmed;
}

/** Unquote a query cell, mapping null, non-strings and empty values to null */
export function cellText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  const text = stripQuotes(typeof value === 'string' ? value : String(value));
  return text === '' ? null : text;
}

/** Join URL segments, dropping leading and trailing slashes of each part */
export function urlJoin(...parts: string[]): string {
  return parts
    .map((part) => part.replace(/^\/+|\/+$/g, ''))
    .filter((part) => part.length > 0)
    .join('/');
}

/** Empty or whitespace-only strings become null */
export function blankToNull(value: string | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  return value.trim() === '' ? null : value;
}

/** "Given Additional Family" */
export function formatFullName(name: PersonName): string {
  return [name.givenName, name.additionalName, name.familyName]
    .filter((part): part is string => typeof part === 'string' && part.trim() !== '')
    .join(' ');
}

/** Key used to find a person by name: "Given Family" */
export function personNameKey(givenName: string, familyName: string): string {
  return `${givenName.trim()} ${familyName.trim()}`;
}

/** Person reference as written into a user's `isPerson` field: "Family, Given" */
export function formatPersonLink(name: PersonName): string {
  return `${name.familyName.trim()}, ${name.givenName.trim()}`;
}
