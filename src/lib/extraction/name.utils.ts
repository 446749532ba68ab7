/**
 * Person name helpers
 */

export interface PersonName {
  first: string;
  last: string;
}

/**
 * Split a finalist name. Listings write "Last, First"; several finalists are
 * separated by ";" and only the first one is used.
 */
export function parsePersonName(raw: string): PersonName {
  const primary = raw.split(';')[0].trim();

  if (primary.includes(',')) {
    const [last, rest] = primary.split(',', 2);
    return { first: rest.trim(), last: last.trim() };
  }

  const parts = primary.split(/\s+/).filter((part) => part.length > 0);
  if (parts.length < 2) {
    return { first: parts[0] ?? '', last: '' };
  }
  return { first: parts[0], last: parts[parts.length - 1] };
}

/**
 * "Doe, Jane" becomes "Jane Doe"
 */
export function displayName(raw: string): string {
  const { first, last } = parsePersonName(raw);
  return [first, last].filter((part) => part.length > 0).join(' ');
}
