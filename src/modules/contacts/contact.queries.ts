/**
 * Search queries for one winner
 */

import { env } from '../../config/env';

export interface QuerySubject {
  name: string;
  title?: string | null;
  year?: string | null;
  competition?: string;
}

/**
 * Email queries, most general first, cut to `limit`
 */
export function buildEmailQueries(subject: QuerySubject, limit: number = env.EMAIL_QUERY_LIMIT): string[] {
  const competition = subject.competition ?? env.COMPETITION_NAME;
  const queries = [`"${subject.name}" email`, `"${subject.name}" contact`, `"${subject.name}" ${competition} email`];

  if (subject.title) {
    queries.push(`"${subject.name}" "${subject.title}" email`);
  }
  if (subject.year) {
    queries.push(`"${subject.name}" ${competition} ${subject.year} email`);
  }

  return queries.slice(0, Math.max(0, limit));
}

export function buildProfileQuery(name: string): string {
  return `"${name}" site:linkedin.com/in`;
}

export function searchUrl(query: string, template: string = env.SEARCH_URL_TEMPLATE): string {
  return template.replace('{query}', encodeURIComponent(query));
}
