/**
 * Email Utilities
 * Pattern matching and the rejection list for candidate addresses
 */

/** RFC-5322-lite: good enough to spot addresses in page text */
const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/g;

const EMAIL_SYNTAX = /^[A-Za-z0-9._%+-]+@[A-Za-z0-9-]+(?:\.[A-Za-z0-9-]+)*\.[A-Za-z]{2,}$/;

const JUNK_DOMAINS = [
  'example.com',
  'example.org',
  'example.net',
  'test.com',
  'domain.com',
  'email.com',
  'yourdomain.com',
  'google.com',
  'facebook.com',
  'twitter.com',
  'instagram.com',
  'youtube.com',
  'linkedin.com',
  'duckduckgo.com',
  'sentry.io',
];

const JUNK_LOCAL_PARTS = ['noreply', 'no-reply', 'donotreply', 'do-not-reply', 'mailer-daemon', 'postmaster', 'webmaster'];

const IMAGE_EXTENSIONS = ['png', 'jpg', 'jpeg', 'gif', 'svg', 'webp', 'bmp', 'ico'];

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function isValidEmailSyntax(email: string): boolean {
  const trimmed = email.trim();
  if (trimmed.length > 254 || !EMAIL_SYNTAX.test(trimmed)) return false;

  const [localPart, domain] = trimmed.split('@');
  if (localPart.startsWith('.') || localPart.endsWith('.') || localPart.includes('..')) return false;
  return domain.split('.').every((label) => label.length > 0 && !label.startsWith('-') && !label.endsWith('-'));
}

/**
 * Why an address is not worth storing, or null when it is acceptable
 */
export function rejectionReason(email: string): string | null {
  if (!isValidEmailSyntax(email)) return 'malformed';

  const [localPart, domain] = normalizeEmail(email).split('@');
  const tld = domain.slice(domain.lastIndexOf('.') + 1);

  if (IMAGE_EXTENSIONS.includes(tld)) return 'looks like a file name';
  if (JUNK_LOCAL_PARTS.some((junk) => localPart.startsWith(junk))) return 'generic mailbox';
  if (JUNK_DOMAINS.some((junk) => domain === junk || domain.endsWith(`.${junk}`))) return 'junk domain';

  return null;
}

export function isAcceptableEmail(email: string): boolean {
  return rejectionReason(email) === null;
}

/**
 * Find acceptable addresses in free text, unique (case-insensitive) in order of appearance
 */
export function extractEmails(text: string): string[] {
  const seen = new Set<string>();
  const emails: string[] = [];

  for (const match of text.match(EMAIL_PATTERN) ?? []) {
    const key = normalizeEmail(match);
    if (seen.has(key) || !isAcceptableEmail(match)) continue;
    seen.add(key);
    emails.push(match);
  }

  return emails;
}
