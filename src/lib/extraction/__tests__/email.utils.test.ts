/**
 * Email Utility Tests
 */

import { extractEmails, isAcceptableEmail, isValidEmailSyntax, normalizeEmail, rejectionReason } from '../email.utils';

describe('isAcceptableEmail', () => {
  it('should accept a personal university address', () => {
    expect(isAcceptableEmail('jane.doe@stanford.edu')).toBe(true);
  });

  it.each([
    ['noreply@example.com'],
    ['not-an-email'],
    ['no-reply@school.edu'],
    ['webmaster@school.edu'],
    ['someone@test.com'],
    ['feedback@duckduckgo.com'],
    ['logo@2x.png'],
  ])('should reject %s', (email) => {
    expect(isAcceptableEmail(email)).toBe(false);
  });

  it('should reject subdomains of junk domains', () => {
    expect(isAcceptableEmail('press@mail.google.com')).toBe(false);
  });
});

describe('rejectionReason', () => {
  it('should explain each rejection', () => {
    expect(rejectionReason('not-an-email')).toBe('malformed');
    expect(rejectionReason('icon@sprite.svg')).toBe('looks like a file name');
    expect(rejectionReason('postmaster@school.edu')).toBe('generic mailbox');
    expect(rejectionReason('contact@example.org')).toBe('junk domain');
    expect(rejectionReason('jane.doe@stanford.edu')).toBeNull();
  });
});

describe('isValidEmailSyntax', () => {
  it('should reject dots in the wrong places', () => {
    expect(isValidEmailSyntax('.jane@school.edu')).toBe(false);
    expect(isValidEmailSyntax('jane..doe@school.edu')).toBe(false);
    expect(isValidEmailSyntax('jane@-school.edu')).toBe(false);
  });

  it('should accept plus addressing', () => {
    expect(isValidEmailSyntax('jane+fair@school.edu')).toBe(true);
  });
});

describe('normalizeEmail', () => {
  it('should trim and lowercase', () => {
    expect(normalizeEmail('  Jane.Doe@Stanford.EDU ')).toBe('jane.doe@stanford.edu');
  });
});

describe('extractEmails', () => {
  it('should find acceptable addresses once, in order', () => {
    const text = 'Reach Jane at jane.doe@stanford.edu or JANE.DOE@stanford.edu; bounces go to noreply@example.com. ' +
      'Her lab: moss-lab@biology.school.edu';

    expect(extractEmails(text)).toEqual(['jane.doe@stanford.edu', 'moss-lab@biology.school.edu']);
  });

  it('should return nothing for text without addresses', () => {
    expect(extractEmails('no contact details here')).toEqual([]);
  });
});
