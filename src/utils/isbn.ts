import { ConflictError, ValidationError } from './errors';

const MAX_ISBN_LENGTH = 20;
const ISBN_10 = /^\d{9}[\dX]$/;
const ISBN_13 = /^\d{13}$/;

/** Minimal view of an existing copy needed for the identity check. */
export type IsbnCopy = {
  title: string;
  author: string;
};

export type ConsistencyResult = { ok: true } | { ok: false; isbn: string; field: 'title' | 'author'; expected: string };

/**
 * Canonicalizes a raw ISBN: hyphens and whitespace are stripped. The ISBN-10
 * check character must be an upper-case `X`.
 * @param raw ISBN as entered.
 * @returns Canonical ISBN-10 or ISBN-13 string.
 * @throws {ValidationError} When the result is not ISBN-10 or ISBN-13 shaped.
 */
export function normalizeIsbn(raw: string): string {
  const stripped = raw.replace(/[-\s]/g, '');

  if (stripped.length > MAX_ISBN_LENGTH) {
    throw new ValidationError(`ISBN must not exceed ${MAX_ISBN_LENGTH} characters`);
  }
  if (stripped.length === 10) {
    if (!ISBN_10.test(stripped)) {
      throw new ValidationError('Invalid ISBN-10 format');
    }
    return stripped;
  }
  if (stripped.length === 13) {
    if (!ISBN_13.test(stripped)) {
      throw new ValidationError('Invalid ISBN-13 format');
    }
    return stripped;
  }
  throw new ValidationError('ISBN must be 10 or 13 characters (hyphens and spaces allowed)');
}

/**
 * Compares a candidate registration with the copies already stored under the
 * same ISBN. No copies means the candidate becomes the reference copy.
 * Comparison is exact and case-sensitive.
 * @param isbn Canonical ISBN of the candidate.
 * @param title Candidate title.
 * @param author Candidate author.
 * @param existing Copies already persisted with that ISBN.
 */
export function checkIsbnConsistency(
  isbn: string,
  title: string,
  author: string,
  existing: readonly IsbnCopy[]
): ConsistencyResult {
  for (const copy of existing) {
    if (copy.title !== title) {
      return { ok: false, isbn, field: 'title', expected: copy.title };
    }
    if (copy.author !== author) {
      return { ok: false, isbn, field: 'author', expected: copy.author };
    }
  }
  return { ok: true };
}

/**
 * Throwing form of {@link checkIsbnConsistency}.
 * @throws {ConflictError} Naming the ISBN and the field that differs.
 */
export function assertIsbnConsistency(
  isbn: string,
  title: string,
  author: string,
  existing: readonly IsbnCopy[]
): void {
  const result = checkIsbnConsistency(isbn, title, author, existing);
  if (!result.ok) {
    throw new ConflictError(
      `ISBN ${result.isbn} is already registered with ${result.field} '${result.expected}'`
    );
  }
}
