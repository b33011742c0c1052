import { assertIsbnConsistency, checkIsbnConsistency, normalizeIsbn } from '../src/utils/isbn';
import { ConflictError, ValidationError } from '../src/utils/errors';

describe('normalizeIsbn', () => {
  test('strips hyphens and spaces from an ISBN-13', () => {
    expect(normalizeIsbn('978-0-306-40615-7')).toBe('9780306406157');
    expect(normalizeIsbn('978 0 306 40615 7')).toBe('9780306406157');
  });

  test('hyphenated and bare forms normalize to the same value', () => {
    expect(normalizeIsbn('978-0-13-468599-1')).toBe(normalizeIsbn('9780134685991'));
    expect(normalizeIsbn('9780134685991')).toBe('9780134685991');
  });

  test('keeps an upper-case X check character on an ISBN-10', () => {
    expect(normalizeIsbn('0-8044-2957-X')).toBe('080442957X');
  });

  test('rejects a lower-case x check character', () => {
    expect(() => normalizeIsbn('0-8044-2957-x')).toThrow(new ValidationError('Invalid ISBN-10 format'));
  });

  test('rejects an X anywhere but the last ISBN-10 position', () => {
    expect(() => normalizeIsbn('08044X9571')).toThrow(new ValidationError('Invalid ISBN-10 format'));
  });

  test('rejects letters in an ISBN-13', () => {
    expect(() => normalizeIsbn('978030640615X')).toThrow(new ValidationError('Invalid ISBN-13 format'));
  });

  test('rejects other lengths', () => {
    expect(() => normalizeIsbn('12345')).toThrow(
      new ValidationError('ISBN must be 10 or 13 characters (hyphens and spaces allowed)')
    );
  });

  test('rejects input longer than 20 characters after stripping', () => {
    expect(() => normalizeIsbn('123456789012345678901')).toThrow(
      new ValidationError('ISBN must not exceed 20 characters')
    );
  });
});

describe('ISBN consistency', () => {
  const reference = [{ title: 'Dune', author: 'Frank Herbert' }];

  test('accepts the first copy of an ISBN', () => {
    expect(checkIsbnConsistency('9780441013593', 'Dune', 'Frank Herbert', [])).toEqual({ ok: true });
  });

  test('accepts a copy matching the stored title and author', () => {
    expect(checkIsbnConsistency('9780441013593', 'Dune', 'Frank Herbert', reference)).toEqual({ ok: true });
  });

  test('reports a title mismatch', () => {
    expect(checkIsbnConsistency('9780441013593', 'Dune Messiah', 'Frank Herbert', reference)).toEqual({
      ok: false,
      isbn: '9780441013593',
      field: 'title',
      expected: 'Dune'
    });
  });

  test('comparison is case-sensitive', () => {
    expect(checkIsbnConsistency('9780441013593', 'Dune', 'frank herbert', reference)).toEqual({
      ok: false,
      isbn: '9780441013593',
      field: 'author',
      expected: 'Frank Herbert'
    });
  });

  test('assertIsbnConsistency throws a conflict naming the field', () => {
    expect(() => assertIsbnConsistency('9780441013593', 'Dune', 'F. Herbert', reference)).toThrow(
      new ConflictError("ISBN 9780441013593 is already registered with author 'Frank Herbert'")
    );
  });
});
