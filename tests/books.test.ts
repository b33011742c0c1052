import request from 'supertest';
import { app, createBookAs, resetDatabase, seedUser } from './setup';

const auth = (token: string) => ({ Authorization: `Bearer ${token}` });

describe('books', () => {
  let librarian: string;
  let member: string;

  beforeEach(async () => {
    resetDatabase();
    librarian = (await seedUser('lib@example.com', { role: 'librarian' })).token;
    member = (await seedUser('member@example.com')).token;
  });

  test('registration normalizes the ISBN and starts available', async () => {
    const res = await request(app)
      .post('/books')
      .set(auth(librarian))
      .send({ isbn: '0-8044-2957-X', title: 'The Cuckoo', author: 'A. Writer' });

    expect(res.status).toBe(201);
    expect(res.body.data).toMatchObject({
      isbn: '080442957X',
      title: 'The Cuckoo',
      author: 'A. Writer',
      isAvailable: true
    });
  });

  test('malformed ISBN is invalid', async () => {
    const res = await request(app)
      .post('/books')
      .set(auth(librarian))
      .send({ isbn: '12-34', title: 'Short', author: 'Nobody' });

    expect(res.status).toBe(400);
    expect(res.body.error).toEqual({
      message: 'ISBN must be 10 or 13 characters (hyphens and spaces allowed)',
      code: 'INVALID'
    });
  });

  test('titles may run to 500 characters', async () => {
    const longest = await request(app)
      .post('/books')
      .set(auth(librarian))
      .send({ isbn: '9780306406157', title: 'T'.repeat(500), author: 'A. Writer' });
    expect(longest.status).toBe(201);
    expect(longest.body.data.title).toHaveLength(500);

    const tooLong = await request(app)
      .post('/books')
      .set(auth(librarian))
      .send({ isbn: '9780441013593', title: 'T'.repeat(501), author: 'A. Writer' });
    expect(tooLong.status).toBe(400);
    expect(tooLong.body.error).toEqual({
      message: 'title: String must contain at most 500 character(s)',
      code: 'INVALID'
    });
  });

  test('a third copy with a different title conflicts, a matching one is added', async () => {
    const book = { isbn: '978-0-13-468599-1', title: 'Effective Java', author: 'Joshua Bloch' };
    await createBookAs(librarian, book);
    await createBookAs(librarian, { ...book, isbn: '9780134685991' });

    const mismatch = await request(app)
      .post('/books')
      .set(auth(librarian))
      .send({ ...book, title: 'Effective Java 2' });
    expect(mismatch.status).toBe(409);
    expect(mismatch.body.error.message).toBe(
      "ISBN 9780134685991 is already registered with title 'Effective Java'"
    );

    await createBookAs(librarian, book);
    const copies = await request(app).get('/books').query({ isbn: '978-0134685991' }).set(auth(member));
    expect(copies.body.data.count).toBe(3);
  });

  test('listing filters, sorts and pages', async () => {
    const dune = await createBookAs(librarian, { isbn: '9780441013593', title: 'Dune', author: 'Frank Herbert' });
    await createBookAs(librarian, { isbn: '9780547928227', title: 'The Hobbit', author: 'J. R. R. Tolkien' });
    await createBookAs(librarian, { isbn: '9780553293357', title: 'Foundation', author: 'Isaac Asimov' });
    await request(app).post('/borrows').set(auth(member)).send({ bookId: dune }).expect(201);

    const byTitle = await request(app).get('/books').set(auth(member));
    expect(byTitle.status).toBe(200);
    expect(byTitle.body.data.items.map((b: { title: string }) => b.title)).toEqual(['Dune', 'Foundation', 'The Hobbit']);
    expect(byTitle.body.data).toMatchObject({ count: 3, skip: 0, limit: 100 });

    const descending = await request(app).get('/books').query({ sort: '-author' }).set(auth(member));
    expect(descending.body.data.items.map((b: { author: string }) => b.author)).toEqual([
      'J. R. R. Tolkien',
      'Isaac Asimov',
      'Frank Herbert'
    ]);

    const available = await request(app).get('/books').query({ availableOnly: 'true' }).set(auth(member));
    expect(available.body.data.count).toBe(2);

    const search = await request(app).get('/books').query({ search: 'hobbit' }).set(auth(member));
    expect(search.body.data.items).toHaveLength(1);

    const paged = await request(app).get('/books').query({ skip: 1, limit: 1 }).set(auth(member));
    expect(paged.body.data.items.map((b: { title: string }) => b.title)).toEqual(['Foundation']);
    expect(paged.body.data.count).toBe(3);
  });

  test('listing rejects unknown sort fields and oversized limits', async () => {
    const sort = await request(app).get('/books').query({ sort: 'isbn' }).set(auth(member));
    expect(sort.status).toBe(400);

    const limit = await request(app).get('/books').query({ limit: 1001 }).set(auth(member));
    expect(limit.status).toBe(400);
  });

  test('members cannot mutate the catalog', async () => {
    const bookId = await createBookAs(librarian, { isbn: '9780441013593', title: 'Dune', author: 'Frank Herbert' });

    const patch = await request(app).patch(`/books/${bookId}`).set(auth(member)).send({ title: 'Dune!' });
    expect(patch.status).toBe(403);

    const del = await request(app).delete(`/books/${bookId}`).set(auth(member));
    expect(del.status).toBe(403);
  });

  test('update re-checks ISBN identity against the other copies', async () => {
    const first = await createBookAs(librarian, { isbn: '9780441013593', title: 'Dune', author: 'Frank Herbert' });
    const second = await createBookAs(librarian, { isbn: '9780441013593', title: 'Dune', author: 'Frank Herbert' });

    const conflicting = await request(app).patch(`/books/${second}`).set(auth(librarian)).send({ title: 'Dune (2nd)' });
    expect(conflicting.status).toBe(409);

    const moved = await request(app)
      .patch(`/books/${second}`)
      .set(auth(librarian))
      .send({ isbn: '978-0-553-29335-7', title: 'Foundation', author: 'Isaac Asimov' });
    expect(moved.status).toBe(200);
    expect(moved.body.data.isbn).toBe('9780553293357');

    const renamed = await request(app).patch(`/books/${first}`).set(auth(librarian)).send({ title: 'Dune (1965)' });
    expect(renamed.status).toBe(200);
    expect(renamed.body.data.title).toBe('Dune (1965)');
  });

  test('update does not accept the availability flag', async () => {
    const bookId = await createBookAs(librarian, { isbn: '9780441013593', title: 'Dune', author: 'Frank Herbert' });

    const res = await request(app).patch(`/books/${bookId}`).set(auth(librarian)).send({ isAvailable: false });
    expect(res.status).toBe(400);
  });

  test('delete removes a never-lent copy', async () => {
    const bookId = await createBookAs(librarian, { isbn: '9780441013593', title: 'Dune', author: 'Frank Herbert' });

    await request(app).delete(`/books/${bookId}`).set(auth(librarian)).expect(200);

    const gone = await request(app).get(`/books/${bookId}`).set(auth(librarian));
    expect(gone.status).toBe(404);
  });

  test('delete of a lent copy is not available', async () => {
    const bookId = await createBookAs(librarian, { isbn: '9780441013593', title: 'Dune', author: 'Frank Herbert' });
    await request(app).post('/borrows').set(auth(member)).send({ bookId }).expect(201);

    const res = await request(app).delete(`/books/${bookId}`).set(auth(librarian));
    expect(res.status).toBe(409);
    expect(res.body.error.code).toBe('NOT_AVAILABLE');
  });
});
