import { QueryResult, QueryResultRow } from 'pg';
import { AccountRepository } from '@/repositories/account.repository';
import { Queryable } from '@/config/database';
import { Account, AccountInput } from '@/models';

function queryResult(rows: QueryResultRow[], rowCount: number = rows.length): QueryResult<QueryResultRow> {
  return { command: 'SELECT', rowCount, oid: 0, fields: [], rows };
}

describe('AccountRepository', () => {
  let db: jest.Mocked<Queryable>;
  let repository: AccountRepository;

  const input: AccountInput = {
    name: 'Jane Doe',
    email: 'jane@example.com',
    address: '1 Elm Street',
    phoneNumber: '555-0100',
  };

  const row: Account = {
    id: 1,
    name: 'Jane Doe',
    email: 'jane@example.com',
    address: '1 Elm Street',
    phoneNumber: '555-0100',
    dateJoined: '2024-03-15',
  };

  beforeEach(() => {
    db = { query: jest.fn() };
    repository = new AccountRepository(db);
  });

  describe('create', () => {
    it('should insert and return the stored row', async () => {
      db.query.mockResolvedValue(queryResult([row]));

      await expect(repository.create(input)).resolves.toEqual(row);
      expect(db.query).toHaveBeenCalledWith(expect.stringContaining('INSERT INTO accounts'), [
        'Jane Doe',
        'jane@example.com',
        '1 Elm Street',
        '555-0100',
        null,
      ]);
    });

    it('should let the database default date_joined', async () => {
      db.query.mockResolvedValue(queryResult([row]));

      await repository.create(input);

      expect(db.query).toHaveBeenCalledWith(
        expect.stringContaining('COALESCE($5::date, CURRENT_DATE)'),
        expect.any(Array)
      );
    });

    it('should pass an explicit date_joined through', async () => {
      db.query.mockResolvedValue(queryResult([row]));

      await repository.create({ ...input, dateJoined: '2020-01-01' });

      expect(db.query.mock.calls[0]?.[1]).toEqual([
        'Jane Doe',
        'jane@example.com',
        '1 Elm Street',
        '555-0100',
        '2020-01-01',
      ]);
    });

    it('should fail when no row is returned', async () => {
      db.query.mockResolvedValue(queryResult([]));

      await expect(repository.create(input)).rejects.toThrow('INSERT INTO accounts returned no row');
    });
  });

  describe('read', () => {
    it('should return the account', async () => {
      db.query.mockResolvedValue(queryResult([row]));

      await expect(repository.read(1)).resolves.toEqual(row);
      expect(db.query).toHaveBeenCalledWith(expect.stringContaining('WHERE id = $1'), [1]);
    });

    it('should return null when no row matches', async () => {
      db.query.mockResolvedValue(queryResult([]));

      await expect(repository.read(99)).resolves.toBeNull();
    });
  });

  describe('update', () => {
    it('should replace every column in one statement', async () => {
      db.query.mockResolvedValue(queryResult([row]));

      await expect(repository.update(1, input)).resolves.toEqual(row);
      expect(db.query).toHaveBeenCalledTimes(1);
      expect(db.query).toHaveBeenCalledWith(expect.stringContaining('UPDATE accounts'), [
        1,
        'Jane Doe',
        'jane@example.com',
        '1 Elm Street',
        '555-0100',
        null,
      ]);
    });

    it('should return null when the id is unknown', async () => {
      db.query.mockResolvedValue(queryResult([]));

      await expect(repository.update(99, input)).resolves.toBeNull();
    });
  });

  describe('delete', () => {
    it('should report a removed row', async () => {
      db.query.mockResolvedValue(queryResult([], 1));

      await expect(repository.delete(1)).resolves.toBe(true);
      expect(db.query).toHaveBeenCalledWith('DELETE FROM accounts WHERE id = $1', [1]);
    });

    it('should report nothing removed for an unknown id', async () => {
      db.query.mockResolvedValue(queryResult([], 0));

      await expect(repository.delete(99)).resolves.toBe(false);
    });
  });

  describe('list', () => {
    it('should return all rows ordered by id', async () => {
      db.query.mockResolvedValue(queryResult([row, { ...row, id: 2 }]));

      const accounts = await repository.list();

      expect(accounts.map((account) => account.id)).toEqual([1, 2]);
      expect(db.query).toHaveBeenCalledWith(expect.stringContaining('ORDER BY id'));
    });
  });
});
