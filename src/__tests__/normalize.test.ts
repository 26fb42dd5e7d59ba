import { describe, it } from 'node:test';
import assert from 'node:assert';
import { normalizeQuery, normalizeTestLocation } from '../normalize.js';

describe('normalizeQuery', () => {
  describe('numeric literals', () => {
    it('replaces an integer id', () => {
      assert.strictEqual(
        normalizeQuery('SELECT * FROM items WHERE items.parent_id = 10465'),
        'SELECT * FROM items WHERE items.parent_id = ?',
      );
    });

    it('collapses queries that differ only by id', () => {
      assert.strictEqual(
        normalizeQuery('SELECT * FROM users WHERE id = 10465'),
        normalizeQuery('SELECT * FROM users WHERE id = 10466'),
      );
    });

    it('replaces every value in an IN list', () => {
      assert.strictEqual(
        normalizeQuery('SELECT * FROM users WHERE id IN (1, 2, 3)'),
        'SELECT * FROM users WHERE id IN (?, ?, ?)',
      );
    });

    it('replaces decimals as one literal', () => {
      assert.strictEqual(normalizeQuery('SELECT * FROM products WHERE price > 99.99'), 'SELECT * FROM products WHERE price > ?');
    });

    it('replaces LIMIT and OFFSET', () => {
      assert.strictEqual(normalizeQuery('SELECT * FROM users LIMIT 10 OFFSET 20'), 'SELECT * FROM users LIMIT ? OFFSET ?');
    });

    it('keeps digits that are part of identifiers', () => {
      assert.strictEqual(normalizeQuery('SELECT user_id, name FROM users123'), 'SELECT user_id, name FROM users123');
      assert.strictEqual(normalizeQuery('SELECT t1.id FROM t1'), 'SELECT t1.id FROM t1');
    });

    it('keeps positional placeholders', () => {
      const query = 'SELECT * FROM users WHERE id = $1 AND status = $2';
      assert.strictEqual(normalizeQuery(query), query);
    });
  });

  describe('string literals', () => {
    it('replaces a whole string literal', () => {
      assert.strictEqual(
        normalizeQuery("SELECT * FROM logs WHERE ip_address = '192.168.1.1'"),
        'SELECT * FROM logs WHERE ip_address = ?',
      );
    });

    it('does not normalize numbers inside strings separately', () => {
      assert.strictEqual(normalizeQuery("SELECT * FROM users WHERE name = 'User 123'"), 'SELECT * FROM users WHERE name = ?');
    });

    it('treats a doubled quote as part of the literal', () => {
      assert.strictEqual(normalizeQuery("SELECT * FROM people WHERE name = 'O''Brien'"), 'SELECT * FROM people WHERE name = ?');
    });

    it('handles several literals and mixed values', () => {
      assert.strictEqual(
        normalizeQuery("SELECT * FROM logs WHERE message = 'Error 404' AND path = '/page/123' AND id = 7"),
        'SELECT * FROM logs WHERE message = ? AND path = ? AND id = ?',
      );
    });
  });

  describe('edge cases', () => {
    it('returns an empty string unchanged', () => {
      assert.strictEqual(normalizeQuery(''), '');
    });

    it('is idempotent', () => {
      const samples = [
        'SELECT * FROM users WHERE id = 10465',
        "SELECT * FROM people WHERE name = 'O''Brien' AND age > 30.5",
        'SELECT * FROM users WHERE id = $1 LIMIT 5',
        'SELECT *\nFROM users\nWHERE id = 1',
      ];
      for (const query of samples) {
        const once = normalizeQuery(query);
        assert.strictEqual(normalizeQuery(once), once, `not idempotent for: ${query}`);
      }
    });
  });
});

describe('normalizeTestLocation', () => {
  it('strips a line number', () => {
    assert.strictEqual(normalizeTestLocation('spec/models/user.spec.ts:42'), 'spec/models/user.spec.ts');
  });

  it('strips line and column', () => {
    assert.strictEqual(normalizeTestLocation('test/users.test.ts:12:5'), 'test/users.test.ts');
  });

  it('leaves a bare path alone', () => {
    assert.strictEqual(normalizeTestLocation('test/users.test.ts'), 'test/users.test.ts');
  });

  it('maps empty and absent input to null', () => {
    assert.strictEqual(normalizeTestLocation(''), null);
    assert.strictEqual(normalizeTestLocation('   '), null);
    assert.strictEqual(normalizeTestLocation(null), null);
    assert.strictEqual(normalizeTestLocation(undefined), null);
  });
});
