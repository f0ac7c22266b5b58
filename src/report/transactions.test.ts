import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { MalformedRecordError } from '../errors.js';
import { findParticipant, parseAmount, parseRawTransaction, toMajorUnits } from './transactions.js';
import { type RawTransaction } from './types.js';

describe('parseAmount', () => {
  it('converts decimal strings and numbers to minor units', () => {
    assert.equal(parseAmount('12.50'), 1250);
    assert.equal(parseAmount('12.5'), 1250);
    assert.equal(parseAmount('0.0'), 0);
    assert.equal(parseAmount(30), 3000);
    assert.equal(parseAmount('8.33'), 833);
    assert.equal(parseAmount('-4.25'), -425);
  });

  it('rejects values that are not finite', () => {
    assert.throws(() => parseAmount('abc'), RangeError);
  });

  it('converts back to major units', () => {
    assert.equal(toMajorUnits(1250), 12.5);
  });
});

describe('parseRawTransaction', () => {
  it('maps an upstream expense onto the transaction shape', () => {
    const users = [
      { user_id: 42, owed_share: '12.5', paid_share: '25.0', net_balance: '12.5' },
      { user_id: 43, owed_share: '12.5', paid_share: '0.0' }
    ];
    const transaction = parseRawTransaction({
      id: 9001,
      description: 'Groceries',
      date: '2024-03-15T18:30:00Z',
      cost: '25.0',
      category: { id: 12, name: 'Food' },
      users
    });
    assert.deepEqual(transaction, {
      id: '9001',
      category: 'Food',
      date: '2024-03-15',
      description: 'Groceries',
      participants: users
    });
  });

  it('leaves the category null when the expense has none', () => {
    const transaction = parseRawTransaction({
      id: 1,
      description: 'Taxi',
      date: '2024-03-02',
      category: null,
      users: []
    });
    assert.equal(transaction.category, null);
  });

  it('does not read participant entries', () => {
    const transaction = parseRawTransaction({
      id: 3,
      description: 'Hotel',
      date: '2024-03-02',
      category: { name: 'Travel' },
      users: [{ user_id: 42, owed_share: null }, 'junk']
    });
    assert.equal(transaction.participants.length, 2);
  });

  it('rejects impossible dates', () => {
    assert.throws(
      () => parseRawTransaction({ id: 5, description: 'x', date: '2024-02-30T00:00:00Z', users: [] }),
      (error: unknown) => {
        assert.ok(error instanceof MalformedRecordError);
        assert.equal(error.expenseId, '5');
        return true;
      }
    );
  });

  it('rejects payloads that are not objects', () => {
    assert.throws(() => parseRawTransaction('junk'), (error: unknown) => {
      assert.ok(error instanceof MalformedRecordError);
      assert.equal(error.expenseId, undefined);
      return true;
    });
  });
});

describe('findParticipant', () => {
  const dinner = (users: unknown[]): RawTransaction => ({
    id: '77',
    category: 'Food',
    date: '2024-03-02',
    description: 'Dinner',
    participants: users
  });

  it('reads the matching entry in minor units', () => {
    const share = findParticipant(dinner([
      { user_id: 43, owed_share: '5.0', paid_share: '0.0' },
      { user_id: '42', owed_share: '12.5', paid_share: '25.0' }
    ]), 42);
    assert.deepEqual(share, { userId: '42', owedShare: 1250, paidShare: 2500 });
  });

  it('returns null when the user is not a participant', () => {
    assert.equal(findParticipant(dinner([{ user_id: 43, owed_share: '5.0', paid_share: '0.0' }]), 42), null);
  });

  it('ignores unreadable entries belonging to other participants', () => {
    const share = findParticipant(dinner([
      { user_id: 42, owed_share: '12.50', paid_share: '0.0' },
      { user_id: 43, owed_share: null, paid_share: 'n/a' },
      'junk'
    ]), 42);
    assert.deepEqual(share, { userId: '42', owedShare: 1250, paidShare: 0 });
  });

  it('reports the expense id and failing field when the user\'s own share is unreadable', () => {
    assert.throws(
      () => findParticipant(dinner([
        { user_id: 43, owed_share: '1.0', paid_share: '0.0' },
        { user_id: 42, owed_share: 'twelve', paid_share: '0.0' }
      ]), 42),
      (error: unknown) => {
        assert.ok(error instanceof MalformedRecordError);
        assert.equal(error.expenseId, '77');
        assert.equal(error.issues.length, 1);
        assert.ok(error.issues[0].startsWith('users.1.owed_share: '));
        return true;
      }
    );
  });
});
