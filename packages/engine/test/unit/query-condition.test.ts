import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { condition, matchesAllConditions, matchesCondition, type PropertyValue } from '../../src/kernel/index.js';

describe('matchesCondition', () => {
  it('matches absent values only against eq null and neq non-null', () => {
    assert.equal(matchesCondition(undefined, condition('x', 'eq', null)), true);
    assert.equal(matchesCondition(null, condition('x', 'eq', 1)), false);
    assert.equal(matchesCondition(null, condition('x', 'neq', 1)), true);
    assert.equal(matchesCondition(null, condition('x', 'neq', null)), false);
    assert.equal(matchesCondition(undefined, condition('x', 'lt', 5)), false);
  });

  it('compares structurally for eq and neq', () => {
    assert.equal(matchesCondition({ W: 1 }, condition('pool', 'eq', { W: 1 })), true);
    assert.equal(matchesCondition(false, condition('tapped', 'neq', true)), true);
  });

  it('orders numbers with numbers and strings with strings only', () => {
    assert.equal(matchesCondition(3, condition('power', 'gt', 2)), true);
    assert.equal(matchesCondition(2, condition('power', 'gte', 2)), true);
    assert.equal(matchesCondition(2, condition('power', 'lt', 2)), false);
    assert.equal(matchesCondition('b', condition('name', 'lte', 'c')), true);
    assert.equal(matchesCondition(3, condition('power', 'gt', '2')), false);
    assert.equal(matchesCondition(true, condition('tapped', 'gt', false)), false);
  });

  it('checks substrings and list membership for contains', () => {
    assert.equal(matchesCondition('Grizzly Bears', condition('name', 'contains', 'Bear')), true);
    assert.equal(matchesCondition(['Flying', 'Reach'], condition('keywords', 'contains', 'Reach')), true);
    assert.equal(matchesCondition(['Flying'], condition('keywords', 'contains', 'Haste')), false);
    assert.equal(matchesCondition(5, condition('power', 'contains', 5)), false);
  });

  it('needs a list operand for in', () => {
    assert.equal(matchesCondition('Hand', condition('zone', 'in', ['Hand', 'Library'])), true);
    assert.equal(matchesCondition('Exile', condition('zone', 'in', ['Hand', 'Library'])), false);
    assert.equal(matchesCondition('Hand', condition('zone', 'in', 'Hand')), false);
  });
});

describe('matchesAllConditions', () => {
  const values: Record<string, PropertyValue> = { zone: 'Battlefield', tapped: false };
  const read = (prop: string): PropertyValue | undefined => values[prop];

  it('requires every condition', () => {
    assert.equal(
      matchesAllConditions(read, [condition('zone', 'eq', 'Battlefield'), condition('tapped', 'neq', true)]),
      true,
    );
    assert.equal(matchesAllConditions(read, [condition('zone', 'eq', 'Battlefield'), condition('tapped', 'eq', true)]), false);
  });

  it('matches with no conditions', () => {
    assert.equal(matchesAllConditions(read, []), true);
  });
});
