import assert from 'node:assert/strict';
import test from 'node:test';
import { letterStats } from './stats';

test('letterStats counts every occurrence per hundred words, most common first', () => {
  const stats = letterStats(['абб', 'бва']);
  assert.deepEqual(stats.letterFrequency, [
    { letter: 'б', percent: 150 },
    { letter: 'а', percent: 100 },
    { letter: 'в', percent: 50 },
  ]);
  assert.deepEqual(stats.positionFrequency, [
    [
      { letter: 'а', percent: 50 },
      { letter: 'б', percent: 50 },
    ],
    [
      { letter: 'б', percent: 50 },
      { letter: 'в', percent: 50 },
    ],
    [
      { letter: 'б', percent: 50 },
      { letter: 'а', percent: 50 },
    ],
  ]);
});

test('letterStats of nothing is empty', () => {
  assert.deepEqual(letterStats([]), { letterFrequency: [], positionFrequency: [] });
});
