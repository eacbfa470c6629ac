import assert from 'node:assert/strict';
import test from 'node:test';
import { FeedbackParseError } from './errors';
import { parseFeedbackLine } from './notation';

function rejects(pattern: RegExp) {
  return (err: unknown) => {
    assert.ok(err instanceof FeedbackParseError);
    assert.equal(err.kind, 'feedback');
    assert.match(err.message, pattern);
    return true;
  };
}

test('word followed by symbol-letter pairs', () => {
  assert.deepEqual(parseFeedbackLine('адрес ?а+д-р-е?с', null), {
    guess: 'адрес',
    verdicts: ['present', 'correct', 'absent', 'absent', 'present'],
    impliedGuess: false,
  });
});

test('pairs may be spread over several tokens or written as bare symbols', () => {
  assert.deepEqual(parseFeedbackLine('АДРЕС ?а +д -р -е ?с', null).verdicts, [
    'present',
    'correct',
    'absent',
    'absent',
    'present',
  ]);
  assert.deepEqual(parseFeedbackLine('адрес ++--?', null).verdicts, ['correct', 'correct', 'absent', 'absent', 'present']);
});

test('feedback alone applies to the last suggested word', () => {
  assert.deepEqual(parseFeedbackLine('+?--+', 'ОБРАЗ'), {
    guess: 'образ',
    verdicts: ['correct', 'present', 'absent', 'absent', 'correct'],
    impliedGuess: true,
  });
});

test('feedback alone without a suggestion is rejected', () => {
  assert.throws(() => parseFeedbackLine('+?--+', null), rejects(/^No suggested word yet/));
});

test('a word without feedback is rejected', () => {
  assert.throws(() => parseFeedbackLine('адрес', 'образ'), rejects(/^Expected a word followed by its feedback/));
});

test('exactly five status symbols are required', () => {
  assert.throws(() => parseFeedbackLine('адрес +++', null), rejects(/exactly 5 status symbols \(\+, \?, -\), got: 3/));
});

test('the guess must be a five-letter word', () => {
  assert.throws(() => parseFeedbackLine('адр +++++', null), rejects(/exactly 5 letters, got: 3/));
});

test('letters in the feedback must match the guess', () => {
  assert.throws(
    () => parseFeedbackLine('адрес ?о+д-р-е?с', null),
    rejects(/^Feedback letter 'о' at position 1 does not match 'а' in 'адрес'/),
  );
});

test('characters other than symbols and letters are rejected', () => {
  assert.throws(() => parseFeedbackLine('адрес +x++++', null), rejects(/^Unexpected 'x' in feedback/));
});
