import assert from 'node:assert/strict';
import { EventEmitter } from 'node:events';
import { PassThrough, Readable } from 'node:stream';
import test from 'node:test';
import { run, type CliDeps } from './cli';
import { RUSSIAN_ALPHABET } from './lib/wordle/config';
import { createDictionary, type Dictionary } from './lib/wordle/dictionary';
import { promptFor, type Output } from './lib/wordle/report';

const dictionary = createDictionary(['адрес', 'запас', 'образ']);

function capture(): Output & { logs: string[]; errors: string[] } {
  const logs: string[] = [];
  const errors: string[] = [];
  return { logs, errors, log: (l) => logs.push(l), error: (l) => errors.push(l) };
}

function deps(out: Output, lines: string[] = [], dict: Dictionary = dictionary): CliDeps {
  return { output: out, dictionary: dict, env: {}, input: Readable.from(lines.map((l) => `${l}\n`)) };
}

const listed = (logs: string[]) => logs.filter((l) => /^  [а-яё]{5}$/.test(l));

// 20 words that start with ю, then 35 that start with ш.
const head = Array.from({ length: 20 }, (_, i) => `юоо${RUSSIAN_ALPHABET[i]}о`);
const tail = Array.from({ length: 35 }, (_, i) => `шоо${RUSSIAN_ALPHABET[i % 33]}${RUSSIAN_ALPHABET[Math.floor(i / 33)]}`);
const manyWords = createDictionary([...head, ...tail]);

test('batch mode lists matches and per-stage counts', async () => {
  const out = capture();
  assert.equal(await run(['--excluded', 'з'], deps(out)), 0);
  assert.deepEqual(out.logs, [
    'Found 1 matching words:',
    '  адрес',
    '',
    'Filter stats:',
    '  Original words: 3',
    '  After pattern: 3',
    '  After exclusion: 1',
  ]);
  assert.deepEqual(out.errors, []);
});

test('batch mode prints letter stats and a suggestion', async () => {
  const out = capture();
  assert.equal(await run(['--known', '__р__', '--stats', '--suggest'], deps(out)), 0);
  assert.deepEqual(out.logs, [
    'Found 2 matching words:',
    '  адрес',
    '  образ',
    '',
    'Filter stats:',
    '  Original words: 3',
    '  After pattern: 2',
    '',
    'Most frequent letters in the results:',
    '  а: 100.0%',
    '  р: 100.0%',
    '  д: 50.0%',
    '  е: 50.0%',
    '  с: 50.0%',
    '  о: 50.0%',
    '  б: 50.0%',
    '  з: 50.0%',
    '',
    "Suggested word to try: 'АДРЕС'",
  ]);
});

test('more than 50 unlimited matches are cut to the first 20', async () => {
  const out = capture();
  assert.equal(await run(['--no-sort', '--stats'], deps(out, [], manyWords)), 0);
  assert.equal(out.logs[0], 'Found 55 matching words:');
  assert.equal(out.logs[1], 'Many results; showing the first 20. Use --limit to change.');
  assert.deepEqual(out.logs.slice(2, 22), head.map((w) => `  ${w}`));
  assert.deepEqual(listed(out.logs), head.map((w) => `  ${w}`));
  // Letter stats cover the listed words only.
  assert.ok(out.logs.includes('  ю: 100.0%'));
  assert.ok(!out.logs.some((l) => l.startsWith('  ш:')));
});

test('an explicit limit turns the cut off', async () => {
  const out = capture();
  assert.equal(await run(['--no-sort', '--limit', '60'], deps(out, [], manyWords)), 0);
  assert.equal(out.logs[0], 'Found 55 matching words:');
  assert.equal(out.logs[1], `  ${head[0]}`);
  assert.equal(listed(out.logs).length, 55);
});

test('strict feedback changes how suggestions are scored', async () => {
  const dict = createDictionary(['авгвг', 'ваавв', 'абаав', 'авбаа', 'авввв', 'аавав']);
  const simple = capture();
  assert.equal(await run(['--no-sort', '--suggest'], deps(simple, [], dict)), 0);
  assert.equal(simple.logs.at(-1), "Suggested word to try: 'ВААВВ'");

  const strict = capture();
  assert.equal(await run(['--no-sort', '--suggest', '--strict-feedback'], deps(strict, [], dict)), 0);
  assert.equal(strict.logs.at(-1), "Suggested word to try: 'АВГВГ'");

  const fromEnv = capture();
  const code = await run(['--no-sort', '--suggest'], { ...deps(fromEnv, [], dict), env: { FIVE_LETTERS_FEEDBACK: 'strict' } });
  assert.equal(code, 0);
  assert.equal(fromEnv.logs.at(-1), "Suggested word to try: 'АВГВГ'");
});

test('a suggestion with no matches falls back to a starter word', async () => {
  const out = capture();
  assert.equal(await run(['--known', 'ююююю', '--suggest'], deps(out)), 0);
  assert.deepEqual(out.logs, ['No matching words found.', '', "Suggested word to try: 'АДРЕС'"]);
});

test('contradictory constraints fail before filtering', async () => {
  const out = capture();
  assert.equal(await run(['--unknown', 'к', '--excluded', 'к'], deps(out)), 1);
  assert.deepEqual(out.logs, []);
  assert.deepEqual(out.errors, [
    'Error: Letters к are both required and forbidden: a letter cannot be present and absent at once',
  ]);
});

test('a missing dictionary file is fatal', async () => {
  const out = capture();
  const code = await run(['--dictionary', '/nonexistent/words.txt'], { output: out, env: {} });
  assert.equal(code, 1);
  assert.deepEqual(out.errors, ["Error: Dictionary file '/nonexistent/words.txt' not found"]);
});

test('an invalid limit is reported by the argument parser', async () => {
  const out = capture();
  assert.equal(await run(['--limit', '0'], deps(out)), 1);
  assert.equal(out.errors.length, 1);
  assert.match(out.errors[0], /Limit must be a positive integer\./);
});

test('interactive mode solves from feedback on the suggested word', async () => {
  const out = capture();
  assert.equal(await run(['--interactive'], deps(out, ['образ --+?-'])), 0);
  assert.ok(out.logs.includes("Try next: 'ОБРАЗ'"));
  assert.equal(out.logs.at(-1), "Answer found: 'АДРЕС'!");
});

test('interactive mode re-prompts on bad input and stops on quit', async () => {
  const out = capture();
  assert.equal(await run(['--interactive'], deps(out, ['xyz', '', 'q'])), 0);
  assert.deepEqual(out.errors, ['Error: Expected a word followed by its feedback, e.g. адрес ?а+д-р-е?с']);
  assert.equal(out.logs.filter((l) => l === promptFor('образ')).length, 2);
  assert.deepEqual(out.logs.slice(-2), [promptFor('образ'), 'Bye!']);
});

test('interactive mode keeps prompting when no words are left and resets on request', async () => {
  const out = capture();
  assert.equal(await run(['--interactive'], deps(out, ['образ ?-+--', 'reset', 'q'])), 0);
  const exhausted = out.logs.indexOf("No matching words left. The feedback may contain a mistake; type 'reset' to start over.");
  assert.equal(out.logs[exhausted - 2], 'Attempt 2');
  assert.deepEqual(out.logs.slice(exhausted + 1, exhausted + 6), ['', promptFor(null), 'State reset.', '', 'Attempt 1']);
  assert.equal(out.logs.at(-1), 'Bye!');
});

test('interactive mode says goodbye on Ctrl-C', async () => {
  const signals = new EventEmitter();
  const out = capture();
  const log = out.log;
  out.log = (line) => {
    log(line);
    if (line.startsWith('Enter a word')) signals.emit('SIGINT');
  };
  const code = await run(['--interactive'], { ...deps(out), input: new PassThrough(), signals });
  assert.equal(code, 0);
  assert.equal(out.logs.at(-1), 'Bye!');
  assert.equal(signals.listenerCount('SIGINT'), 0);
});
