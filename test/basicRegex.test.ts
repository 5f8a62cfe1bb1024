import assert from 'node:assert/strict';
import test from 'node:test';

import { translateBasicRegex } from '../src/pattern/basicRegex.js';

test('translateBasicRegex treats ERE operators as ordinary characters', () => {
  assert.equal(translateBasicRegex('a+'), 'a\\+');
  assert.equal(translateBasicRegex('a?'), 'a\\?');
  assert.equal(translateBasicRegex('a|b'), 'a\\|b');
  assert.equal(translateBasicRegex('f(x){1}'), 'f\\(x\\)\\{1\\}');
});

test('translateBasicRegex maps escaped groups and intervals', () => {
  assert.equal(translateBasicRegex('ab\\{2\\}'), 'ab{2}');
  assert.equal(translateBasicRegex('a\\{1,\\}'), 'a{1,}');
  assert.equal(translateBasicRegex('a\\{1,3\\}'), 'a{1,3}');
  assert.equal(translateBasicRegex('\\(ab\\)*'), '(ab)*');
  assert.equal(translateBasicRegex('\\(a\\)\\1'), '(a)(?:\\1)');
});

test('translateBasicRegex keeps a star literal when there is nothing to repeat', () => {
  assert.equal(translateBasicRegex('*a'), '\\*a');
  assert.equal(translateBasicRegex('^*a'), '^\\*a');
  assert.equal(translateBasicRegex('a**'), '(?:a*)*');
});

test('translateBasicRegex anchors only at the edges of the pattern or a group', () => {
  assert.equal(translateBasicRegex('^ab$'), '^ab$');
  assert.equal(translateBasicRegex('a^b'), 'a\\^b');
  assert.equal(translateBasicRegex('a$b'), 'a\\$b');
  assert.equal(translateBasicRegex('\\(^a\\)'), '(^a)');
  assert.equal(translateBasicRegex('a\\(b$\\)'), 'a(b$)');
});

test('translateBasicRegex translates bracket expressions', () => {
  assert.equal(translateBasicRegex('[[:digit:]]x'), '[0-9]x');
  assert.equal(translateBasicRegex('[]a]'), '[\\]a]');
  assert.equal(translateBasicRegex('[^a-c]'), '[^a-c]');
  assert.equal(translateBasicRegex('[a-]'), '[a\\-]');
  assert.equal(translateBasicRegex('[[.-.]]'), '[\\-]');
});

test('translateBasicRegex escapes literal characters', () => {
  assert.equal(translateBasicRegex('a.b'), 'a.b');
  assert.equal(translateBasicRegex('a\\.b'), 'a\\.b');
  assert.equal(translateBasicRegex('a/b'), 'a\\/b');
});

test('translateBasicRegex reports malformed patterns', () => {
  const cases: Array<[string, string]> = [
    ['\\(a', 'Unmatched \\('],
    ['a\\)', 'Unmatched \\)'],
    ['a\\}', 'Unmatched \\}'],
    ['a\\{2', 'Unmatched \\{'],
    ['a\\{x\\}', 'Invalid content of \\{\\}'],
    ['a\\{3,1\\}', 'Invalid range in \\{\\}'],
    ['\\1', 'Invalid back reference'],
    ['\\(a\\1\\)', 'Invalid back reference'],
    ['\\{2\\}', 'Invalid preceding regular expression'],
    ['a\\', 'Trailing backslash'],
    ['[abc', 'Unmatched [ or [^'],
    ['[[:foo:]]', 'Invalid character class name'],
    ['[[.ab.]]', 'Invalid collation character'],
    ['[z-a]', 'Invalid range end'],
  ];

  for (const [pattern, reason] of cases) {
    assert.throws(() => translateBasicRegex(pattern), { name: 'SyntaxError', message: reason }, pattern);
  }
});
