import assert from 'node:assert/strict';
import test from 'node:test';

import { StyledText } from '../styledText.js';

test('append merges adjacent runs of the same color', () => {
  const text = new StyledText().append('ab', 'red').append('cd', 'red').append('e', 'blue');

  assert.equal(text.text, 'abcde');
  assert.equal(text.length, 5);
  assert.deepEqual(text.runs(), [
    { text: 'abcd', color: 'red' },
    { text: 'e', color: 'blue' },
  ]);
});

test('append uses the innermost pushed color until it is popped', () => {
  const text = new StyledText();
  text.pushColor('gray').append('[').pushColor('cyan').append('x').popColor().append(']').popColor();
  text.append('!');

  assert.deepEqual(text.runs(), [
    { text: '[', color: 'gray' },
    { text: 'x', color: 'cyan' },
    { text: ']', color: 'gray' },
    { text: '!', color: 'default' },
  ]);
});

test('an explicit color wins over the pushed one', () => {
  const text = new StyledText().pushColor('gray').append('a', 'red').append('b').popColor();
  assert.deepEqual(text.runs(), [
    { text: 'a', color: 'red' },
    { text: 'b', color: 'gray' },
  ]);
});

test('popColor without a push is a programming error', () => {
  assert.throws(() => new StyledText().popColor(), /without a matching pushColor/);
});

test('overlay writes are last-write-wins', () => {
  const text = new StyledText('abcdefghij', 'white');
  text.overlay(0, 5, 'red');
  text.overlay(2, 4, 'blue');

  assert.equal(text.text, 'abcdefghij');
  assert.deepEqual(text.runs(), [
    { text: 'ab', color: 'red' },
    { text: 'cdef', color: 'blue' },
    { text: 'ghij', color: 'white' },
  ]);
  assert.equal(text.colorAt(1), 'red');
  assert.equal(text.colorAt(2), 'blue');
  assert.equal(text.colorAt(5), 'blue');
  assert.equal(text.colorAt(6), 'white');
});

test('overlay splits runs at both ends and merges equal neighbours', () => {
  const text = new StyledText().append('aa', 'red').append('bb', 'green');
  text.overlay(1, 2, 'red');

  assert.deepEqual(text.runs(), [
    { text: 'aab', color: 'red' },
    { text: 'b', color: 'green' },
  ]);
});

test('overlay outside the text is rejected', () => {
  const text = new StyledText('abcdefghij');
  assert.throws(() => text.overlay(8, 3, 'red'), RangeError);
  assert.throws(() => text.overlay(-1, 2, 'red'), RangeError);
  assert.doesNotThrow(() => text.overlay(10, 0, 'red'));
  assert.deepEqual(text.runs(), [{ text: 'abcdefghij', color: 'default' }]);
});

test('appendStyled keeps the colors of the appended text', () => {
  const inner = new StyledText().append('"k"', 'yellow').append(': ', 'gray');
  const outer = new StyledText().append('value: ', 'magenta').appendStyled(inner).append('1', 'cyan');

  assert.equal(outer.text, 'value: "k": 1');
  assert.deepEqual(outer.runs(), [
    { text: 'value: ', color: 'magenta' },
    { text: '"k"', color: 'yellow' },
    { text: ': ', color: 'gray' },
    { text: '1', color: 'cyan' },
  ]);
});

test('runs() is a snapshot', () => {
  const text = new StyledText('abc', 'red');
  const runs = text.runs();
  const first = runs[0];
  assert.ok(first);
  first.text = 'zzz';
  assert.equal(text.text, 'abc');
  assert.deepEqual(text.runs(), [{ text: 'abc', color: 'red' }]);
});

test('consume seals the text', () => {
  const text = new StyledText('abc', 'red');
  assert.deepEqual(text.consume(), [{ text: 'abc', color: 'red' }]);
  assert.equal(text.consumed, true);

  assert.throws(() => text.append('d'), /already consumed/);
  assert.throws(() => text.overlay(0, 1, 'blue'), /already consumed/);
  assert.throws(() => text.consume(), /already consumed/);
  assert.equal(text.colorAt(0), 'red');
});

test('consume refuses an unbalanced color scope', () => {
  const text = new StyledText().pushColor('gray').append('x');
  assert.throws(() => text.consume(), /never popped/);
});
