import assert from 'node:assert/strict';
import test from 'node:test';

import { Display } from '../src/ui/display.js';
import { MemoryStream } from './helpers/memoryStream.js';

function createDisplay(colorLevel: 0 | 1 = 0) {
  const stdout = new MemoryStream();
  const stderr = new MemoryStream();
  return { display: new Display({ stdout, stderr, colorLevel }), stdout, stderr };
}

test('diagnostics go to stderr with their icon', () => {
  const { display, stdout, stderr } = createDisplay();

  display.showError('boom');
  display.showWarning('careful');
  display.showNotice('→ attached a.log');

  assert.deepEqual(stderr.chunks, ['✗ boom\n', '⚠ careful\n', '→ attached a.log\n']);
  assert.equal(stdout.output, '');
});

test('showInfo writes plain lines to stdout', () => {
  const { display, stdout, stderr } = createDisplay(1);

  display.showInfo('Data pattern: foo');

  assert.equal(stdout.output, 'Data pattern: foo\n');
  assert.equal(stderr.output, '');
});

test('diagnostics are colored when stderr supports it', () => {
  const { display, stderr } = createDisplay(1);

  display.showError('boom');
  display.showNotice('note');

  assert.deepEqual(stderr.chunks, ['\u001b[31m✗ boom\u001b[39m\n', '\u001b[90mnote\u001b[39m\n']);
});

test('no spinner runs when stderr is not a terminal', () => {
  const { display, stderr } = createDisplay();

  display.showWaiting('Waiting for debug channels in /tmp');
  assert.equal(display.isWaiting, false);
  display.stopWaiting();
  assert.equal(stderr.output, '');
});
