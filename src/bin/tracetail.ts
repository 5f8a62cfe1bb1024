#!/usr/bin/env node
import { exit } from 'node:process';
import { launchTraceTail } from '../cli/app.js';

const result = launchTraceTail({ argv: process.argv.slice(2) });

if (result.status === 'exited') {
  process.exitCode = result.exitCode;
} else {
  const shutdown = () => {
    result.session.stop();
    exit(0);
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}
