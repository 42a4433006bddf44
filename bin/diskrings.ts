#!/usr/bin/env tsx
/**
 * diskrings CLI entry point
 */

import { runCli } from '../src/cli';
import { debugLog } from '../src/debug';

let cancelOnSigint: (() => void) | undefined;

runCli(process.argv.slice(2), {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  progress: process.stderr.isTTY ? (line) => process.stderr.write(`\r\x1b[2K${line ?? ''}`) : undefined,
  cwd: process.cwd(),
  onSession: (session) => {
    cancelOnSigint = () => {
      session.cancel().then(
        () => debugLog('[cli] scan cancelled on SIGINT'),
        (error: unknown) => console.error('[diskrings] cancel failed:', error)
      );
    };
    process.once('SIGINT', cancelOnSigint);
  },
  onSessionSettled: () => {
    if (cancelOnSigint) {
      process.off('SIGINT', cancelOnSigint);
      cancelOnSigint = undefined;
    }
  }
}).then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('[diskrings]', error);
    process.exitCode = 1;
  }
);
