#!/usr/bin/env -S node --import tsx
import { runCli } from './program';

const abort = new AbortController();
process.once('SIGINT', () => abort.abort());
process.once('SIGTERM', () => abort.abort());

void runCli(process.argv, { signal: abort.signal }).then((code) => {
  process.exitCode = code;
});
