#!/usr/bin/env node
import { readFile } from 'node:fs/promises';
import { run } from './cli.js';

async function main() {
  const output = await run(process.argv.slice(2), (path) => readFile(path, 'utf8'));
  if (output) process.stdout.write(`${output}\n`);
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exit(1);
});
