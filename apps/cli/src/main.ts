#!/usr/bin/env tsx
import { OutlineCli } from './cli';

const cli = new OutlineCli({
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
  env: process.env,
});

process.exitCode = await cli.run(process.argv.slice(2));
