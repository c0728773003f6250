#!/usr/bin/env npx tsx
/**
 * CLI tool to assemble DER ASCII text into bytes.
 *
 * Usage:
 *   npx tsx cli/ascii2der.ts [-i input.txt] [-o output.der]
 *
 * Reads from stdin and writes to stdout unless paths are given.
 */

import * as fs from 'fs';
import * as path from 'path';
import { assemble } from '../src/parser/Assembler';
import { ParseError } from '../src/errors';

const USAGE = 'Usage: npx tsx cli/ascii2der.ts [-i input.txt] [-o output.der]';

function main(): void {
  const args = process.argv.slice(2);
  let inputPath: string | null = null;
  let outputPath: string | null = null;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '-i' && args[i + 1]) {
      inputPath = path.resolve(args[++i]);
    } else if (args[i] === '-o' && args[i + 1]) {
      outputPath = path.resolve(args[++i]);
    } else {
      console.error(USAGE);
      process.exit(1);
    }
  }

  if (inputPath && !fs.existsSync(inputPath)) {
    console.error(`Error: input file not found: ${inputPath}`);
    process.exit(1);
  }

  const source = fs.readFileSync(inputPath ?? 0, 'utf-8');

  let der: Uint8Array;
  try {
    der = assemble(source);
  } catch (e) {
    if (e instanceof ParseError) {
      console.error(`${inputPath ?? '<stdin>'}:${e.message}`);
      process.exit(1);
    }
    throw e;
  }

  if (outputPath) {
    fs.writeFileSync(outputPath, der);
  } else {
    process.stdout.write(der);
  }
}

main();
