#!/usr/bin/env npx tsx
/**
 * CLI tool to disassemble DER (or any bytes) into DER ASCII text.
 *
 * Usage:
 *   npx tsx cli/der2ascii.ts [-i input.der] [-o output.txt] [-x]
 *
 * With -x the input is hex text; whitespace in it is ignored.
 * Reads from stdin and writes to stdout unless paths are given.
 */

import * as fs from 'fs';
import * as path from 'path';
import { disassemble } from '../src/disassembler/Disassembler';
import { hexToBytes } from '../src/helpers';

const USAGE = 'Usage: npx tsx cli/der2ascii.ts [-i input.der] [-o output.txt] [-x]';

function main(): void {
  const args = process.argv.slice(2);
  let inputPath: string | null = null;
  let outputPath: string | null = null;
  let hexInput = false;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '-i' && args[i + 1]) {
      inputPath = path.resolve(args[++i]);
    } else if (args[i] === '-o' && args[i + 1]) {
      outputPath = path.resolve(args[++i]);
    } else if (args[i] === '-x') {
      hexInput = true;
    } else {
      console.error(USAGE);
      process.exit(1);
    }
  }

  if (inputPath && !fs.existsSync(inputPath)) {
    console.error(`Error: input file not found: ${inputPath}`);
    process.exit(1);
  }

  const raw = fs.readFileSync(inputPath ?? 0);

  let der: Uint8Array = raw;
  if (hexInput) {
    try {
      der = hexToBytes(raw.toString('utf-8').replace(/\s+/g, ''));
    } catch (e) {
      console.error(`${inputPath ?? '<stdin>'}: ${e instanceof Error ? e.message : String(e)}`);
      process.exit(1);
    }
  }

  const text = disassemble(der);

  if (outputPath) {
    fs.writeFileSync(outputPath, text, 'utf-8');
  } else {
    process.stdout.write(text);
  }
}

main();
