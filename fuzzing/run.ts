/**
 * Standalone continuous fuzzer for the assembler and disassembler.
 *
 * Alternates between mutated DER ASCII text and mutated DER bytes,
 * reporting inputs that escape with an unexpected error or fail to
 * reassemble to the same bytes.
 *
 * Usage:
 *   npx tsx fuzzing/run.ts [--iterations N]
 */

import { assemble } from '../src/parser/Assembler';
import { disassemble } from '../src/disassembler/Disassembler';
import { ParseError } from '../src/errors';
import { toHex } from '../src/helpers';
import { generateDerAscii, Rng } from './generators/der-ascii-generator';
import { mutate, mutateBytes } from './generators/mutator';
import { ALL_SEEDS } from './seeds';

interface FuzzResult {
  seed: number;
  strategy: string;
  input: string;
  assembled: boolean;
  problem?: string;
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/** Check that `bytes` survives disassembly and reassembly. */
function roundTripProblem(bytes: Uint8Array): string | undefined {
  try {
    const again = assemble(disassemble(bytes));
    return sameBytes(again, bytes) ? undefined : 'round trip changed the bytes';
  } catch (e) {
    return `round trip threw: ${e instanceof Error ? e.message : String(e)}`;
  }
}

function fuzzText(input: string, seed: number, strategy: string): FuzzResult {
  const result: FuzzResult = { seed, strategy, input, assembled: false };
  let bytes: Uint8Array;
  try {
    bytes = assemble(input);
  } catch (e) {
    if (!(e instanceof ParseError)) {
      result.problem = `unexpected ${e instanceof Error ? e.name : typeof e}: ${String(e)}`;
    }
    return result;
  }
  result.assembled = true;
  result.problem = roundTripProblem(bytes);
  return result;
}

function fuzzBytes(bytes: Uint8Array, seed: number): FuzzResult {
  return {
    seed,
    strategy: 'bytes',
    input: toHex(bytes),
    assembled: true,
    problem: roundTripProblem(bytes),
  };
}

function main() {
  const args = process.argv.slice(2);
  let maxIterations = Infinity;

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--iterations' && args[i + 1]) {
      maxIterations = parseInt(args[i + 1], 10);
      i++;
    }
  }

  console.log('DER ASCII Fuzzer');
  console.log(`Max iterations: ${maxIterations === Infinity ? 'unlimited' : maxIterations}`);
  console.log('');

  const seedBytes = ALL_SEEDS.map(seed => assemble(seed));
  let iteration = 0;
  let assembled = 0;
  let rejected = 0;
  const problems: FuzzResult[] = [];

  const startTime = Date.now();

  while (iteration < maxIterations) {
    const rng = new Rng(iteration + 1);
    let result: FuzzResult;

    switch (iteration % 3) {
      case 0:
        result = fuzzText(generateDerAscii(iteration), iteration, 'generation');
        break;
      case 1:
        result = fuzzText(mutate(ALL_SEEDS[iteration % ALL_SEEDS.length], rng, rng.int(1, 5)), iteration, 'mutation');
        break;
      default:
        result = fuzzBytes(mutateBytes(seedBytes[iteration % seedBytes.length], rng, rng.int(1, 5)), iteration);
        break;
    }

    if (result.assembled) assembled++;
    else rejected++;
    if (result.problem) {
      problems.push(result);
      console.error(`\n[!] ${result.problem} at iteration ${iteration} (${result.strategy}):`);
      console.error(`    Input: ${result.input.slice(0, 200)}`);
    }

    iteration++;

    if (iteration % 1000 === 0) {
      const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
      const rate = (iteration / ((Date.now() - startTime) / 1000)).toFixed(0);
      console.log(
        `[${elapsed}s] iteration=${iteration} rate=${rate}/s ` +
        `assembled=${assembled} rejected=${rejected} problems=${problems.length}`
      );
    }
  }

  const elapsed = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log('');
  console.log('=== Final Report ===');
  console.log(`Total iterations: ${iteration}`);
  console.log(`Elapsed: ${elapsed}s`);
  console.log(`Assembled: ${assembled}`);
  console.log(`Rejected: ${rejected}`);

  if (problems.length > 0) {
    console.log('');
    console.log(`=== ${problems.length} issue(s) found ===`);
    for (const problem of problems) {
      console.log(`  Seed: ${problem.seed}, Strategy: ${problem.strategy}`);
      console.log(`  Input: ${problem.input.slice(0, 300)}`);
      console.log('');
    }
    process.exit(1);
  } else {
    console.log('\nNo issues found.');
    process.exit(0);
  }
}

main();
