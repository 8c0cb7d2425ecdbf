/**
 * design-judge CLI - score or compare design images from the command line
 */
import { readFileSync } from 'fs';
import { readFile } from 'fs/promises';
import path from 'path';
import { Command, InvalidArgumentError } from 'commander';
import { z } from 'zod';
import { judge } from '../lib/core';
import { ModelRegistry } from '../lib/models';
import { parseModelSpec } from '../lib/config';
import { ConfigurationError } from '../lib/errors';
import { DESIGN_PRINCIPLE_NAMES, DESIGN_PRINCIPLES, isDesignPrinciple } from '../lib/prompts/principles';
import type { DesignPrinciple } from '../lib/prompts/principles';
import type { ModelReference } from '../lib/types';
import { errorMessage } from '../lib/providers/content';
import { debug, setDebugWriter } from '../lib/utils/debug';

interface EvaluateCommandOptions {
  principle: DesignPrinciple;
  count?: number;
  model?: ModelReference;
  timeout?: number;
}

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  try {
    const raw = readFileSync(path.resolve(__dirname, '../../package.json'), 'utf8');
    return PackageJsonSchema.parse(JSON.parse(raw)).version;
  } catch (error) {
    debug('cli', 'Could not read package version: %s', errorMessage(error));
    return '0.1.0';
  }
}

function parsePrinciple(value: string): DesignPrinciple {
  if (!isDesignPrinciple(value)) {
    throw new InvalidArgumentError(`Expected one of: ${DESIGN_PRINCIPLE_NAMES.join(', ')}.`);
  }
  return value;
}

function parseCount(value: string): number {
  const count = Number(value);
  if (!Number.isInteger(count) || count < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return count;
}

function parseTimeout(value: string): number {
  const ms = Number(value);
  if (!Number.isInteger(ms) || ms <= 0) {
    throw new InvalidArgumentError('Expected a positive number of milliseconds.');
  }
  return ms;
}

/**
 * A registered alias, or `<provider>:<model>`
 */
function parseModel(value: string): ModelReference {
  if (ModelRegistry.getModel(value)) return value;
  try {
    return parseModelSpec(value);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw new InvalidArgumentError(error.message);
    }
    throw error;
  }
}

function addEvaluationOptions(command: Command): Command {
  return command
    .requiredOption(
      '-p, --principle <name>',
      `design principle (${DESIGN_PRINCIPLE_NAMES.join(', ')})`,
      parsePrinciple,
    )
    .option('-n, --count <count>', 'number of independent samples', parseCount)
    .option('-m, --model <model>', 'model alias or <provider>:<model> (default from DESIGN_JUDGE_MODEL)', parseModel)
    .option('-t, --timeout <ms>', 'per-request timeout in milliseconds', parseTimeout);
}

/**
 * Build the command-line program. `configure` runs before any command is
 * added, so settings such as `exitOverride` reach every subcommand.
 * Debug output goes to stderr while a command runs; stdout carries only results.
 */
export function buildCli(configure?: (program: Command) => void): Command {
  const program = new Command();
  configure?.(program);
  program.hook('preAction', () => {
    setDebugWriter((message, ...args) => console.error(message, ...args));
  });

  program
    .name('design-judge')
    .description('Score and compare graphic designs with a multimodal language model')
    .version(readVersion());

  program
    .command('principles')
    .description('List the design principles designs can be judged on')
    .option('-v, --verbose', 'print each principle text')
    .action((options: { verbose?: boolean }) => {
      DESIGN_PRINCIPLE_NAMES.forEach(name => {
        console.log(name);
        if (options.verbose) {
          console.log(`${DESIGN_PRINCIPLES[name]}\n`);
        }
      });
    });

  addEvaluationOptions(
    program.command('score <image>').description('Score one design image on a 1-10 scale'),
  ).action(async (image: string, options: EvaluateCommandOptions) => {
    try {
      debug('cli', 'Scoring %s on %s', image, options.principle);
      const bytes = await readFile(image);
      const results = await judge.absolute(options.model).evaluatePrinciple(bytes, options.principle, {
        numReturn: options.count,
        timeoutMs: options.timeout,
      });
      console.log(JSON.stringify(results, null, 2));
    } catch (error) {
      console.error(`Error scoring design: ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  });

  addEvaluationOptions(
    program.command('compare <imageA> <imageB>').description('Compare design (a) with design (b)'),
  ).action(async (imageA: string, imageB: string, options: EvaluateCommandOptions) => {
    try {
      debug('cli', 'Comparing %s and %s on %s', imageA, imageB, options.principle);
      const [bytesA, bytesB] = await Promise.all([readFile(imageA), readFile(imageB)]);
      const results = await judge
        .relative(options.model)
        .evaluatePrinciple(bytesA, bytesB, options.principle, {
          numReturn: options.count,
          timeoutMs: options.timeout,
        });
      console.log(JSON.stringify(results, null, 2));
    } catch (error) {
      console.error(`Error comparing designs: ${errorMessage(error)}`);
      process.exitCode = 1;
    }
  });

  return program;
}
