#!/usr/bin/env node
import { Console } from 'node:console';
import { writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { describeError } from '@concursal/domain/logger';
import { RULEBOOK_PATH_ENV } from '@concursal/rulebook/loader';
import { runEvaluate, runLint, runReplay } from './commands.js';
import { config, validateConfig } from './config.js';
import { createConsoleLogger } from './logger.js';

const USAGE = [
  'Usage: concursal-eval <command> [options]',
  '',
  '  evaluate --case-id ID (--variables vars.json | --state state.json) [--context legal.txt] [--rulebook path] [--out file]',
  '  lint [--rulebook path]',
  '  replay --record result.json (--variables vars.json | --state state.json) [--context legal.txt] [--rulebook path]',
].join('\n');

function getArg(flag: string): string | undefined {
  const index = process.argv.indexOf(flag);
  if (index === -1) return undefined;
  return process.argv[index + 1];
}

function hasFlag(flag: string): boolean {
  return process.argv.includes(flag);
}

async function outputResult(result: unknown): Promise<void> {
  const outFile = getArg('--out');
  const json = JSON.stringify(result, null, 2);
  if (outFile) {
    await writeFile(resolve(outFile), json);
    return;
  }
  console.log(json);
}

async function run(): Promise<void> {
  const command = process.argv[2];
  if (!command || hasFlag('--help')) {
    console.error(USAGE);
    process.exit(command ? 0 : 1);
  }

  const errors = validateConfig();
  if (errors.length > 0) {
    console.error('[Evaluator] Invalid configuration:');
    for (const error of errors) {
      console.error(`- ${error}`);
    }
    process.exit(1);
  }

  // stdout carries the JSON report only
  const logger = createConsoleLogger({
    level: hasFlag('--verbose') ? 'debug' : config.logging.level,
    json: config.logging.json,
    sink: new Console({ stdout: process.stderr, stderr: process.stderr }),
  });
  const context = { logger, env: { [RULEBOOK_PATH_ENV]: config.rulebook.path } };
  const rulebookPath = getArg('--rulebook');

  if (command === 'evaluate') {
    const caseId = getArg('--case-id') ?? config.caseId;
    if (!caseId) {
      throw new Error('--case-id is required (or set CONCURSAL_CASE_ID)');
    }
    const report = await runEvaluate(
      {
        caseId,
        rulebookPath,
        variablesPath: getArg('--variables'),
        statePath: getArg('--state'),
        contextPath: getArg('--context'),
      },
      context
    );
    await outputResult(report);
    return;
  }

  if (command === 'lint') {
    const report = runLint({ rulebookPath }, context);
    await outputResult(report);
    if (!report.valid) process.exitCode = 1;
    return;
  }

  if (command === 'replay') {
    const recordPath = getArg('--record');
    if (!recordPath) {
      throw new Error('--record is required');
    }
    const report = await runReplay(
      {
        recordPath,
        rulebookPath,
        variablesPath: getArg('--variables'),
        statePath: getArg('--state'),
        contextPath: getArg('--context'),
      },
      context
    );
    await outputResult({ ...report, replayed: undefined });
    if (!report.isValid) process.exitCode = 1;
    return;
  }

  throw new Error(`Unknown command: ${command}`);
}

run().catch((error) => {
  console.error(describeError(error));
  process.exit(1);
});
