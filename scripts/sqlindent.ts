#!/usr/bin/env node
import fs from 'node:fs';
import { performance } from 'node:perf_hooks';
import { cac } from 'cac';
import { lex } from '../src/frontend/lexer.js';
import { buildQuery, renderQuery, summarizeLines } from '../src/format/query.js';
import { handleError } from '../src/cli/utils/error-handler.js';
import { success } from '../src/cli/utils/logger.js';
import { createLogger, logPerformance } from '../src/utils/logger.js';

function readFileStrict(file: string): string {
  return fs.readFileSync(file, 'utf8');
}

function timed<T>(operation: string, file: string, run: () => T): T {
  const started = performance.now();
  const result = run();
  logPerformance({
    component: 'cli',
    operation,
    duration: performance.now() - started,
    metadata: { file },
  });
  return result;
}

function cmdFormat(file: string, write: boolean): void {
  const input = readFileStrict(file);
  const output = timed('format', file, () => renderQuery(buildQuery(input, lex(input))));
  if (!write) {
    process.stdout.write(output);
    return;
  }
  const changed = output !== input;
  if (changed) {
    fs.writeFileSync(file, output, 'utf8');
  }
  createLogger('cli').info('write completed', { file, changed });
  success(changed ? `Reformatted ${file}` : `${file} already formatted`);
}

function cmdLines(file: string): void {
  const input = readFileStrict(file);
  const summaries = timed('lines', file, () => summarizeLines(buildQuery(input, lex(input))));
  console.log(JSON.stringify(summaries, null, 2));
}

function wrapAction<Args extends unknown[]>(fn: (...args: Args) => void) {
  return (...args: Args): void => {
    try {
      fn(...args);
    } catch (error) {
      handleError(error);
    }
  };
}

function main(): void {
  const cli = cac('sqlindent');

  cli
    .command('format <file>', 'Re-indent a SQL file and print the result')
    .option('--write', 'Rewrite the file in place', { default: false })
    .action(
      wrapAction((file: string, options: { write?: boolean }) => {
        cmdFormat(file, Boolean(options.write));
      })
    );

  cli
    .command('lines <file>', 'Print per-line depth and split markers as JSON')
    .action(
      wrapAction((file: string) => {
        cmdLines(file);
      })
    );

  cli.help();
  cli.parse();
}

try {
  main();
} catch (error) {
  handleError(error);
}
