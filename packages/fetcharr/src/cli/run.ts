/**
 * fetcharr run [--config path]
 * One resolution cycle against the pending request feed, then exit.
 */

import { Command } from 'commander';
import { bold, dim, green, red, yellow } from 'colorette';

import type { CycleReport } from '../orchestrator/orchestrator.js';
import { buildRuntime, loadConfigOrExit } from './context.js';

export function printReport(report: CycleReport): void {
  for (const item of report.items) {
    const mark = item.complete ? green('✓') : red('✗');
    console.log(`${mark} ${bold(item.title)}`);
    for (const unit of item.units) {
      const label = unit.season === undefined ? 'movie' : `season ${unit.season}${unit.mode === 'discrepant' ? '*' : ''}`;
      const color = unit.status === 'found' ? green : unit.status === 'skipped' ? dim : yellow;
      const via = unit.via ? dim(` via ${unit.via}`) : '';
      console.log(`    ${label.padEnd(10)} ${color(unit.status)}${via}${unit.error ? dim(` (${unit.error})`) : ''}`);
    }
  }
  const { summary } = report;
  console.log('');
  console.log(`  Items      : ${summary.complete}/${summary.items} complete`);
  console.log(`  Units      : ${summary.unitsFound} found, ${summary.unitsFailed} failed`);
  if (report.aborted) console.log(red('  Cycle aborted: browser session could not be re-established'));
}

export function runCommand(baseDir: string): Command {
  return new Command('run')
    .description('Run one resolution cycle and exit')
    .option('-c, --config <path>', 'Config file path')
    .action(async (opts: { config?: string }) => {
      const config = loadConfigOrExit(baseDir, opts.config);
      const runtime = buildRuntime(config);
      try {
        const report = await runtime.runner.runNow('cli');
        if (!report) {
          process.exitCode = 1;
          return;
        }
        printReport(report);
      } finally {
        await runtime.shutdown();
      }
    });
}
