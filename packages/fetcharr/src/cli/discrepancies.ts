/**
 * fetcharr discrepancies [--json]
 * Lists seasons currently searched episode by episode.
 */

import { Command } from 'commander';
import { bold, dim } from 'colorette';

import { loadConfigOrExit, openStore } from './context.js';

export function discrepanciesCommand(baseDir: string): Command {
  return new Command('discrepancies')
    .description('List recorded season discrepancies')
    .option('-c, --config <path>', 'Config file path')
    .option('--json', 'Print raw JSON')
    .action(async (opts: { config?: string; json?: boolean }) => {
      const config = loadConfigOrExit(baseDir, opts.config);
      const store = openStore(config);
      try {
        const records = await store.list();
        if (opts.json) {
          console.log(JSON.stringify(records, null, 2));
          return;
        }
        if (records.length === 0) {
          console.log('No discrepancies recorded.');
          return;
        }
        for (const r of records) {
          console.log(`${bold(r.showTitle)} season ${r.seasonNumber}  ${r.airedEpisodeCount}/${r.totalEpisodeCount} aired`);
          console.log(dim(`    ${r.failedEpisodeLabels.join(' ')}  (since ${r.timestamp})`));
        }
      } finally {
        store.close?.();
      }
    });
}
