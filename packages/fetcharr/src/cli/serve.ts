/**
 * fetcharr serve [--port 8787] [--host 0.0.0.0]
 * Starts the periodic scheduler plus the trigger/webhook/status HTTP API.
 */

import { serve } from '@hono/node-server';
import { Command } from 'commander';

import { createApp } from '../server/app.js';
import { VERSION } from '../shared/version.js';
import { buildRuntime, loadConfigOrExit } from './context.js';

export function serveCommand(baseDir: string): Command {
  return new Command('serve')
    .description('Run the scheduler and HTTP API')
    .option('-c, --config <path>', 'Config file path')
    .option('-p, --port <n>', 'HTTP port (overrides server.port)')
    .option('--host <host>', 'Bind host (overrides server.host)')
    .option('--no-run-on-start', 'Wait one interval before the first cycle')
    .action(async (opts: { config?: string; port?: string; host?: string; runOnStart: boolean }) => {
      const config = loadConfigOrExit(baseDir, opts.config);
      const port = opts.port ? parseInt(opts.port, 10) : config.server.port;
      const host = opts.host ?? config.server.host;

      const startedAt = new Date();
      const runtime = buildRuntime(config);
      const app = createApp({
        runner: runtime.runner,
        store: runtime.store,
        runLogger: runtime.runLogger,
        surface: runtime.surface,
        library: runtime.library,
        startedAt,
      });

      console.log(`\nfetcharr ${VERSION}`);
      console.log(`  Feed     : ${config.overseerr.url}`);
      console.log(`  Catalog  : ${config.catalog.baseUrl}`);
      console.log(`  Store    : ${config.discrepancies.path} (${config.discrepancies.backend})`);
      console.log(`  Interval : ${runtime.runner.state.intervalSeconds}s`);
      console.log('');

      const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
        console.log(`  Listening on http://${info.address === '0.0.0.0' ? 'localhost' : info.address}:${info.port}`);
        console.log('  Press Ctrl+C to stop\n');
      });

      runtime.runner.start(opts.runOnStart && config.schedule.runOnStart);

      const shutdown = () => {
        console.log('\nShutting down...');
        server.close();
        runtime
          .shutdown()
          .catch((err: unknown) => console.error(err))
          .finally(() => process.exit(0));
      };
      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);
    });
}
