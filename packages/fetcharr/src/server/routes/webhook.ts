import { Hono } from 'hono';
import { z } from 'zod';

import { createLogger } from '../../shared/logger.js';
import type { CycleRunner } from '../../scheduler/cycleRunner.js';

const log = createLogger('webhook');

const notificationSchema = z.object({
  notification_type: z.string(),
  subject: z.string().optional(),
});

const TRIGGERING = new Set(['MEDIA_APPROVED', 'MEDIA_AUTO_APPROVED', 'MEDIA_PENDING']);

export function makeWebhookRoutes(runner: CycleRunner): Hono {
  const app = new Hono();

  // POST /api/webhook  (Overseerr notification payload)
  app.post('/', async (c) => {
    const body: unknown = await c.req.json().catch(() => null);
    const parsed = notificationSchema.safeParse(body);
    if (!parsed.success) return c.json({ error: 'Expected an Overseerr notification payload' }, 400);

    const { notification_type: type, subject } = parsed.data;
    if (type === 'TEST_NOTIFICATION') {
      log.info('test notification received');
      return c.json({ status: 'ok' });
    }
    if (!TRIGGERING.has(type)) return c.json({ status: 'ignored', type });

    log.info(`${type}${subject ? `: ${subject}` : ''}`);
    return c.json({ status: runner.trigger('webhook') ? 'triggered' : 'busy' }, 202);
  });

  return app;
}
