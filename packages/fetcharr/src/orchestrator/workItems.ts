import { createLogger } from '../shared/logger.js';
import type { FeedRequest, WorkItem } from '../shared/types.js';

const log = createLogger('feed');

export function displayTitle(title: string, year?: number): string {
  const trimmed = title.trim();
  if (year === undefined || /\(\d{4}\)\s*$/.test(trimmed)) return trimmed;
  return `${trimmed} (${year})`;
}

/** Throws when the request cannot become a work item (a show with nothing pending). */
function validSeasons(seasons: readonly number[]): number[] {
  return [...new Set(seasons.filter((s) => Number.isInteger(s) && s >= 0))].sort((a, b) => a - b);
}

export function createWorkItem(req: FeedRequest): WorkItem {
  const pendingSeasons = req.mediaKind === 'movie' ? [] : validSeasons(req.pendingSeasons);
  if (req.mediaKind === 'show' && pendingSeasons.length === 0) {
    throw new Error(`Request ${req.requestId} (${req.title}) has no pending seasons`);
  }
  return Object.freeze({
    requestId: req.requestId,
    externalId: req.externalId,
    title: displayTitle(req.title, req.year),
    mediaKind: req.mediaKind,
    pendingSeasons: Object.freeze(pendingSeasons),
    ...(req.mediaId !== undefined ? { mediaId: req.mediaId } : {}),
    ...(req.tmdbId !== undefined ? { tmdbId: req.tmdbId } : {}),
  });
}

export function buildWorkItems(requests: FeedRequest[]): WorkItem[] {
  const items: WorkItem[] = [];
  for (const req of requests) {
    if (req.mediaKind === 'show' && validSeasons(req.pendingSeasons).length === 0) {
      log.debug(`skipping ${req.title}: no pending seasons`);
      continue;
    }
    items.push(createWorkItem(req));
  }
  return items;
}
