import type { DiscrepancyRecord } from '../discrepancy/types.js';
import { parseEpisodeLabel } from '../matching/normalizer.js';
import { createLogger } from '../shared/logger.js';
import type { CascadeController, CascadeOutcome } from './controller.js';
import type { SearchUnit } from './tiers.js';

const log = createLogger('episodes');

export interface EpisodeOutcome {
  label: string;
  outcome: CascadeOutcome;
}

export interface EpisodeSearchResult {
  found: boolean;
  episodes: EpisodeOutcome[];
}

/**
 * Episode-level search for a discrepant season: one cascade per aired episode.
 * The season counts as found only when every listed episode is found.
 */
export async function resolveEpisodes(
  controller: CascadeController,
  seasonUnit: SearchUnit,
  record: DiscrepancyRecord,
): Promise<EpisodeSearchResult> {
  const episodes: EpisodeOutcome[] = [];
  let found = record.failedEpisodeLabels.length > 0;

  for (const label of record.failedEpisodeLabels) {
    const episode = parseEpisodeLabel(label);
    if (episode === undefined) {
      log.warn(`${record.showTitle} S${record.seasonNumber}: skipping malformed episode label "${label}"`);
      found = false;
      continue;
    }
    const outcome = await controller.resolve({ ...seasonUnit, kind: 'episode', season: record.seasonNumber, episode });
    episodes.push({ label, outcome });
    if (outcome.state !== 'found') found = false;
  }

  const hits = episodes.filter((e) => e.outcome.state === 'found').length;
  log.info(`${record.showTitle} season ${record.seasonNumber}: ${hits}/${record.failedEpisodeLabels.length} episodes matched`);
  return { found, episodes };
}
