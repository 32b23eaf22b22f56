import { createLogger } from '../shared/logger.js';
import {
  baseTitle,
  clean,
  extractSeasons,
  extractYear,
  normalize,
  toDigitForm,
  toWordForm,
} from './normalizer.js';
import { partialRatio } from './similarity.js';

const log = createLogger('match');

export type UnitPackaging = 'complete' | 'single' | 'any';
export type ExtrasPackaging = 'exclude' | 'require' | 'allow';

export interface PackagingRequirement {
  unit: UnitPackaging;
  extras: ExtrasPackaging;
}

export interface CandidateView {
  displayText: string;
  labels: readonly string[];
}

export interface MatchRequest {
  title: string;
  /** Defaults to the year found in the title. */
  year?: number;
  isShow: boolean;
  seasons?: readonly number[];
  /** "S01E03"; replaces the season check when set. */
  episodeId?: string;
  packaging: PackagingRequirement;
}

export interface EvaluationOptions {
  threshold: number;
  yearTolerance?: number;
}

export interface MatchDecision {
  titleMatched: boolean;
  yearMatched: boolean;
  seasonMatched: boolean;
  packagingAcceptable: boolean;
  accepted: boolean;
  titleScore: number;
}

const REJECTED: MatchDecision = {
  titleMatched: false,
  yearMatched: false,
  seasonMatched: false,
  packagingAcceptable: false,
  accepted: false,
  titleScore: 0,
};

/** Lower-cased comparison forms, index-aligned between request and candidate. */
export function comparisonForms(text: string, includeNormalized: boolean): string[] {
  const title = baseTitle(text);
  const cleaned = clean(title).toLowerCase();
  if (!cleaned) return [];
  const forms = [cleaned, toWordForm(cleaned), toDigitForm(cleaned)];
  if (includeNormalized) forms.push(normalize(title));
  return forms;
}

export function titleScore(candidateText: string, requestedTitle: string, isShow: boolean): number {
  const candidate = comparisonForms(candidateText, !isShow);
  const requested = comparisonForms(requestedTitle, !isShow);
  let best = 0;
  for (let i = 0; i < Math.min(candidate.length, requested.length); i++) {
    best = Math.max(best, partialRatio(candidate[i], requested[i]));
  }
  return best;
}

export function packagingAcceptable(labels: readonly string[], packaging: PackagingRequirement): boolean {
  const single = labels.some((l) => /\bsingle\b/i.test(l));
  const extras = labels.some((l) => /with extras/i.test(l));
  if (packaging.unit === 'complete' && single) return false;
  if (packaging.unit === 'single' && !single) return false;
  if (packaging.extras === 'exclude' && extras) return false;
  if (packaging.extras === 'require' && !extras) return false;
  return true;
}

/** `S01E03` in the text, or its `1x03` spelling. */
export function containsEpisode(text: string, episodeId: string): boolean {
  if (text.toUpperCase().includes(episodeId.toUpperCase())) return true;
  const m = /^S(\d+)E(\d+)$/i.exec(episodeId);
  if (!m) return false;
  return new RegExp(`(?:^|[^0-9])${Number(m[1])}x${m[2].padStart(2, '0')}(?![0-9])`, 'i').test(text);
}

export function evaluateCandidate(
  candidate: CandidateView,
  request: MatchRequest,
  options: EvaluationOptions,
): MatchDecision {
  const text = candidate.displayText ?? '';
  if (!clean(baseTitle(text))) {
    log.debug(`rejecting unreadable candidate "${text}"`);
    return REJECTED;
  }

  const score = titleScore(text, request.title, request.isShow);
  const titleMatched = score >= options.threshold;

  let yearMatched = true;
  if (!request.isShow) {
    const wanted = request.year ?? extractYear(request.title);
    const offered = extractYear(text, { ignoreResolution: true });
    const tolerance = options.yearTolerance ?? 1;
    yearMatched = wanted !== undefined && offered !== undefined && Math.abs(wanted - offered) <= tolerance;
  }

  let seasonMatched = true;
  if (request.isShow) {
    if (request.episodeId) {
      seasonMatched = containsEpisode(text, request.episodeId);
    } else if (request.seasons && request.seasons.length > 0) {
      const wanted = request.seasons;
      seasonMatched = extractSeasons(text).some((s) => wanted.includes(s));
    }
  }

  const packagingOk = packagingAcceptable(candidate.labels, request.packaging);

  return {
    titleMatched,
    yearMatched,
    seasonMatched,
    packagingAcceptable: packagingOk,
    accepted: titleMatched && yearMatched && seasonMatched && packagingOk,
    titleScore: score,
  };
}
