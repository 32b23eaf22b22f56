import { ConfigError } from '../shared/errors.js';
import {
  baseTitle,
  clean,
  extractYear,
  formatEpisodeId,
  formatEpisodeLabel,
  numberToWords,
  toDigitForm,
  toWordForm,
} from '../matching/normalizer.js';

export type UnitKind = 'movie' | 'season' | 'episode';

export interface SearchTier {
  name: string;
  /** Query templates tried in order. */
  patterns: string[];
  /** Broad last-resort tier; only reached when every other tier came up empty. */
  fallback?: boolean;
}

export type TierSet = Record<UnitKind, SearchTier[]>;

export interface SearchUnit {
  kind: UnitKind;
  /** Display title, "Title (YYYY)" */
  title: string;
  year?: number;
  season?: number;
  episode?: number;
  /** Catalog page the unit is searched on. */
  url: string;
}

export const DEFAULT_TIERS: TierSet = {
  movie: [
    { name: 'title-year', patterns: ['{title} {year}'] },
    { name: 'title', patterns: ['{title}'] },
    { name: 'numeral-variants', patterns: ['{titleWords}', '{titleDigits}'] },
    { name: 'broad', patterns: [''], fallback: true },
  ],
  season: [
    { name: 'season-tag', patterns: ['S{season2}', 'Season {season}'] },
    { name: 'season-words', patterns: ['Season {seasonWord}', 'Series {season}'] },
    { name: 'title-season', patterns: ['{title} S{season2}', '{title} Season {season}'] },
    { name: 'broad', patterns: [''], fallback: true },
  ],
  episode: [
    { name: 'episode-id', patterns: ['{episodeId}'] },
    { name: 'episode-alt', patterns: ['{season}x{episode2}'] },
    { name: 'title-episode', patterns: ['{title} {episodeId}'] },
    { name: 'broad', patterns: [''], fallback: true },
  ],
};

export function validateTiers(kind: string, tiers: SearchTier[]): SearchTier[] {
  if (tiers.length === 0) throw new ConfigError(`cascade.tiers.${kind} must list at least one tier`);
  tiers.forEach((tier, i) => {
    if (tier.patterns.length === 0) throw new ConfigError(`cascade.tiers.${kind}[${i}] (${tier.name}) has no patterns`);
    if (tier.fallback && i !== tiers.length - 1) {
      throw new ConfigError(`cascade.tiers.${kind}: fallback tier "${tier.name}" must be last`);
    }
  });
  return tiers;
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

function placeholders(unit: SearchUnit): Record<string, string> {
  const title = clean(baseTitle(unit.title));
  const year = unit.year ?? extractYear(unit.title);
  const values: Record<string, string> = {
    title,
    titleWords: toWordForm(title),
    titleDigits: toDigitForm(title),
    year: year !== undefined ? String(year) : '',
  };
  if (unit.season !== undefined) {
    values.season = String(unit.season);
    values.season2 = pad2(unit.season);
    values.seasonWord = numberToWords(unit.season);
  }
  if (unit.season !== undefined && unit.episode !== undefined) {
    values.episode = formatEpisodeLabel(unit.episode);
    values.episode2 = pad2(unit.episode);
    values.episodeId = formatEpisodeId(unit.season, unit.episode);
  }
  return values;
}

export function renderQuery(pattern: string, unit: SearchUnit): string {
  const values = placeholders(unit);
  return pattern
    .replace(/\{(\w+)\}/g, (_, name: string) => values[name] ?? '')
    .replace(/\s+/g, ' ')
    .trim();
}
