/**
 * Title normalization: cleaning, year and season extraction, numeral forms.
 * Every function is total and returns '' / undefined / [] on input it cannot parse.
 */

const UNITS = [
  'zero', 'one', 'two', 'three', 'four', 'five', 'six', 'seven', 'eight', 'nine',
  'ten', 'eleven', 'twelve', 'thirteen', 'fourteen', 'fifteen', 'sixteen', 'seventeen', 'eighteen', 'nineteen',
];
const TENS = ['', '', 'twenty', 'thirty', 'forty', 'fifty', 'sixty', 'seventy', 'eighty', 'ninety'];

// Release-name tokens that carry no title information.
const RELEASE_NOISE = new RegExp(
  '(?<![a-z0-9])(?:' +
    [
      '\\d{3,4}[pi]', '4k', 'uhd', 'hdr10\\+?', 'hdr', 'dovi', 'dv', 'sdr', '10bit', '8bit',
      'x26[45]', 'h[ .]?26[45]', 'hevc', 'avc', 'av1', 'xvid',
      'blu[ .-]?ray', 'bdrip', 'brrip', 'remux', 'web[ .-]?dl', 'web[ .-]?rip', 'webrip', 'hdtv', 'dvdrip',
      'aac(?:[ .]?2[ .]0)?', 'ac3', 'e?ac3', 'ddp?(?:[ .]?[257][ .]1)?', 'dts(?:[ .-]?hd)?', 'truehd', 'atmos',
      'proper', 'repack',
    ].join('|') +
    ')(?![a-z0-9])',
  'gi',
);

export function clean(text: string): string {
  if (!text) return '';
  return text
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .replace(/&/g, ' and ')
    .replace(RELEASE_NOISE, ' ')
    .replace(/[._]/g, ' ')
    .replace(/['’`]/g, '')
    .replace(/[^A-Za-z0-9\s]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function normalize(text: string): string {
  return clean(text).toLowerCase().replace(/^(?:the|a|an)\s+/, '');
}

/** Title without its " (YYYY)" style suffix. */
export function baseTitle(text: string): string {
  return (text ?? '').split('(')[0].trim();
}

const MIN_YEAR = 1800;
const MAX_YEAR = 2999;

export function extractYear(text: string, opts: { ignoreResolution?: boolean } = {}): number | undefined {
  if (!text) return undefined;
  const paren = /\((\d{4})\)/.exec(text);
  if (paren) {
    const year = Number(paren[1]);
    if (year >= MIN_YEAR && year <= MAX_YEAR) return year;
  }

  let found: number | undefined;
  const re = /(?<!\d)(\d{4})(?!\d)/g;
  let m: RegExpExecArray | null;
  while ((m = re.exec(text)) !== null) {
    const value = Number(m[1]);
    if (value < MIN_YEAR || value > MAX_YEAR) continue;
    if (opts.ignoreResolution) {
      const next = text.charAt(m.index + 4);
      if (/[pi]/i.test(next) || value === 2160) continue;
    }
    found = value;
  }
  return found;
}

function wordToNumber(word: string): number | undefined {
  const idx = UNITS.indexOf(word.toLowerCase());
  return idx >= 0 ? idx : undefined;
}

function range(from: number, to: number): number[] {
  if (to < from) return [from];
  const out: number[] = [];
  for (let n = from; n <= to; n++) out.push(n);
  return out;
}

interface SeasonHit {
  index: number;
  end: number;
  seasons: number[];
}

const SEASON_RANGE_PATTERNS: RegExp[] = [
  /\bS(\d{1,2})\s*-\s*S?(\d{1,2})\b/gi,
  /\bSeasons?\s*(\d{1,2})\s*(?:-|to)\s*(\d{1,2})\b/gi,
];

const SEASON_SINGLE_PATTERNS: Array<{ re: RegExp; parse: (m: RegExpExecArray) => number | undefined }> = [
  { re: /\bS(\d{1,2})(?:E\d{1,3})?\b/gi, parse: (m) => Number(m[1]) },
  { re: /\bSeason\s*(\d{1,2})\b/gi, parse: (m) => Number(m[1]) },
  { re: new RegExp(`\\bSeason\\s*(${UNITS.join('|')})\\b`, 'gi'), parse: (m) => wordToNumber(m[1]) },
  { re: /\b(\d{1,2})(?:st|nd|rd|th)\s+Season\b/gi, parse: (m) => Number(m[1]) },
  { re: /\bSeries\s*(\d{1,2})\b/gi, parse: (m) => Number(m[1]) },
];

/** Every season a release names, ranges expanded, in order of appearance. */
export function extractSeasons(text: string): number[] {
  if (!text) return [];
  const source = text.replace(/[._]/g, ' ');
  const hits: SeasonHit[] = [];

  for (const pattern of SEASON_RANGE_PATTERNS) {
    for (const m of source.matchAll(pattern)) {
      const index = m.index ?? 0;
      hits.push({ index, end: index + m[0].length, seasons: range(Number(m[1]), Number(m[2])) });
    }
  }
  const overlapsRange = (index: number) => hits.some((h) => index >= h.index && index < h.end);

  for (const { re, parse } of SEASON_SINGLE_PATTERNS) {
    for (const m of source.matchAll(re)) {
      const index = m.index ?? 0;
      if (overlapsRange(index)) continue;
      const season = parse(m);
      if (season !== undefined) hits.push({ index, end: index + m[0].length, seasons: [season] });
    }
  }

  hits.sort((a, b) => a.index - b.index);
  const out: number[] = [];
  for (const hit of hits) {
    for (const s of hit.seasons) if (!out.includes(s)) out.push(s);
  }
  return out;
}

export function extractSeason(text: string): number | undefined {
  return extractSeasons(text)[0];
}

export function numberToWords(n: number): string {
  if (!Number.isInteger(n) || n < 0 || n > 99) return String(n);
  if (n < 20) return UNITS[n];
  const unit = n % 10;
  return unit === 0 ? TENS[Math.floor(n / 10)] : `${TENS[Math.floor(n / 10)]}-${UNITS[unit]}`;
}

/** "Season 3" -> "Season three". Only standalone one- and two-digit numbers are rewritten. */
export function toWordForm(text: string): string {
  if (!text) return '';
  return text.replace(/\b(\d{1,2})\b/g, (_, digits: string) => numberToWords(Number(digits)));
}

const TENS_ALT = TENS.filter(Boolean).join('|');
const UNIT_ALT = UNITS.slice(1, 10).join('|');
const WORD_NUMBER = new RegExp(
  `\\b(?:(${TENS_ALT})(?:[\\s-](${UNIT_ALT}))?|(${[...UNITS].reverse().join('|')}))\\b`,
  'gi',
);

/** "Season Three" -> "Season 3". */
export function toDigitForm(text: string): string {
  if (!text) return '';
  return text.replace(WORD_NUMBER, (_match, tens: string | undefined, unit: string | undefined, single: string | undefined) => {
    if (tens) {
      const value = TENS.indexOf(tens.toLowerCase()) * 10 + (unit ? UNITS.indexOf(unit.toLowerCase()) : 0);
      return String(value);
    }
    return single ? String(UNITS.indexOf(single.toLowerCase())) : _match;
  });
}

function pad2(n: number): string {
  return String(n).padStart(2, '0');
}

export function formatEpisodeLabel(episode: number): string {
  return `E${pad2(episode)}`;
}

export function formatEpisodeId(season: number, episode: number): string {
  return `S${pad2(season)}E${pad2(episode)}`;
}

/** "E03" -> 3 */
export function parseEpisodeLabel(label: string): number | undefined {
  const m = /^E(\d+)$/i.exec(label.trim());
  return m ? Number(m[1]) : undefined;
}
