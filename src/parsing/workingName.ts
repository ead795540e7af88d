/**
 * A release name being taken apart. `display` keeps the caller's characters
 * (NFC), `folded` is the same string with diacritics stripped and is what the
 * patterns run against. Both always have the same length, so an index found in
 * `folded` is valid in `display`.
 */
export interface WorkingName {
  readonly display: string;
  readonly folded: string;
  readonly spans: readonly Span[];
  /** Index where technical tokens begin; Infinity when the name has none */
  readonly zoneStart: number;
}

export interface Span {
  start: number;
  end: number;
  /** Technical spans end the title; group and decoration spans do not */
  technical: boolean;
}

export interface TokenMatch {
  start: number;
  end: number;
  match: RegExpExecArray;
}

const LEFT_BOUNDARY = '(?<![\\p{L}\\p{N}])';
const RIGHT_BOUNDARY = '(?![\\p{L}\\p{N}])';

export function foldForMatching(display: string): string {
  let folded = '';
  for (const char of display) {
    const stripped = char.normalize('NFD').replace(/\p{M}/gu, '');
    folded += stripped.length === char.length ? stripped : char;
  }
  return folded;
}

export function createWorkingName(name: string): WorkingName {
  const display = name.normalize('NFC');
  return {
    display,
    folded: foldForMatching(display),
    spans: [],
    zoneStart: Infinity,
  };
}

export function withZoneStart(working: WorkingName, zoneStart: number): WorkingName {
  return { ...working, zoneStart };
}

/**
 * Compile a token pattern that only matches whole tokens: the characters on
 * either side must not be letters or digits, so `_` and `.` separate tokens.
 */
export function tokenPattern(source: string): RegExp {
  return new RegExp(`${LEFT_BOUNDARY}(?:${source})${RIGHT_BOUNDARY}`, 'giud');
}

export function findTokens(working: WorkingName, source: string | RegExp, zoneOnly = false): TokenMatch[] {
  const pattern = typeof source === 'string' ? tokenPattern(source) : new RegExp(source.source, source.flags);
  const found: TokenMatch[] = [];
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(working.folded)) !== null) {
    if (match[0].length === 0) {
      pattern.lastIndex++;
      continue;
    }
    if (zoneOnly && match.index < working.zoneStart) continue;
    found.push({ start: match.index, end: match.index + match[0].length, match });
    if (!pattern.global) break;
  }
  return found;
}

export function blank(working: WorkingName, start: number, end: number, technical: boolean): WorkingName {
  if (end <= start) return working;
  const filler = ' '.repeat(end - start);
  return {
    ...working,
    display: working.display.slice(0, start) + filler + working.display.slice(end),
    folded: working.folded.slice(0, start) + filler + working.folded.slice(end),
    spans: [...working.spans, { start, end, technical }],
  };
}

export function blankAll(working: WorkingName, matches: TokenMatch[], technical = true): WorkingName {
  return matches.reduce((current, { start, end }) => blank(current, start, end, technical), working);
}

export function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
