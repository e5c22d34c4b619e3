import { AliasReference, createMatch, SyntaxMatch } from './syntax-match';

/**
 * Find `<name>` alias references, leftmost first and non-overlapping.
 *
 * Each `>` closes the most recent open `<`; a `>` with nothing open is plain
 * text, and so is a `<` that is never closed (`<3 cats`). Nested pairs report
 * the outermost one, so `<a<b>>` is one reference. Empty `<>` is skipped.
 */
export function scanAliases(text: string): AliasReference[] {
  const refs: AliasReference[] = [];
  const opens: number[] = [];
  for (let i = 0; i < text.length; i++) {
    const ch = text.charCodeAt(i);
    if (ch === 0x3C) { // <
      opens.push(i);
    } else if (ch === 0x3E) { // >
      const start = opens.pop();
      if (start === undefined || i - start < 2) continue;
      // Pairs close innermost first; drop the ones this pair encloses
      while (refs.length > 0 && refs[refs.length - 1].start > start) refs.pop();
      refs.push({ start, end: i + 1, rawText: text.slice(start, i + 1) });
    }
  }
  return refs;
}

/** End offset of the reference starting at each offset. */
export function aliasEnds(text: string): Map<number, number> {
  return new Map(scanAliases(text).map((ref): [number, number] => [ref.start, ref.end]));
}

export function aliasMatches(text: string): SyntaxMatch[] {
  return scanAliases(text).map(ref => createMatch(text, ref.start, ref.end, { type: 'alias' }));
}

/** The alias name without delimiters, e.g. `hair colour` for `<hair colour>`. */
export function aliasName(ref: AliasReference): string {
  return ref.rawText.slice(1, -1).trim();
}
