import { clampDepth, createMatch, errorMatch, SyntaxMatch } from './syntax-match';

interface BracketInfo {
  openChar: string;
  position: number;
  depth: number;
}

/**
 * Match `{}` and `[]` emphasis pairs in a single pass.
 *
 * Braces and brackets keep separate stacks, so `{[}]` yields one brace and one
 * bracket match rather than two errors. Matches are emitted in closing order
 * (innermost first); unclosed openers are reported after the scan, in the
 * order they were opened.
 */
export function scanBrackets(text: string): SyntaxMatch[] {
  const matches: SyntaxMatch[] = [];
  const braces: BracketInfo[] = [];
  const brackets: BracketInfo[] = [];

  for (let i = 0; i < text.length; i++) {
    const ch = text.charCodeAt(i);
    if (ch === 0x7B) { // {
      braces.push({ openChar: '{', position: i, depth: braces.length + 1 });
    } else if (ch === 0x5B) { // [
      brackets.push({ openChar: '[', position: i, depth: brackets.length + 1 });
    } else if (ch === 0x7D || ch === 0x5D) { // } ]
      const stack = ch === 0x7D ? braces : brackets;
      const open = stack.pop();
      if (!open) {
        matches.push(errorMatch(text, i, 'UnmatchedClosingBracket'));
        continue;
      }
      const depth = clampDepth(open.depth);
      matches.push(createMatch(text, open.position, i + 1,
        ch === 0x7D ? { type: 'brace', depth } : { type: 'bracket', depth }));
    }
  }

  const unclosed = [...braces, ...brackets].sort((a, b) => a.position - b.position);
  for (const open of unclosed) {
    matches.push(errorMatch(text, open.position, 'UnclosedOpeningBracket'));
  }
  return matches;
}

/** Deepest brace/bracket level among the matches (0 when there are none). */
export function maxBracketDepth(matches: readonly SyntaxMatch[]): number {
  let max = 0;
  for (const m of matches) {
    if ((m.kind.type === 'brace' || m.kind.type === 'bracket') && m.kind.depth > max) {
      max = m.kind.depth;
    }
  }
  return max;
}
