import { aliasMatches } from './alias-syntax';
import { scanBrackets } from './bracket-matcher';
import { scanDynamicChoices } from './dynamic-choice';
import { colorForKind, PromptTheme } from './highlight-colors';
import { SyntaxDiagnostic, SyntaxKind, SyntaxMatch, toDiagnostic } from './syntax-match';
import { scanWeights } from './weight-syntax';

export interface RunStyle {
  kind: SyntaxKind;
  color: string;
}

/** A slice of the scanned text; unstyled runs are the gaps between matches. */
export interface HighlightRun {
  text: string;
  start: number;
  end: number;
  style?: RunStyle;
}

export interface MatchPool {
  /** Every recognizer's output, in registration order */
  matches: SyntaxMatch[];
  /** Errors from all recognizers, sorted by offset; independent of merging */
  diagnostics: SyntaxDiagnostic[];
}

/**
 * Run the recognizers over `text` and pool their output. Registration order
 * (brackets, weights, aliases, choices) is the tie-break used by
 * {@link mergeMatches} for matches that start at the same offset.
 */
export function collectMatches(text: string): MatchPool {
  const brackets = scanBrackets(text);
  const weights = scanWeights(text);
  const matches = [
    ...brackets,
    ...weights.matches,
    ...aliasMatches(text),
    ...scanDynamicChoices(text),
  ];

  const diagnostics: SyntaxDiagnostic[] = [];
  for (const m of brackets) {
    const d = toDiagnostic(m);
    if (d) diagnostics.push(d);
  }
  diagnostics.push(...weights.diagnostics);
  diagnostics.sort((a, b) => a.start - b.start);

  return { matches, diagnostics };
}

/**
 * Resolve overlaps: sort by start (stable, so earlier-registered matches win
 * ties) and keep a match only when it starts at or after the end of the last
 * kept one. The result is ordered and non-overlapping.
 */
export function mergeMatches(matches: readonly SyntaxMatch[]): SyntaxMatch[] {
  const sorted = [...matches].sort((a, b) => a.start - b.start);
  const kept: SyntaxMatch[] = [];
  let lastEnd = 0;
  for (const m of sorted) {
    if (m.start >= lastEnd && m.end > m.start) {
      kept.push(m);
      lastEnd = m.end;
    }
  }
  return kept;
}

/**
 * Slice `text` into alternating plain and styled runs. `matches` must be the
 * output of {@link mergeMatches}; joining the run texts gives back `text`.
 */
export function buildRuns(text: string, matches: readonly SyntaxMatch[], theme: PromptTheme): HighlightRun[] {
  const runs: HighlightRun[] = [];
  let pos = 0;
  for (const m of matches) {
    if (m.start > pos) {
      runs.push({ text: text.slice(pos, m.start), start: pos, end: m.start });
    }
    runs.push({
      text: text.slice(m.start, m.end),
      start: m.start,
      end: m.end,
      style: { kind: m.kind, color: colorForKind(m.kind, theme) },
    });
    pos = m.end;
  }
  if (pos < text.length) {
    runs.push({ text: text.slice(pos), start: pos, end: text.length });
  }
  return runs;
}
