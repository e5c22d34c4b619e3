import { HighlightCache, HighlightResult } from './highlight-cache';
import { getDefaultTheme, PromptTheme } from './highlight-colors';
import { buildRuns, collectMatches, mergeMatches } from './match-merger';

/**
 * Scan `text` once with every recognizer and return the merged runs plus all
 * diagnostics. Pure; safe to call on every keystroke.
 */
export function scanPrompt(text: string, theme: PromptTheme = getDefaultTheme()): HighlightResult {
  const { matches, diagnostics } = collectMatches(text);
  return {
    runs: buildRuns(text, mergeMatches(matches), theme),
    errors: diagnostics,
  };
}

/** Highlighter for one editing surface; cursor-only updates hit the cache. */
export class PromptHighlighter {
  constructor(private readonly cache: HighlightCache = new HighlightCache()) {}

  highlight(text: string, theme: PromptTheme = getDefaultTheme()): HighlightResult {
    return this.cache.getOrCompute(text, theme, scanPrompt);
  }

  /** Error messages for the current text, in offset order. */
  errorMessages(text: string, theme?: PromptTheme): string[] {
    return this.highlight(text, theme).errors.map(e => `${e.start}: ${e.message}`);
  }

  invalidate(): void {
    this.cache.clear();
  }
}
