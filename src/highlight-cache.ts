import type { PromptTheme } from './highlight-colors';
import type { HighlightRun } from './match-merger';
import type { SyntaxDiagnostic } from './syntax-match';

export interface HighlightResult {
  runs: HighlightRun[];
  errors: SyntaxDiagnostic[];
}

interface CacheEntry {
  text: string;
  theme: PromptTheme;
  result: HighlightResult;
}

/**
 * Single-entry memo for the last `(text, theme)` scan. A lookup with either
 * key changed misses; storing replaces the whole entry.
 */
export class HighlightCache {
  private entry: CacheEntry | undefined;
  private hitCount = 0;
  private missCount = 0;

  get(text: string, theme: PromptTheme): HighlightResult | undefined {
    const entry = this.entry;
    if (entry && entry.text === text && entry.theme === theme) {
      this.hitCount++;
      return entry.result;
    }
    this.missCount++;
    return undefined;
  }

  set(text: string, theme: PromptTheme, result: HighlightResult): void {
    this.entry = { text, theme, result };
  }

  getOrCompute(text: string, theme: PromptTheme, compute: (text: string, theme: PromptTheme) => HighlightResult): HighlightResult {
    const cached = this.get(text, theme);
    if (cached) return cached;
    const result = compute(text, theme);
    this.set(text, theme, result);
    return result;
  }

  clear(): void {
    this.entry = undefined;
  }

  get stats(): { hits: number; misses: number } {
    return { hits: this.hitCount, misses: this.missCount };
  }
}
