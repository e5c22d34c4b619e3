import type MarkdownIt from 'markdown-it';
import { getDefaultTheme, PromptTheme } from '../highlight-colors';
import type { HighlightRun } from '../match-merger';
import { scanPrompt } from '../syntax-highlighter';

export interface PromptPluginOptions {
  /** Palette for inline colors; defaults to the module-level default theme */
  theme?: PromptTheme;
  /** Fence info strings rendered as prompts */
  languages?: string[];
}

const DEFAULT_LANGUAGES = ['prompt'];

/** Escape HTML entities the same way markdown-it does. */
export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function runClasses(run: HighlightRun): string {
  if (!run.style) return '';
  const { kind } = run.style;
  const classes = [`prompt-syntax-${kind.type}`];
  if (kind.type === 'brace' || kind.type === 'bracket') {
    classes.push(`prompt-syntax-depth-${kind.depth}`);
  }
  return classes.join(' ');
}

function renderRun(run: HighlightRun): string {
  const text = escapeHtml(run.text);
  if (!run.style) return text;
  const kind = run.style.kind;
  const title = kind.type === 'error'
    ? ` title="${escapeHtml(kind.message)}"`
    : kind.type === 'weight-main'
      ? ` title="weight ${kind.weight}"`
      : '';
  return `<span class="${runClasses(run)}" style="color: ${run.style.color}"${title}>${text}</span>`;
}

/** Highlighted `<pre>` block for prompt text; a trailing newline is dropped. */
export function renderPromptHtml(text: string, theme: PromptTheme = getDefaultTheme()): string {
  const source = text.endsWith('\n') ? text.slice(0, -1) : text;
  const { runs } = scanPrompt(source, theme);
  return `<pre class="prompt-syntax prompt-syntax-${theme}"><code>${runs.map(renderRun).join('')}</code></pre>\n`;
}

/**
 * markdown-it plugin: fenced blocks tagged `prompt` (or any of
 * `options.languages`) render as highlighted prompt text. Other fences go
 * through the previous fence renderer.
 */
export function promptMarkdownPlugin(md: MarkdownIt, options: PromptPluginOptions = {}): void {
  const languages = new Set(options.languages ?? DEFAULT_LANGUAGES);
  const defaultFence = md.renderer.rules.fence;

  md.renderer.rules.fence = (tokens, idx, opts, env, self) => {
    const token = tokens[idx];
    const lang = token.info.trim().split(/\s+/)[0];
    if (languages.has(lang)) {
      return renderPromptHtml(token.content, options.theme ?? getDefaultTheme());
    }
    return defaultFence ? defaultFence(tokens, idx, opts, env, self) : self.renderToken(tokens, idx, opts);
  };
}
