import MarkdownIt from 'markdown-it';
import * as fc from 'fast-check';
import { PromptTheme } from './highlight-colors';
import { HighlightRun } from './match-merger';
import { promptMarkdownPlugin } from './preview/prompt-markdown-plugin';
import { MAX_WEIGHT, MIN_WEIGHT, PromptTag, WEIGHT_STEP, WeightSyntax } from './prompt-tag';

/** Strip all HTML tags from a string. */
export function stripHtmlTags(str: string): string {
  return str.replace(/<[^>]+>/g, '');
}

/** Undo the escaping applied by the preview renderer. */
export function unescapeHtml(str: string): string {
  return str
    .replace(/&quot;/g, '"')
    .replace(/&gt;/g, '>')
    .replace(/&lt;/g, '<')
    .replace(/&amp;/g, '&');
}

/** Create a MarkdownIt instance with the prompt plugin and render input. */
export function renderWithPlugin(input: string, theme?: PromptTheme, languages?: string[]): string {
  const md = new MarkdownIt();
  md.use(promptMarkdownPlugin, { theme, languages });
  return md.render(input);
}

/** Concatenated run texts; equals the scanned text for any valid run list. */
export function joinRuns(runs: readonly HighlightRun[]): string {
  return runs.map(r => r.text).join('');
}

/** `start-end:type` for each styled run, for compact assertions. */
export function styledSpans(runs: readonly HighlightRun[]): string[] {
  return runs.flatMap(r => (r.style ? [`${r.start}-${r.end}:${r.style.kind.type}`] : []));
}

/** Tags built by hand for operation tests; ids are t0..tn. */
export function makeTags(...texts: string[]): PromptTag[] {
  return texts.map((text, i): PromptTag => ({
    id: `t${i}`,
    text,
    weight: 1,
    enabled: true,
    selected: false,
    syntax: 'none',
  }));
}

/** Arbitrary prompt text drawn from the characters that carry syntax, plus letters. */
export const promptTextArb = fc.string({
  unit: fc.constantFrom('a', 'b', ' ', ',', '，', '|', ':', '{', '}', '[', ']', '<', '>', '1', '.'),
  maxLength: 40,
});

/** Tag text with no syntax characters and no surrounding whitespace. */
export const plainTagTextArb = fc
  .stringMatching(/^[a-z][a-z0-9 _]{0,14}$/)
  .map(s => s.trim())
  .filter(s => s.length > 0);

/** Weights on the 0.05 grid within the supported range. */
export const stepWeightArb = fc.integer({ min: 2, max: 60 }).map(n => Math.round(n * WEIGHT_STEP * 100) / 100);

/** A closed alias reference such as `<hair>`. */
const aliasChunkArb = fc.stringMatching(/^[a-z]{1,5}$/).map(name => `<${name}>`);

/**
 * Tag text without separators that may still look like syntax: stray
 * braces, brackets, colons and `<`. A `>` only ever closes an alias, since
 * `a<` followed by a tag `b>` would join into one alias once written out.
 */
export const syntaxTagTextArb = fc
  .array(
    fc.oneof(
      fc.string({ unit: fc.constantFrom('a', 'b', ' ', '{', '}', '[', ']', ':', '<', '1', '.'), minLength: 1, maxLength: 4 }),
      aliasChunkArb
    ),
    { minLength: 1, maxLength: 4 }
  )
  .map(chunks => chunks.join('').trim())
  .filter(s => s.length > 0);

/** Any weight in the supported range. */
export const continuousWeightArb = fc.double({ min: MIN_WEIGHT, max: MAX_WEIGHT, noNaN: true });

/** Tags of every syntax, some of them disabled. */
export const promptTagArb: fc.Arbitrary<PromptTag> = fc
  .record({
    text: fc.oneof(plainTagTextArb, syntaxTagTextArb),
    weight: fc.oneof(stepWeightArb, continuousWeightArb),
    enabled: fc.boolean(),
    syntax: fc.constantFrom<WeightSyntax>('none', 'bracket', 'numeric'),
  })
  .map(({ text, weight, enabled, syntax }): PromptTag => ({ id: 't0', text, weight, enabled, selected: false, syntax }));
