import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { escapeHtml, renderPromptHtml } from './prompt-markdown-plugin';
import { renderWithPlugin, stripHtmlTags, unescapeHtml } from '../test-helpers';

describe('renderPromptHtml', () => {
  it('wraps plain text in a themed block and drops one trailing newline', () => {
    expect(renderPromptHtml('a\n', 'dark')).toBe('<pre class="prompt-syntax prompt-syntax-dark"><code>a</code></pre>\n');
  });

  it('escapes alias delimiters', () => {
    expect(renderPromptHtml('<a>', 'dark')).toBe(
      '<pre class="prompt-syntax prompt-syntax-dark"><code>'
        + '<span class="prompt-syntax-alias" style="color: #D2A8FF">&lt;a&gt;</span>'
        + '</code></pre>\n'
    );
  });

  it('adds the message as a title on errors', () => {
    expect(renderPromptHtml('}', 'light')).toContain(
      '<span class="prompt-syntax-error" style="color: #CF222E" title="unmatched closing bracket">}</span>'
    );
  });

  it('Property: stripping tags gives back the text', () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 40 }), (text) => {
        const source = text.endsWith('\n') ? text.slice(0, -1) : text;
        const html = renderPromptHtml(text, 'light');
        const inner = html.slice(html.indexOf('<code>') + 6, html.lastIndexOf('</code>'));
        expect(unescapeHtml(stripHtmlTags(inner))).toBe(source);
      }),
      { numRuns: 200 }
    );
  });
});

describe('promptMarkdownPlugin', () => {
  it('renders prompt fences with depth classes', () => {
    expect(renderWithPlugin('```prompt\n{a}\n```\n')).toBe(
      '<pre class="prompt-syntax prompt-syntax-light"><code>'
        + '<span class="prompt-syntax-brace prompt-syntax-depth-1" style="color: hsl(35, 75%, 45%)">{a}</span>'
        + '</code></pre>\n'
    );
  });

  it('titles weight annotations with their weight', () => {
    expect(renderWithPlugin('```prompt\n2::a::\n```\n')).toContain(
      '<span class="prompt-syntax-weight-main" style="color: hsl(15, 65%, 42%)" title="weight 2">2::a</span>'
        + '<span class="prompt-syntax-weight-trailing" style="color: #6E7781">::</span>'
    );
  });

  it('leaves other fences to the default renderer', () => {
    expect(renderWithPlugin('```js\nx\n```\n')).toBe('<pre><code class="language-js">x\n</code></pre>\n');
  });

  it('honors the theme and language options', () => {
    expect(renderWithPlugin('```nai\na\n```\n', 'dark', ['nai'])).toBe(
      '<pre class="prompt-syntax prompt-syntax-dark"><code>a</code></pre>\n'
    );
    expect(renderWithPlugin('```prompt\na\n```\n', 'dark', ['nai'])).toBe(
      '<pre><code class="language-prompt">a\n</code></pre>\n'
    );
  });
});

describe('escapeHtml', () => {
  it('escapes the four markup characters', () => {
    expect(escapeHtml('<a href="x">&</a>')).toBe('&lt;a href=&quot;x&quot;&gt;&amp;&lt;/a&gt;');
  });
});
