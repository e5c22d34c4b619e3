import { aliasEnds } from './alias-syntax';
import { createMatch, ERROR_MESSAGES, SyntaxDiagnostic, SyntaxMatch } from './syntax-match';

const NUMBER_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)$/;

/** Parse the `w` of `w::content::`; undefined when it is not a plain decimal. */
export function parseWeightToken(token: string): number | undefined {
  if (!NUMBER_RE.test(token)) return undefined;
  const value = parseFloat(token);
  return Number.isFinite(value) ? value : undefined;
}

function isSeparator(ch: number): boolean {
  return ch === 0x2C || ch === 0xFF0C || ch === 0x7C; // , ， |
}

/** Characters allowed in the weight token before `::` */
function isTokenChar(ch: number): boolean {
  if (ch <= 0x20 || isSeparator(ch)) return false;
  switch (ch) {
    case 0x3A: // :
    case 0x7B: case 0x7D: // { }
    case 0x5B: case 0x5D: // [ ]
    case 0x3C: case 0x3E: // < >
      return false;
    default:
      return true;
  }
}

export interface WeightScan {
  matches: SyntaxMatch[];
  diagnostics: SyntaxDiagnostic[];
}

/**
 * Recognize `weight::content::` annotations.
 *
 * Each annotation yields a `weight-main` match over `weight::content` and a
 * `weight-trailing` match over the closing `::`. Content is non-empty and
 * ends at the first tag separator outside a closed alias; an annotation without a
 * closing `::` is not highlighted. A token that is not a number still
 * highlights, at weight 1.0, and adds a MalformedWeightSyntax diagnostic
 * over the token.
 */
export function scanWeights(text: string): WeightScan {
  const matches: SyntaxMatch[] = [];
  const diagnostics: SyntaxDiagnostic[] = [];
  const len = text.length;
  const aliases = aliasEnds(text);
  let i = 0;

  while (i < len) {
    const sep = text.indexOf('::', i);
    if (sep === -1) break;

    let tokenStart = sep;
    while (tokenStart > i && isTokenChar(text.charCodeAt(tokenStart - 1))) tokenStart--;
    if (tokenStart === sep) {
      i = sep + 2;
      continue;
    }

    const contentStart = sep + 2;
    let k = contentStart;
    while (k < len) {
      const aliasEnd = aliases.get(k);
      if (aliasEnd !== undefined) {
        k = aliasEnd;
        continue;
      }
      const ch = text.charCodeAt(k);
      if (ch === 0x3A && k + 1 < len && text.charCodeAt(k + 1) === 0x3A) break;
      if (isSeparator(ch)) break;
      k++;
    }
    const closed = k + 1 < len && text.charCodeAt(k) === 0x3A && text.charCodeAt(k + 1) === 0x3A;
    if (!closed || k === contentStart) {
      // Resume at the content so an annotation starting inside it is still found
      i = contentStart;
      continue;
    }

    const token = text.slice(tokenStart, sep);
    let weight = parseWeightToken(token);
    if (weight === undefined) {
      weight = 1.0;
      diagnostics.push({
        code: 'MalformedWeightSyntax',
        message: `${ERROR_MESSAGES.MalformedWeightSyntax}: "${token}" is not a number`,
        start: tokenStart,
        end: sep,
      });
    }
    matches.push(createMatch(text, tokenStart, k, { type: 'weight-main', weight }));
    matches.push(createMatch(text, k, k + 2, { type: 'weight-trailing', weight }));
    i = k + 2;
  }

  return { matches, diagnostics };
}
