/** Deepest nesting level that gets its own highlight shade */
export const MAX_HIGHLIGHT_DEPTH = 5;

export type SyntaxErrorCode =
  | 'UnmatchedClosingBracket'
  | 'UnclosedOpeningBracket'
  | 'MalformedWeightSyntax';

export type SyntaxKind =
  | { type: 'brace'; depth: number }
  | { type: 'bracket'; depth: number }
  | { type: 'weight-main'; weight: number }
  | { type: 'weight-trailing'; weight: number }
  | { type: 'alias' }
  | { type: 'dynamic-choice' }
  | { type: 'error'; code: SyntaxErrorCode; message: string };

export type SyntaxKindType = SyntaxKind['type'];

/** A recognized span; offsets are half-open and only valid for the text that was scanned. */
export interface SyntaxMatch {
  start: number;
  end: number;
  text: string;
  kind: SyntaxKind;
}

export interface AliasReference {
  start: number;
  end: number;
  /** Includes the `<` and `>` delimiters */
  rawText: string;
}

export interface SyntaxDiagnostic {
  code: SyntaxErrorCode;
  message: string;
  start: number;
  end: number;
}

export const ERROR_MESSAGES: Record<SyntaxErrorCode, string> = {
  UnmatchedClosingBracket: 'unmatched closing bracket',
  UnclosedOpeningBracket: 'unclosed opening bracket',
  MalformedWeightSyntax: 'malformed weight syntax',
};

export function clampDepth(depth: number): number {
  return Math.min(MAX_HIGHLIGHT_DEPTH, Math.max(1, depth));
}

export function createMatch(text: string, start: number, end: number, kind: SyntaxKind): SyntaxMatch {
  return { start, end, text: text.slice(start, end), kind };
}

export function errorMatch(text: string, position: number, code: SyntaxErrorCode): SyntaxMatch {
  return createMatch(text, position, position + 1, { type: 'error', code, message: ERROR_MESSAGES[code] });
}

/** Diagnostic view of an `error` match; undefined for every other kind. */
export function toDiagnostic(match: SyntaxMatch): SyntaxDiagnostic | undefined {
  if (match.kind.type !== 'error') return undefined;
  return { code: match.kind.code, message: match.kind.message, start: match.start, end: match.end };
}
