import { scanAliases } from './alias-syntax';
import { locateChoiceBlocks } from './dynamic-choice';
import { clampWeight, PromptTag, weightForLayers, WeightSyntax } from './prompt-tag';
import { ERROR_MESSAGES, SyntaxErrorCode } from './syntax-match';
import { parseWeightToken } from './weight-syntax';

/** A raw slice of the prompt between separators. */
export interface PromptSegment {
  start: number;
  end: number;
  raw: string;
  /** Id of the tag this segment produced; absent for dropped segments */
  tagId?: string;
}

export interface ParseNote {
  code: SyntaxErrorCode;
  message: string;
  start: number;
  end: number;
}

export interface ParsedSegment {
  text: string;
  weight: number;
  syntax: WeightSyntax;
  /** The non-numeric prefix of a `prefix::content` segment */
  malformedPrefix?: string;
}

export interface ParseResult {
  tags: PromptTag[];
  notes: ParseNote[];
  segments: PromptSegment[];
}

/** Offsets covered by a closed alias reference or a `||…||` block. */
function atomicSpans(text: string): Uint8Array {
  const mask = new Uint8Array(text.length);
  for (const span of [...locateChoiceBlocks(text), ...scanAliases(text)]) {
    mask.fill(1, span.start, span.end);
  }
  return mask;
}

/**
 * Split on `,`, `，` and single `|`. A `|` next to another `|` is never a
 * separator; nothing splits inside a closed alias (`<…>`) or a `||…||` block.
 * An unclosed `<` is plain text.
 */
export function splitSegments(text: string): PromptSegment[] {
  const segments: PromptSegment[] = [];
  const atomic = atomicSpans(text);
  let segStart = 0;

  const cut = (end: number) => {
    segments.push({ start: segStart, end, raw: text.slice(segStart, end) });
    segStart = end + 1;
  };

  for (let i = 0; i < text.length; i++) {
    if (atomic[i]) continue;
    const ch = text.charCodeAt(i);
    if (ch === 0x2C || ch === 0xFF0C) { // , ，
      cut(i);
    } else if (ch === 0x7C) { // |
      const prevPipe = i > 0 && text.charCodeAt(i - 1) === 0x7C;
      const nextPipe = i + 1 < text.length && text.charCodeAt(i + 1) === 0x7C;
      if (!prevPipe && !nextPipe) cut(i);
    }
  }
  segments.push({ start: segStart, end: text.length, raw: text.slice(segStart) });
  return segments;
}

/** `w::content` or `w::content::`; undefined when the segment is not in that form. */
function parseNumericForm(trimmed: string): ParsedSegment | undefined {
  const sep = trimmed.indexOf('::');
  if (sep <= 0) return undefined;
  const prefix = trimmed.slice(0, sep);
  if (/[\s:|{}[\]<>]/.test(prefix)) return undefined;

  let content = trimmed.slice(sep + 2);
  if (content.endsWith('::')) content = content.slice(0, -2);
  content = content.trim();
  if (!content) return undefined;

  const weight = parseWeightToken(prefix);
  if (weight === undefined) {
    return { text: content, weight: 1.0, syntax: 'none', malformedPrefix: prefix };
  }
  return { text: content, weight: clampWeight(weight), syntax: 'numeric' };
}

/** True when the opener at index 0 is closed by the last character. */
function wrapsWhole(s: string, open: string, close: string): boolean {
  let depth = 0;
  for (let i = 0; i < s.length; i++) {
    if (s[i] === open) depth++;
    else if (s[i] === close) {
      depth--;
      if (depth === 0) return i === s.length - 1;
    }
  }
  return false;
}

function parseBracketForm(trimmed: string): ParsedSegment | undefined {
  let s = trimmed;
  let layers = 0;
  let wrapped = false;
  while (s.length >= 2) {
    const open = s[0];
    const close = open === '{' ? '}' : open === '[' ? ']' : undefined;
    if (!close || !wrapsWhole(s, open, close)) break;
    layers += open === '{' ? 1 : -1;
    wrapped = true;
    s = s.slice(1, -1).trim();
  }
  if (!s) return undefined;
  if (!wrapped) return { text: s, weight: 1.0, syntax: 'none' };
  return { text: s, weight: clampWeight(weightForLayers(layers)), syntax: 'bracket' };
}

/**
 * Strip emphasis syntax from one segment and compute its weight. Returns
 * undefined for segments that normalize to nothing.
 */
export function parseSegment(raw: string): ParsedSegment | undefined {
  const trimmed = raw.trim();
  if (!trimmed) return undefined;
  return parseNumericForm(trimmed) ?? parseBracketForm(trimmed);
}

export function parsePromptDetailed(text: string): ParseResult {
  const tags: PromptTag[] = [];
  const notes: ParseNote[] = [];
  const segments = splitSegments(text);

  for (const segment of segments) {
    const parsed = parseSegment(segment.raw);
    if (!parsed) continue;

    const id = `t${tags.length}`;
    segment.tagId = id;
    tags.push({
      id,
      text: parsed.text,
      weight: parsed.weight,
      enabled: true,
      selected: false,
      syntax: parsed.syntax,
    });

    if (parsed.malformedPrefix !== undefined) {
      const start = segment.start + (segment.raw.length - segment.raw.trimStart().length);
      notes.push({
        code: 'MalformedWeightSyntax',
        message: `${ERROR_MESSAGES.MalformedWeightSyntax}: "${parsed.malformedPrefix}" is not a number`,
        start,
        end: start + parsed.malformedPrefix.length,
      });
    }
  }

  return { tags, notes, segments };
}

/** Parse prompt text into tags in source order. Never throws. */
export function parsePrompt(text: string): PromptTag[] {
  return parsePromptDetailed(text).tags;
}
