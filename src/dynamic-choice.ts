import { aliasEnds } from './alias-syntax';
import { createMatch, SyntaxMatch } from './syntax-match';

export interface ChoiceBlock {
  /** Offset of the opening `||` */
  start: number;
  /** Offset just past the closing `||` */
  end: number;
}

/**
 * Locate `||…||` blocks: each opening `||` pairs with the next `||` that
 * leaves at least one interior character. Blocks do not nest; scanning
 * resumes after the closing pair.
 */
export function locateChoiceBlocks(text: string): ChoiceBlock[] {
  const blocks: ChoiceBlock[] = [];
  let pos = 0;
  while (pos < text.length) {
    const open = text.indexOf('||', pos);
    if (open === -1) break;
    const close = text.indexOf('||', open + 3);
    if (close === -1) break;
    blocks.push({ start: open, end: close + 2 });
    pos = close + 2;
  }
  return blocks;
}

/**
 * Offsets of the `|` separators inside a block. Aliases are found within the
 * interior alone, so a `|` inside `<a|b>` is not a separator.
 */
function separatorOffsets(text: string, block: ChoiceBlock): number[] {
  const offsets: number[] = [];
  const from = block.start + 2;
  const to = block.end - 2;
  const aliases = aliasEnds(text.slice(from, to));
  for (let i = from; i < to; i++) {
    const aliasEnd = aliases.get(i - from);
    if (aliasEnd !== undefined) {
      i = from + aliasEnd - 1;
    } else if (text.charCodeAt(i) === 0x7C) { // |
      offsets.push(i);
    }
  }
  return offsets;
}

/**
 * Emit `dynamic-choice` matches for both `||` boundaries of every block and
 * for each interior separator. The text between separators is left for the
 * other recognizers.
 */
export function scanDynamicChoices(text: string): SyntaxMatch[] {
  const matches: SyntaxMatch[] = [];
  for (const block of locateChoiceBlocks(text)) {
    matches.push(createMatch(text, block.start, block.start + 2, { type: 'dynamic-choice' }));
    for (const i of separatorOffsets(text, block)) {
      matches.push(createMatch(text, i, i + 1, { type: 'dynamic-choice' }));
    }
    matches.push(createMatch(text, block.end - 2, block.end, { type: 'dynamic-choice' }));
  }
  return matches;
}

/** The alternatives of a block, e.g. `['red', '<b|c>']` for `||red|<b|c>||`. */
export function choiceOptions(text: string, block: ChoiceBlock): string[] {
  const options: string[] = [];
  let optionStart = block.start + 2;
  for (const i of separatorOffsets(text, block)) {
    options.push(text.slice(optionStart, i));
    optionStart = i + 1;
  }
  options.push(text.slice(optionStart, block.end - 2));
  return options;
}
