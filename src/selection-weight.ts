import { parseSegment } from './prompt-parser';
import { DEFAULT_WEIGHT, formatWeight, isDefaultWeight } from './prompt-tag';

export interface TextSelection {
  start: number;
  end: number;
}

export interface SelectionWeight {
  baseText: string;
  weight: number;
}

function isValidSelection(text: string, selection: TextSelection): boolean {
  return selection.start >= 0 && selection.end <= text.length && selection.start < selection.end;
}

/**
 * Weight and bare text of the selected fragment, read with the same rules the
 * parser applies to a segment. Empty or out-of-range selections read as an
 * empty fragment at weight 1.0.
 */
export function readSelectionWeight(text: string, selection: TextSelection): SelectionWeight {
  if (!isValidSelection(text, selection)) return { baseText: '', weight: DEFAULT_WEIGHT };
  const parsed = parseSegment(text.slice(selection.start, selection.end));
  if (!parsed) return { baseText: '', weight: DEFAULT_WEIGHT };
  return { baseText: parsed.text, weight: parsed.weight };
}

/**
 * Rewrite the selected fragment as `weight::base::` (bare text at weight 1.0)
 * and return the new text with the rewritten fragment selected.
 */
export function applySelectionWeight(
  text: string,
  selection: TextSelection,
  weight: number
): { text: string; selection: TextSelection } {
  const { baseText } = readSelectionWeight(text, selection);
  if (!baseText) return { text, selection };

  const replacement = isDefaultWeight(weight) ? baseText : `${formatWeight(weight)}::${baseText}::`;
  return {
    text: text.slice(0, selection.start) + replacement + text.slice(selection.end),
    selection: { start: selection.start, end: selection.start + replacement.length },
  };
}
