import {
  clampWeight,
  createTag,
  decreaseWeight,
  increaseWeight,
  nextTagId,
  PromptTag,
} from './prompt-tag';

// --- Implementation notes ---
// - Every operation is list-in/list-out; inputs are never mutated
// - Unknown ids and out-of-range indices are no-ops, not errors
// - Batch operations act on the `selected` flag, which the serializer ignores

function updateTag(tags: readonly PromptTag[], id: string, update: (tag: PromptTag) => PromptTag): PromptTag[] {
  return tags.map(t => (t.id === id ? update(t) : t));
}

/** Insert an enabled, default-weight tag at `index` (clamped to the list bounds). */
export function insertTag(tags: readonly PromptTag[], index: number, text: string): PromptTag[] {
  if (!text.trim()) return [...tags];
  const at = Math.min(Math.max(0, index), tags.length);
  const tag = createTag(text, { id: nextTagId(tags) });
  return [...tags.slice(0, at), tag, ...tags.slice(at)];
}

export function removeTag(tags: readonly PromptTag[], id: string): PromptTag[] {
  return tags.filter(t => t.id !== id);
}

/** Move the tag at `from` so it ends up at index `to`. */
export function moveTag(tags: readonly PromptTag[], from: number, to: number): PromptTag[] {
  const result = [...tags];
  if (from < 0 || from >= tags.length || to < 0 || to >= tags.length || from === to) {
    return result;
  }
  const [moved] = result.splice(from, 1);
  result.splice(to, 0, moved);
  return result;
}

export function toggleEnabled(tags: readonly PromptTag[], id: string): PromptTag[] {
  return updateTag(tags, id, t => ({ ...t, enabled: !t.enabled }));
}

export function increaseTagWeight(tags: readonly PromptTag[], id: string): PromptTag[] {
  return updateTag(tags, id, increaseWeight);
}

export function decreaseTagWeight(tags: readonly PromptTag[], id: string): PromptTag[] {
  return updateTag(tags, id, decreaseWeight);
}

export function setTagWeight(tags: readonly PromptTag[], id: string, weight: number): PromptTag[] {
  return updateTag(tags, id, t => ({ ...t, weight: clampWeight(weight) }));
}

/** Replace a tag's text; a blank replacement removes the tag. */
export function updateTagText(tags: readonly PromptTag[], id: string, text: string): PromptTag[] {
  const trimmed = text.trim();
  if (!trimmed) return removeTag(tags, id);
  return updateTag(tags, id, t => ({ ...t, text: trimmed }));
}

export function toggleSelected(tags: readonly PromptTag[], id: string): PromptTag[] {
  return updateTag(tags, id, t => ({ ...t, selected: !t.selected }));
}

export function removeSelected(tags: readonly PromptTag[]): PromptTag[] {
  return tags.filter(t => !t.selected);
}

/** Disable every selected tag; the selection stays so the change can be toggled back. */
export function disableSelected(tags: readonly PromptTag[]): PromptTag[] {
  return tags.map(t => (t.selected && t.enabled ? { ...t, enabled: false } : t));
}

export function enableSelected(tags: readonly PromptTag[]): PromptTag[] {
  return tags.map(t => (t.selected && !t.enabled ? { ...t, enabled: true } : t));
}

/** Disable the selection if any selected tag is enabled, otherwise enable it. */
export function toggleSelectedEnabled(tags: readonly PromptTag[]): PromptTag[] {
  return tags.some(t => t.selected && t.enabled) ? disableSelected(tags) : enableSelected(tags);
}

export function toggleSelectAll(tags: readonly PromptTag[], selected: boolean): PromptTag[] {
  return tags.map(t => (t.selected === selected ? t : { ...t, selected }));
}

export interface TextState {
  text: string;
  cursor: number;
}

export interface InsertTagOptions {
  /** Append `, ` after the inserted tag unless a comma already follows */
  autoInsertComma?: boolean;
}

function isPipeSeparator(text: string, i: number): boolean {
  return text[i] === '|' && text[i - 1] !== '|' && text[i + 1] !== '|';
}

/**
 * Replace the tag fragment around the cursor with `name`, the way an
 * autocomplete suggestion is accepted in a text field.
 *
 * The fragment runs from just after the last separator before the cursor to
 * the next separator after it (`||` pairs are not separators). Returns the new
 * text and the cursor placed after the inserted tag and its separator.
 */
export function insertTagAtCursor(state: TextState, name: string, options: InsertTagOptions = {}): TextState {
  const { text } = state;
  const cursor = Math.min(Math.max(0, state.cursor), text.length);
  const before = text.slice(0, cursor);

  let tagStart = 0;
  for (let i = before.length - 1; i >= 0; i--) {
    const ch = before[i];
    if (ch === ',' || ch === '，' || isPipeSeparator(text, i)) {
      tagStart = i + 1;
      break;
    }
  }

  let tagEnd = text.length;
  for (let i = cursor; i < text.length; i++) {
    const ch = text[i];
    if (ch === ',' || ch === '，' || isPipeSeparator(text, i)) {
      tagEnd = i;
      break;
    }
  }

  const prefix = text.slice(0, tagStart);
  const suffix = text.slice(tagEnd);
  const leadingSpace = prefix.length > 0 && !prefix.endsWith(' ') ? ' ' : '';
  const trailing = options.autoInsertComma && !suffix.trimStart().startsWith(',') ? ', ' : '';

  const inserted = leadingSpace + name + trailing;
  return {
    text: prefix + inserted + suffix,
    cursor: prefix.length + inserted.length,
  };
}
