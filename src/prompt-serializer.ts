import { parseSegment } from './prompt-parser';
import { bracketLayersFor, formatWeight, isDefaultWeight, PromptTag } from './prompt-tag';

export const TAG_SEPARATOR = ', ';

type SerializableTag = Pick<PromptTag, 'text' | 'weight' | 'syntax'>;

function layeredForm(tag: SerializableTag): string | undefined {
  if (tag.syntax === 'numeric') return undefined;
  const layers = bracketLayersFor(tag.weight);
  if (layers > 0) return '{'.repeat(layers) + tag.text + '}'.repeat(layers);
  if (layers < 0) return '['.repeat(-layers) + tag.text + ']'.repeat(-layers);
  return undefined;
}

// Text such as `a::b` or `{a}` reads as syntax when written bare or wrapped.
function reparses(candidate: string, tag: SerializableTag): boolean {
  const parsed = parseSegment(candidate);
  return parsed !== undefined && parsed.text === tag.text && Math.abs(parsed.weight - tag.weight) < 0.005;
}

/**
 * Canonical text for one tag. Weight 1.0 is bare text; numeric tags keep
 * `w::text::`; the rest use brace/bracket layers when the weight is an exact
 * layer multiple. Any shorter form that would not parse back to the same tag
 * falls back to the numeric form (`1::{a}::` for the literal text `{a}`).
 */
export function formatTag(tag: SerializableTag): string {
  const written = formatWeight(tag.weight);
  const numeric = `${written}::${tag.text}::`;
  const short = isDefaultWeight(Number(written)) ? tag.text : layeredForm(tag);
  return short !== undefined && reparses(short, tag) ? short : numeric;
}

/** Enabled tags in canonical form, joined by `, `. Disabled tags are omitted. */
export function toPromptString(tags: readonly PromptTag[]): string {
  return tags.filter(t => t.enabled).map(formatTag).join(TAG_SEPARATOR);
}
