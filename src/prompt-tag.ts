/** Which sub-syntax produced a tag, and which canonical form it serializes to. */
export type WeightSyntax = 'none' | 'bracket' | 'numeric';

export interface PromptTag {
  id: string;
  text: string;
  weight: number;
  enabled: boolean;
  selected: boolean;
  syntax: WeightSyntax;
}

export const MIN_WEIGHT = 0.1;
export const MAX_WEIGHT = 3.0;
export const DEFAULT_WEIGHT = 1.0;
/** Increment used by the increase/decrease weight actions */
export const WEIGHT_STEP = 0.05;
/** Multiplier applied per `{}` layer (divisor per `[]` layer) */
export const EMPHASIS_FACTOR = 1.05;
/** Beyond this many layers a weight is written in numeric form instead */
export const MAX_BRACKET_LAYERS = 10;

export function clampWeight(weight: number): number {
  if (Number.isNaN(weight)) return DEFAULT_WEIGHT;
  return Math.min(MAX_WEIGHT, Math.max(MIN_WEIGHT, weight));
}

export interface CreateTagOptions {
  /** Unique within the list the tag joins; see {@link nextTagId} */
  id: string;
  weight?: number;
  enabled?: boolean;
  syntax?: WeightSyntax;
}

export function createTag(text: string, options: CreateTagOptions): PromptTag {
  return {
    id: options.id,
    text: text.trim(),
    weight: clampWeight(options.weight ?? DEFAULT_WEIGHT),
    enabled: options.enabled ?? true,
    selected: false,
    syntax: options.syntax ?? 'none',
  };
}

/**
 * First `t<n>` id not used in `tags`, counting up from the list length so ids
 * assigned by the parser (`t0` … `t<len-1>`) are skipped without a scan.
 */
export function nextTagId(tags: readonly PromptTag[]): string {
  const used = new Set(tags.map(t => t.id));
  let n = tags.length;
  while (used.has(`t${n}`)) n++;
  return `t${n}`;
}

// Stepping works on hundredths so repeated +0.05 does not drift (1.1500000000000001).
function roundToHundredths(value: number): number {
  return Math.round(value * 100) / 100;
}

export function increaseWeight(tag: PromptTag): PromptTag {
  const weight = clampWeight(roundToHundredths(tag.weight + WEIGHT_STEP));
  return weight === tag.weight ? tag : { ...tag, weight };
}

export function decreaseWeight(tag: PromptTag): PromptTag {
  const weight = clampWeight(roundToHundredths(tag.weight - WEIGHT_STEP));
  return weight === tag.weight ? tag : { ...tag, weight };
}

/**
 * Signed number of emphasis layers that reproduces `weight` exactly enough to
 * survive a round trip: positive for braces, negative for brackets, 0 when the
 * weight is not a layer multiple (or needs more than MAX_BRACKET_LAYERS).
 */
export function bracketLayersFor(weight: number): number {
  const layers = Math.round(Math.log(weight) / Math.log(EMPHASIS_FACTOR));
  if (layers === 0 || Math.abs(layers) > MAX_BRACKET_LAYERS) return 0;
  return Math.abs(Math.pow(EMPHASIS_FACTOR, layers) - weight) < 0.005 ? layers : 0;
}

export function weightForLayers(layers: number): number {
  return Math.pow(EMPHASIS_FACTOR, layers);
}

/** `2` for 2.0, `1.5` for 1.50, `0.95` for 0.954 */
export function formatWeight(weight: number): string {
  if (Number.isInteger(weight)) return String(weight);
  return weight.toFixed(2).replace(/0+$/, '').replace(/\.$/, '');
}

export function isDefaultWeight(weight: number): boolean {
  return Math.abs(weight - DEFAULT_WEIGHT) < 0.001;
}
