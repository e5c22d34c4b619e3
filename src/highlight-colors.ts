import { clampDepth, SyntaxKind } from './syntax-match';

// --- Implementation notes ---
// - Colors are presentation only: nothing in the scanners or the merger reads them
// - Depth ramp: deeper nesting is darker on light backgrounds, lighter on dark ones
// - Weight ramp: saturation grows with |weight - 1|, capped at a distance of 2
// - Fixed accents are shared by preview HTML, CLI html output and editor clients

export type PromptTheme = 'light' | 'dark';

export const VALID_THEMES: readonly PromptTheme[] = ['light', 'dark'];

interface ThemePalette {
  braceHue: number;
  bracketHue: number;
  /** Lightness at depth 1 */
  depthBase: number;
  /** Lightness change per extra level (sign gives the direction) */
  depthStep: number;
  amplifyHue: number;
  attenuateHue: number;
  weightLightness: number;
  baseline: string;
  alias: string;
  dynamicChoice: string;
  error: string;
}

const PALETTES: Record<PromptTheme, ThemePalette> = {
  light: {
    braceHue: 35,
    bracketHue: 205,
    depthBase: 45,
    depthStep: -6,
    amplifyHue: 15,
    attenuateHue: 220,
    weightLightness: 42,
    baseline: '#6E7781',
    alias: '#8250DF',
    dynamicChoice: '#0A7E6E',
    error: '#CF222E',
  },
  dark: {
    braceHue: 40,
    bracketHue: 200,
    depthBase: 60,
    depthStep: 6,
    amplifyHue: 20,
    attenuateHue: 215,
    weightLightness: 66,
    baseline: '#8B949E',
    alias: '#D2A8FF',
    dynamicChoice: '#56D4BC',
    error: '#FF7B72',
  },
};

/** Module-level default theme, updated from CLI flags or client settings */
let _defaultTheme: PromptTheme = 'light';

export function isPromptTheme(value: string): value is PromptTheme {
  return value === 'light' || value === 'dark';
}

export function setDefaultTheme(theme: string): void {
  _defaultTheme = isPromptTheme(theme) ? theme : 'light';
}

export function getDefaultTheme(): PromptTheme {
  return _defaultTheme;
}

function hsl(hue: number, saturation: number, lightness: number): string {
  return `hsl(${hue}, ${Math.round(saturation)}%, ${Math.round(lightness)}%)`;
}

/** Lightness ramp for brace/bracket runs; depth is clamped to 1..5. */
export function depthColor(family: 'brace' | 'bracket', depth: number, theme: PromptTheme): string {
  const p = PALETTES[theme];
  const level = clampDepth(depth);
  const hue = family === 'brace' ? p.braceHue : p.bracketHue;
  return hsl(hue, 75, p.depthBase + (level - 1) * p.depthStep);
}

/**
 * Continuous ramp keyed by distance from 1.0. Weights above 1 use the warm
 * hue, weights below 1 the cool hue, and exactly 1 the baseline accent.
 */
export function weightColor(weight: number, theme: PromptTheme): string {
  const p = PALETTES[theme];
  const distance = Math.abs(weight - 1.0);
  if (distance < 0.001) return p.baseline;
  const intensity = Math.min(distance / 2, 1);
  const hue = weight > 1 ? p.amplifyHue : p.attenuateHue;
  return hsl(hue, 40 + 50 * intensity, p.weightLightness);
}

export function colorForKind(kind: SyntaxKind, theme: PromptTheme): string {
  const p = PALETTES[theme];
  switch (kind.type) {
    case 'brace':
    case 'bracket':
      return depthColor(kind.type, kind.depth, theme);
    case 'weight-main':
      return weightColor(kind.weight, theme);
    case 'weight-trailing':
      return p.baseline;
    case 'alias':
      return p.alias;
    case 'dynamic-choice':
      return p.dynamicChoice;
    case 'error':
      return p.error;
  }
}
