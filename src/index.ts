export * from './prompt-tag';
export * from './syntax-match';
export { scanBrackets, maxBracketDepth } from './bracket-matcher';
export { scanWeights, parseWeightToken } from './weight-syntax';
export type { WeightScan } from './weight-syntax';
export { scanAliases, aliasEnds, aliasMatches, aliasName } from './alias-syntax';
export { locateChoiceBlocks, scanDynamicChoices, choiceOptions } from './dynamic-choice';
export type { ChoiceBlock } from './dynamic-choice';
export { collectMatches, mergeMatches, buildRuns } from './match-merger';
export type { HighlightRun, RunStyle, MatchPool } from './match-merger';
export {
  VALID_THEMES,
  colorForKind,
  depthColor,
  weightColor,
  isPromptTheme,
  setDefaultTheme,
  getDefaultTheme,
} from './highlight-colors';
export type { PromptTheme } from './highlight-colors';
export { parsePrompt, parsePromptDetailed, parseSegment, splitSegments } from './prompt-parser';
export type { ParseNote, ParseResult, ParsedSegment, PromptSegment } from './prompt-parser';
export { formatTag, toPromptString, TAG_SEPARATOR } from './prompt-serializer';
export * from './tag-operations';
export { readSelectionWeight, applySelectionWeight } from './selection-weight';
export type { TextSelection, SelectionWeight } from './selection-weight';
export { HighlightCache } from './highlight-cache';
export type { HighlightResult } from './highlight-cache';
export { scanPrompt, PromptHighlighter } from './syntax-highlighter';
export { promptMarkdownPlugin, renderPromptHtml } from './preview/prompt-markdown-plugin';
export type { PromptPluginOptions } from './preview/prompt-markdown-plugin';
