import {
	Diagnostic,
	DiagnosticSeverity,
	Range,
	TextEdit,
} from 'vscode-languageserver/node';
import type { TextDocument } from 'vscode-languageserver-textdocument';
import { parsePromptDetailed, PromptSegment } from '../prompt-parser';
import { toPromptString } from '../prompt-serializer';
import { bracketLayersFor, formatWeight, isDefaultWeight, PromptTag } from '../prompt-tag';
import { scanPrompt } from '../syntax-highlighter';
import type { SyntaxDiagnostic } from '../syntax-match';

export const PROMPT_LANGUAGE_ID = 'prompt';
export const DIAGNOSTIC_SOURCE = 'prompt-syntax';

export function isPromptUri(uri: string, languageId?: string): boolean {
	if (languageId === PROMPT_LANGUAGE_ID) return true;
	return /\.prompt$/i.test(uri);
}

function severityFor(diagnostic: SyntaxDiagnostic): DiagnosticSeverity {
	return diagnostic.code === 'MalformedWeightSyntax' ? DiagnosticSeverity.Warning : DiagnosticSeverity.Error;
}

/** Scanner diagnostics plus parser notes the scanner cannot see (e.g. `x::y` without a closing `::`). */
export function collectPromptDiagnostics(text: string): SyntaxDiagnostic[] {
	const { errors } = scanPrompt(text);
	const { notes } = parsePromptDetailed(text);
	const seen = new Set(errors.map(e => `${e.code}:${e.start}`));
	const merged = [...errors];
	for (const note of notes) {
		if (!seen.has(`${note.code}:${note.start}`)) merged.push(note);
	}
	return merged.sort((a, b) => a.start - b.start);
}

export function computeDiagnostics(doc: TextDocument): Diagnostic[] {
	return collectPromptDiagnostics(doc.getText()).map(d => ({
		range: Range.create(doc.positionAt(d.start), doc.positionAt(d.end)),
		severity: severityFor(d),
		code: d.code,
		source: DIAGNOSTIC_SOURCE,
		message: d.message,
	}));
}

export interface TagAtOffset {
	tag: PromptTag;
	segment: PromptSegment;
}

/** The tag whose segment contains `offset` (segment end inclusive, so a cursor after the text counts). */
export function findTagAtOffset(text: string, offset: number): TagAtOffset | undefined {
	const { tags, segments } = parsePromptDetailed(text);
	for (const segment of segments) {
		if (offset < segment.start || offset > segment.end || segment.tagId === undefined) continue;
		const tag = tags.find(t => t.id === segment.tagId);
		if (tag) return { tag, segment };
	}
	return undefined;
}

function describeWeight(tag: PromptTag): string {
	if (isDefaultWeight(tag.weight)) return 'weight 1 (neutral)';
	const weight = `weight ${formatWeight(Math.round(tag.weight * 1000) / 1000)}`;
	if (tag.syntax === 'numeric') return `${weight} (explicit)`;
	const layers = bracketLayersFor(tag.weight);
	if (layers > 0) return `${weight} (${layers} brace ${layers === 1 ? 'level' : 'levels'})`;
	if (layers < 0) return `${weight} (${-layers} bracket ${layers === -1 ? 'level' : 'levels'})`;
	return weight;
}

/** Markdown hover body for a tag. */
export function formatTagHover(tag: PromptTag): string {
	return `**${tag.text}**\n\n${describeWeight(tag)}`;
}

/**
 * Edits that rewrite the document in canonical form. Returns no edits when
 * the text has any diagnostic (formatting would drop the malformed parts) or
 * is already canonical. A trailing line break is preserved.
 */
export function computeFormattingEdits(doc: TextDocument): TextEdit[] {
	const text = doc.getText();
	if (collectPromptDiagnostics(text).length > 0) return [];

	const newline = /\r?\n$/.exec(text)?.[0] ?? '';
	const canonical = toPromptString(parsePromptDetailed(text).tags) + newline;
	if (canonical === text) return [];

	return [TextEdit.replace(Range.create(doc.positionAt(0), doc.positionAt(text.length)), canonical)];
}
