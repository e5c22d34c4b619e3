import {
	createConnection,
	DocumentFormattingParams,
	Hover,
	HoverParams,
	InitializeParams,
	MarkupKind,
	ProposedFeatures,
	Range,
	TextDocumentSyncKind,
	TextDocuments,
	TextEdit,
} from 'vscode-languageserver/node';
import { TextDocument } from 'vscode-languageserver-textdocument';

// --- Implementation notes ---
// - Diagnostics are advisory: every malformed prompt still gets hover and partial results
// - Validation is debounced per document; keystroke bursts publish once
// - Formatting refuses to touch documents with diagnostics (it would drop malformed parts)

import {
	computeDiagnostics,
	computeFormattingEdits,
	findTagAtOffset,
	formatTagHover,
	isPromptUri,
} from './prompt-language';

const connection = createConnection(ProposedFeatures.all);
const documents: TextDocuments<TextDocument> = new TextDocuments(TextDocument);

/** Client-provided settings. */
interface LspSettings {
	validationDebounceMs?: number;
}
let settings: LspSettings = {};

const DEFAULT_VALIDATION_DEBOUNCE_MS = 200;
const validationTimers = new Map<string, ReturnType<typeof setTimeout>>();

function isLspSettings(value: unknown): value is LspSettings {
	if (typeof value !== 'object' || value === null) return false;
	const debounce: unknown = Reflect.get(value, 'validationDebounceMs');
	return debounce === undefined || typeof debounce === 'number';
}

function debounceMs(): number {
	const ms = settings.validationDebounceMs;
	return ms !== undefined && ms >= 0 ? ms : DEFAULT_VALIDATION_DEBOUNCE_MS;
}

function validate(doc: TextDocument): void {
	try {
		connection.sendDiagnostics({ uri: doc.uri, diagnostics: computeDiagnostics(doc) });
	} catch (error) {
		connection.console.error(
			`Validation error for ${doc.uri}: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}`
		);
	}
}

function scheduleValidation(uri: string): void {
	const existing = validationTimers.get(uri);
	if (existing) clearTimeout(existing);
	validationTimers.set(uri, setTimeout(() => {
		validationTimers.delete(uri);
		const doc = documents.get(uri);
		if (doc) validate(doc);
	}, debounceMs()));
}

function getPromptDocument(uri: string): TextDocument | undefined {
	const doc = documents.get(uri);
	return doc && isPromptUri(doc.uri, doc.languageId) ? doc : undefined;
}

connection.onInitialize((params: InitializeParams) => {
	if (isLspSettings(params.initializationOptions)) {
		settings = params.initializationOptions;
	}

	return {
		capabilities: {
			textDocumentSync: TextDocumentSyncKind.Incremental,
			hoverProvider: true,
			documentFormattingProvider: true,
		},
	};
});

connection.onDidChangeConfiguration((params) => {
	if (isLspSettings(params.settings)) {
		settings = params.settings;
	}
});

documents.onDidOpen((event) => {
	if (isPromptUri(event.document.uri, event.document.languageId)) {
		validate(event.document);
	}
});

documents.onDidChangeContent((event) => {
	if (isPromptUri(event.document.uri, event.document.languageId)) {
		scheduleValidation(event.document.uri);
	}
});

documents.onDidClose((event) => {
	const pending = validationTimers.get(event.document.uri);
	if (pending) {
		clearTimeout(pending);
		validationTimers.delete(event.document.uri);
	}
	connection.sendDiagnostics({ uri: event.document.uri, diagnostics: [] });
});

connection.onShutdown(() => {
	for (const timer of validationTimers.values()) clearTimeout(timer);
	validationTimers.clear();
});

connection.onHover((params: HoverParams): Hover | null => {
	const doc = getPromptDocument(params.textDocument.uri);
	if (!doc) return null;
	try {
		const text = doc.getText();
		const found = findTagAtOffset(text, doc.offsetAt(params.position));
		if (!found) return null;
		return {
			contents: { kind: MarkupKind.Markdown, value: formatTagHover(found.tag) },
			range: Range.create(doc.positionAt(found.segment.start), doc.positionAt(found.segment.end)),
		};
	} catch (error) {
		connection.console.error(`Hover error: ${error instanceof Error ? error.message : String(error)}`);
		return null;
	}
});

connection.onDocumentFormatting((params: DocumentFormattingParams): TextEdit[] => {
	const doc = getPromptDocument(params.textDocument.uri);
	if (!doc) return [];
	try {
		return computeFormattingEdits(doc);
	} catch (error) {
		connection.console.error(`Formatting error: ${error instanceof Error ? error.message : String(error)}`);
		return [];
	}
});

documents.listen(connection);
connection.listen();
