#!/usr/bin/env node
import * as fs from 'fs';
import { isPromptTheme, PromptTheme, setDefaultTheme } from './highlight-colors';
import { parsePrompt } from './prompt-parser';
import { toPromptString } from './prompt-serializer';
import { formatWeight } from './prompt-tag';
import { renderPromptHtml } from './preview/prompt-markdown-plugin';
import { scanPrompt } from './syntax-highlighter';
import type { SyntaxDiagnostic } from './syntax-match';

export type OutputFormat = 'tags' | 'prompt' | 'runs' | 'errors' | 'html';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['tags', 'prompt', 'runs', 'errors', 'html'];

export interface CliOptions {
  help: boolean;
  version: boolean;
  /** File to read, or `-` for stdin */
  inputPath: string;
  outputPath?: string;
  force: boolean;
  strict: boolean;
  format: OutputFormat;
  theme: PromptTheme;
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(f => f === value);
}

export function parseArgs(argv: string[]): CliOptions {
  const args = argv.slice(2);
  const options: CliOptions = {
    help: false,
    version: false,
    inputPath: '',
    force: false,
    strict: false,
    format: 'tags',
    theme: 'light',
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const requireValue = (flag: string): string => {
      if (i + 1 >= args.length || args[i + 1].startsWith('--')) {
        throw new Error(`${flag} requires a value`);
      }
      i++;
      return args[i];
    };

    if (arg === '--help') {
      options.help = true;
    } else if (arg === '--version') {
      options.version = true;
    } else if (arg === '--force') {
      options.force = true;
    } else if (arg === '--strict') {
      options.strict = true;
    } else if (arg === '--output') {
      options.outputPath = requireValue('--output');
    } else if (arg === '--format') {
      const format = requireValue('--format');
      if (!isOutputFormat(format)) {
        throw new Error(`Invalid format "${format}". Use ${OUTPUT_FORMATS.join(', ')}`);
      }
      options.format = format;
    } else if (arg === '--theme') {
      const theme = requireValue('--theme');
      if (!isPromptTheme(theme)) {
        throw new Error(`Invalid theme "${theme}". Use light or dark`);
      }
      options.theme = theme;
    } else if (arg.startsWith('--')) {
      throw new Error(`Unknown option "${arg}"`);
    } else if (!options.inputPath) {
      options.inputPath = arg;
    }
  }

  if (!options.help && !options.version && !options.inputPath) {
    throw new Error('No input file specified');
  }

  return options;
}

function showHelp() {
  console.log(`Usage: prompt-syntax <input> [options]

Parse and highlight image-generation prompt text.
Use - as <input> to read from stdin.

Options:
  --help             Show this help message
  --version          Show version number
  --format <fmt>     Output: tags, prompt, runs, errors, html (default: tags)
  --theme <theme>    Color theme for html output: light, dark (default: light)
  --output <path>    Write output to a file instead of stdout
  --force            Overwrite an existing output file
  --strict           Exit with status 1 when syntax errors are found`);
}

function showVersion() {
  const { version } = require('../package.json');
  console.log(version);
}

/** Drop one trailing line break so files saved by editors scan like typed text. */
export function normalizeInput(text: string): string {
  return text.replace(/\r?\n$/, '');
}

export function formatDiagnostics(errors: readonly SyntaxDiagnostic[]): string {
  return errors.map(e => `${e.start}: ${e.message}`).join('\n');
}

/** Render `text` in the requested format; never throws for malformed prompts. */
export function formatOutput(text: string, format: OutputFormat, theme: PromptTheme): string {
  switch (format) {
    case 'tags':
      return parsePrompt(text).map(t => `${formatWeight(t.weight)}\t${t.text}`).join('\n');
    case 'prompt':
      return toPromptString(parsePrompt(text));
    case 'runs':
      return scanPrompt(text, theme).runs
        .flatMap(r => (r.style ? [`${r.start}-${r.end}\t${r.style.kind.type}\t${JSON.stringify(r.text)}`] : []))
        .join('\n');
    case 'errors':
      return formatDiagnostics(scanPrompt(text, theme).errors);
    case 'html':
      return renderPromptHtml(text, theme).trimEnd();
  }
}

export function assertNoOutputConflict(outputPath: string, force: boolean) {
  if (!force && fs.existsSync(outputPath)) {
    throw new Error(`Output file already exists: ${outputPath}\nUse --force to overwrite`);
  }
}

function readInput(inputPath: string): string {
  if (inputPath === '-') return fs.readFileSync(0, 'utf8');
  if (!fs.existsSync(inputPath)) {
    throw new Error(`File not found: ${inputPath}`);
  }
  return fs.readFileSync(inputPath, 'utf8');
}

export async function run(options: CliOptions): Promise<void> {
  setDefaultTheme(options.theme);
  const text = normalizeInput(readInput(options.inputPath));
  const output = formatOutput(text, options.format, options.theme);

  if (options.outputPath) {
    assertNoOutputConflict(options.outputPath, options.force);
    fs.writeFileSync(options.outputPath, output + '\n');
    console.log(options.outputPath);
  } else if (output) {
    console.log(output);
  }

  const { errors } = scanPrompt(text, options.theme);
  if (options.format !== 'errors') {
    for (const e of errors) {
      console.error(`Warning: offset ${e.start}: ${e.message}`);
    }
  }
  if (options.strict && errors.length > 0) {
    throw new Error(`${errors.length} syntax error(s) found`);
  }
}

export async function main() {
  const options = parseArgs(process.argv);

  if (options.help) {
    showHelp();
    return;
  }

  if (options.version) {
    showVersion();
    return;
  }

  await run(options);
}

if (require.main === module) {
  main().catch(e => {
    console.error(e instanceof Error ? e.message : String(e));
    process.exit(1);
  });
}
