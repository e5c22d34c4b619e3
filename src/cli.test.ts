import { describe, test, expect, afterEach, vi } from 'vitest';
import * as fc from 'fast-check';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  assertNoOutputConflict,
  CliOptions,
  formatDiagnostics,
  formatOutput,
  normalizeInput,
  parseArgs,
  run,
} from './cli';
import { setDefaultTheme } from './highlight-colors';

function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'prompt-syntax-cli-'));
}

function options(overrides: Partial<CliOptions>): CliOptions {
  return {
    help: false,
    version: false,
    inputPath: '',
    force: false,
    strict: false,
    format: 'tags',
    theme: 'light',
    ...overrides,
  };
}

afterEach(() => {
  vi.restoreAllMocks();
  setDefaultTheme('light');
});

describe('parseArgs', () => {
  test('fills defaults for a bare input path', () => {
    expect(parseArgs(['node', 'cli.js', 'in.txt'])).toEqual(options({ inputPath: 'in.txt' }));
  });

  test('Property: flag values are preserved', () => {
    fc.assert(
      fc.property(
        fc.stringMatching(/^[a-zA-Z][a-zA-Z0-9._-]{0,9}$/),
        fc.option(fc.stringMatching(/^[a-zA-Z][a-zA-Z0-9._-]{0,9}$/), { nil: undefined }),
        fc.constantFrom('tags' as const, 'prompt' as const, 'runs' as const, 'errors' as const, 'html' as const),
        fc.constantFrom('light' as const, 'dark' as const),
        fc.boolean(),
        fc.boolean(),
        (inputPath, outputPath, format, theme, force, strict) => {
          const args = ['node', 'cli.js', inputPath, '--format', format, '--theme', theme];
          if (outputPath !== undefined) args.push('--output', outputPath);
          if (force) args.push('--force');
          if (strict) args.push('--strict');
          expect(parseArgs(args)).toEqual(options({ inputPath, outputPath, format, theme, force, strict }));
        }
      ),
      { numRuns: 100 }
    );
  });

  test('rejects bad values and unknown flags', () => {
    expect(() => parseArgs(['node', 'cli.js', 'in.txt', '--format', 'xml'])).toThrow(
      'Invalid format "xml". Use tags, prompt, runs, errors, html'
    );
    expect(() => parseArgs(['node', 'cli.js', 'in.txt', '--theme', 'neon'])).toThrow(
      'Invalid theme "neon". Use light or dark'
    );
    expect(() => parseArgs(['node', 'cli.js', 'in.txt', '--bogus'])).toThrow('Unknown option "--bogus"');
    expect(() => parseArgs(['node', 'cli.js', 'in.txt', '--output', '--force'])).toThrow('--output requires a value');
  });

  test('requires an input unless asking for help or version', () => {
    expect(() => parseArgs(['node', 'cli.js'])).toThrow('No input file specified');
    expect(parseArgs(['node', 'cli.js', '--help']).help).toBe(true);
    expect(parseArgs(['node', 'cli.js', '--version']).version).toBe(true);
  });
});

describe('formatOutput', () => {
  test('tags lists weight and text per line', () => {
    expect(formatOutput('1.5::forest::, {castle}', 'tags', 'light')).toBe('1.5\tforest\n1.05\tcastle');
  });

  test('prompt writes canonical text', () => {
    expect(formatOutput('{ castle }，plain', 'prompt', 'light')).toBe('{castle}, plain');
  });

  test('runs lists styled spans', () => {
    expect(formatOutput('a {b}', 'runs', 'light')).toBe('2-5\tbrace\t"{b}"');
  });

  test('errors lists offsets and messages', () => {
    expect(formatOutput('{a, b}}', 'errors', 'light')).toBe('6: unmatched closing bracket');
  });

  test('html renders a themed block', () => {
    expect(formatOutput('a', 'html', 'dark')).toBe('<pre class="prompt-syntax prompt-syntax-dark"><code>a</code></pre>');
  });
});

test('normalizeInput drops exactly one trailing line break', () => {
  expect(normalizeInput('a\r\n')).toBe('a');
  expect(normalizeInput('a\n\n')).toBe('a\n');
  expect(normalizeInput('a')).toBe('a');
});

test('formatDiagnostics joins one line per error', () => {
  expect(formatDiagnostics([
    { code: 'UnclosedOpeningBracket', message: 'unclosed opening bracket', start: 0, end: 1 },
    { code: 'UnmatchedClosingBracket', message: 'unmatched closing bracket', start: 3, end: 4 },
  ])).toBe('0: unclosed opening bracket\n3: unmatched closing bracket');
});

describe('run', () => {
  test('writes output to a file and prints its path', async () => {
    const dir = tempDir();
    const inputPath = path.join(dir, 'in.prompt');
    const outputPath = path.join(dir, 'out.txt');
    fs.writeFileSync(inputPath, '{ castle }, plain\n');
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);

    await run(options({ inputPath, outputPath, format: 'prompt' }));

    expect(fs.readFileSync(outputPath, 'utf8')).toBe('{castle}, plain\n');
    expect(log).toHaveBeenCalledWith(outputPath);
  });

  test('refuses to overwrite without --force', async () => {
    const dir = tempDir();
    const inputPath = path.join(dir, 'in.prompt');
    const outputPath = path.join(dir, 'out.txt');
    fs.writeFileSync(inputPath, 'a');
    fs.writeFileSync(outputPath, 'old');

    await expect(run(options({ inputPath, outputPath }))).rejects.toThrow(
      `Output file already exists: ${outputPath}\nUse --force to overwrite`
    );
    expect(fs.readFileSync(outputPath, 'utf8')).toBe('old');
  });

  test('warns on stderr and fails in strict mode', async () => {
    const dir = tempDir();
    const inputPath = path.join(dir, 'in.prompt');
    fs.writeFileSync(inputPath, 'cat}');
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(run(options({ inputPath, strict: true }))).rejects.toThrow('1 syntax error(s) found');
    expect(warn).toHaveBeenCalledWith('Warning: offset 3: unmatched closing bracket');
  });

  test('reports a missing input file', async () => {
    await expect(run(options({ inputPath: path.join(tempDir(), 'missing.prompt') }))).rejects.toThrow(
      'File not found:'
    );
  });
});

test('assertNoOutputConflict passes with --force', () => {
  const dir = tempDir();
  const outputPath = path.join(dir, 'out.txt');
  fs.writeFileSync(outputPath, 'x');
  expect(() => assertNoOutputConflict(outputPath, true)).not.toThrow();
  expect(() => assertNoOutputConflict(outputPath, false)).toThrow('Output file already exists');
});
