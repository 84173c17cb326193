/**
 * @fileoverview Comment-prefix table per language id
 *
 * The parser never guesses at comment syntax: it looks the file up here by
 * file name, then by extension, and falls back to the language-agnostic
 * entry. Configuration may map more extensions onto an existing id.
 */

import * as path from 'node:path';

export interface CommentStyle {
  readonly id: string;
  /** Line-comment and block-comment openers, including continuation `*`. */
  readonly prefixes: readonly string[];
  /** Block-comment closers stripped from the end of a tag line. */
  readonly suffixes: readonly string[];
  /** Opener (and closer) used when writing a tag. */
  readonly preferred: { readonly prefix: string; readonly suffix?: string };
}

interface LanguageEntry {
  readonly style: CommentStyle;
  readonly extensions: readonly string[];
  readonly fileNames?: readonly string[];
}

const C_FAMILY = { prefixes: ['//', '/*', '*'], suffixes: ['*/'], preferred: { prefix: '//' } } as const;
const HASH = { prefixes: ['#'], suffixes: [], preferred: { prefix: '#' } } as const;
const DASH = { prefixes: ['--'], suffixes: [], preferred: { prefix: '--' } } as const;

const LANGUAGES: readonly LanguageEntry[] = [
  { style: { id: 'python', ...HASH }, extensions: ['.py', '.pyi', '.pyw'] },
  { style: { id: 'ruby', ...HASH }, extensions: ['.rb', '.rake'], fileNames: ['Gemfile', 'Rakefile'] },
  { style: { id: 'shell', ...HASH }, extensions: ['.sh', '.bash', '.zsh', '.fish'] },
  { style: { id: 'config', ...HASH }, extensions: ['.yaml', '.yml', '.toml', '.ini', '.cfg', '.conf'] },
  { style: { id: 'build', ...HASH }, extensions: ['.mk', '.cmake'], fileNames: ['Makefile', 'Dockerfile', 'CMakeLists.txt'] },
  { style: { id: 'r', ...HASH }, extensions: ['.r'] },
  { style: { id: 'perl', ...HASH }, extensions: ['.pl', '.pm'] },
  { style: { id: 'elixir', ...HASH }, extensions: ['.ex', '.exs'] },
  { style: { id: 'javascript', ...C_FAMILY }, extensions: ['.js', '.mjs', '.cjs', '.jsx'] },
  { style: { id: 'typescript', ...C_FAMILY }, extensions: ['.ts', '.mts', '.cts', '.tsx'] },
  { style: { id: 'c', ...C_FAMILY }, extensions: ['.c', '.h'] },
  { style: { id: 'cpp', ...C_FAMILY }, extensions: ['.cpp', '.cc', '.cxx', '.hpp', '.hh', '.hxx'] },
  { style: { id: 'jvm', ...C_FAMILY }, extensions: ['.java', '.kt', '.kts', '.scala', '.groovy'] },
  { style: { id: 'csharp', ...C_FAMILY }, extensions: ['.cs'] },
  { style: { id: 'go', ...C_FAMILY }, extensions: ['.go'] },
  { style: { id: 'rust', ...C_FAMILY }, extensions: ['.rs'] },
  { style: { id: 'swift', ...C_FAMILY }, extensions: ['.swift'] },
  { style: { id: 'dart', ...C_FAMILY }, extensions: ['.dart'] },
  {
    style: { id: 'php', prefixes: ['//', '#', '/*', '*'], suffixes: ['*/'], preferred: { prefix: '//' } },
    extensions: ['.php'],
  },
  {
    style: { id: 'css', prefixes: ['/*', '*', '//'], suffixes: ['*/'], preferred: { prefix: '/*', suffix: '*/' } },
    extensions: ['.css', '.scss', '.less'],
  },
  { style: { id: 'sql', ...DASH }, extensions: ['.sql'] },
  { style: { id: 'lua', ...DASH }, extensions: ['.lua'] },
  {
    style: { id: 'haskell', prefixes: ['--', '{-'], suffixes: ['-}'], preferred: { prefix: '--' } },
    extensions: ['.hs', '.lhs', '.elm'],
  },
  {
    style: { id: 'markup', prefixes: ['<!--'], suffixes: ['-->'], preferred: { prefix: '<!--', suffix: '-->' } },
    extensions: ['.html', '.htm', '.xml', '.svg', '.md', '.vue'],
  },
  {
    style: { id: 'ocaml', prefixes: ['(*', '*'], suffixes: ['*)'], preferred: { prefix: '(*', suffix: '*)' } },
    extensions: ['.ml', '.mli'],
  },
  {
    style: { id: 'lisp', prefixes: [';'], suffixes: [], preferred: { prefix: ';;' } },
    extensions: ['.lisp', '.el', '.clj', '.cljs', '.scm'],
  },
  {
    style: { id: 'percent', prefixes: ['%'], suffixes: [], preferred: { prefix: '%' } },
    extensions: ['.tex', '.erl', '.m'],
  },
];

/** Used when a file's language is unknown. */
export const FALLBACK_STYLE: CommentStyle = {
  id: 'fallback',
  prefixes: ['<!--', '(*', '{-', '//', '/*', '--', '#', '*', ';', '%'],
  suffixes: ['*/', '-->', '*)', '-}'],
  preferred: { prefix: '#' },
};

const BY_ID = new Map<string, CommentStyle>(LANGUAGES.map((entry) => [entry.style.id, entry.style]));

const BY_EXTENSION = new Map<string, CommentStyle>();
const BY_FILE_NAME = new Map<string, CommentStyle>();
for (const entry of LANGUAGES) {
  for (const extension of entry.extensions) BY_EXTENSION.set(extension, entry.style);
  for (const fileName of entry.fileNames ?? []) BY_FILE_NAME.set(fileName, entry.style);
}

export function getCommentStyle(languageId: string): CommentStyle | undefined {
  if (languageId === FALLBACK_STYLE.id) return FALLBACK_STYLE;
  return BY_ID.get(languageId);
}

export function listLanguageIds(): string[] {
  return Array.from(BY_ID.keys());
}

/**
 * Resolve the comment style for a path.
 *
 * @param overrides - file name or extension (with leading dot) → language id
 */
export function commentStyleForPath(
  filePath: string,
  overrides: Readonly<Record<string, string>> = {}
): CommentStyle {
  const baseName = path.posix.basename(filePath.replace(/\\/g, '/'));
  const extension = path.posix.extname(baseName).toLowerCase();
  const overridden = overrides[baseName] ?? (extension ? overrides[extension] : undefined);
  if (overridden) {
    const style = getCommentStyle(overridden);
    if (style) return style;
  }
  return BY_FILE_NAME.get(baseName) ?? BY_EXTENSION.get(extension) ?? FALLBACK_STYLE;
}

/** Prefixes longest-first so `<!--` wins over shorter openers. */
export function orderedPrefixes(style: CommentStyle): readonly string[] {
  return [...style.prefixes].sort((a, b) => b.length - a.length);
}

export function isCommentLine(line: string, style: CommentStyle): boolean {
  const trimmed = line.trimStart();
  return style.prefixes.some((prefix) => trimmed.startsWith(prefix));
}
