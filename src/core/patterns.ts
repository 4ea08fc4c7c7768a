/**
 * Every pattern class, highest priority first.
 */
export const LINK_CLASSES = [
  'markdown_link',
  'relative_path_link',
  'docs_reference_link',
  'inline_code_file_reference',
  'bare_path',
  'source_path_reference',
] as const;

export type LinkClass = (typeof LINK_CLASSES)[number];

export const DEFAULT_DOCS_PREFIX = 'docs/';

/** Documents with these suffixes are prose; anything else is scanned as source. */
export const MARKDOWN_EXTENSIONS = ['.md', '.markdown'];

/** Classes that only run over source and config files */
export const SOURCE_CLASSES: readonly LinkClass[] = ['source_path_reference'];

export interface PatternClass {
  kind: LinkClass;
  pattern: RegExp;
  /** Capture group holding the target path */
  group: number;
}

const LABEL = String.raw`\[[^\]\n]*\]`;
const ANCHOR = String.raw`(?:#[^\s)]*)?`;
const TARGET_TAIL = String.raw`[^\s()#]+\.md`;

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Normalize a docs prefix to the `segment/` form used for matching.
 */
export function normalizeDocsPrefix(prefix: string): string {
  const trimmed = prefix.trim().replace(/\\/g, '/').replace(/^\.?\/+/, '').replace(/\/+$/, '');
  return trimmed ? `${trimmed}/` : DEFAULT_DOCS_PREFIX;
}

function sources(docsPrefix: string): Record<LinkClass, string> {
  const p = escapeRegExp(docsPrefix);
  return {
    markdown_link: `${LABEL}\\((${TARGET_TAIL})${ANCHOR}\\)`,
    relative_path_link: `${LABEL}\\((\\.\\./${TARGET_TAIL})${ANCHOR}\\)`,
    docs_reference_link: `${LABEL}\\((${p}${TARGET_TAIL})${ANCHOR}\\)`,
    inline_code_file_reference: '`([^`\\s]+\\.md)`',
    // not inside a longer path or URL, not the head of a longer name
    bare_path: `(?<![\\w./-])(${p}[\\w/-]+\\.md)(?![\\w-])`,
    // "docs/a.md" or '../docs/a.md' in a string literal
    source_path_reference: `(["'])((?:\\.\\.?/)*${p}[^"'\\s]*\\.md)\\1`,
  };
}

/**
 * Build the ordered pattern table. Disabled classes are dropped; the
 * remaining ones keep their relative priority.
 */
export function buildPatternTable(
  docsPrefix: string = DEFAULT_DOCS_PREFIX,
  enabled: readonly LinkClass[] = LINK_CLASSES
): PatternClass[] {
  const src = sources(normalizeDocsPrefix(docsPrefix));
  return LINK_CLASSES
    .filter(kind => enabled.includes(kind))
    .map(kind => ({ kind, pattern: new RegExp(src[kind], 'gd'), group: kind === 'source_path_reference' ? 2 : 1 }));
}

export function isMarkdownPath(path: string): boolean {
  const lower = path.toLowerCase();
  return MARKDOWN_EXTENSIONS.some(ext => lower.endsWith(ext));
}

/**
 * Split the enabled classes by document kind: prose documents run the link
 * classes, source and config files only the string-literal class.
 */
export function classesFor(path: string, enabled: readonly LinkClass[]): LinkClass[] {
  const source = !isMarkdownPath(path);
  return enabled.filter(kind => SOURCE_CLASSES.includes(kind) === source);
}

export function isLinkClass(value: string): value is LinkClass {
  return LINK_CLASSES.some(kind => kind === value);
}
