import { lstatSync, readdirSync, readFileSync } from 'node:fs';
import { join, relative, sep } from 'node:path';
import { DocumentReadError, ErrorRecord, errorMessage, toErrorRecord } from './errors.js';
import { isIgnored } from './ignore.js';
import { buildPatternTable, classesFor, DEFAULT_DOCS_PREFIX, LINK_CLASSES, LinkClass, PatternClass } from './patterns.js';
import type { LinkmendConfig } from './config.js';

export interface Document {
  /** Root-relative, always `/`-separated */
  path: string;
  content: string;
}

export interface LinkReference {
  source: string;
  kind: LinkClass;
  /** Whole matched text, label and markup included */
  raw: string;
  /** Target path exactly as written */
  target: string;
  /** Offsets of `target` inside the document, end exclusive */
  start: number;
  end: number;
  line: number;
  column: number;
}

export interface ScanResult {
  documents: Document[];
  references: LinkReference[];
  errors: ErrorRecord[];
}

const SKIP_DIRS = new Set(['node_modules']);

export function toPosix(p: string): string {
  return sep === '/' ? p : p.split(sep).join('/');
}

/**
 * Recursively find documents under a directory, sorted by path.
 * Symlinks are not followed: a rewrite would replace the link with a copy.
 */
export function findDocuments(
  root: string,
  extensions: readonly string[] = ['.md'],
  ignore: readonly string[] = []
): string[] {
  const results: string[] = [];

  function walk(dir: string): void {
    let entries: string[];
    try {
      entries = readdirSync(dir);
    } catch {
      return;
    }

    for (const entry of entries) {
      if (entry.startsWith('.') || SKIP_DIRS.has(entry)) continue;
      const full = join(dir, entry);
      let stat;
      try {
        stat = lstatSync(full);
      } catch {
        continue;
      }
      if (stat.isDirectory()) {
        walk(full);
      } else if (stat.isFile() && extensions.some(ext => entry.toLowerCase().endsWith(ext))) {
        const rel = toPosix(relative(root, full));
        if (!isIgnored(rel, ignore)) results.push(rel);
      }
    }
  }

  walk(root);
  return results.sort();
}

const decoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Read a document as strict UTF-8. A BOM stays part of the text so a
 * rewrite puts it back.
 */
export function readDocument(root: string, path: string): string {
  let bytes: Buffer;
  try {
    bytes = readFileSync(join(root, path));
  } catch (e) {
    throw new DocumentReadError(path, `could not read ${path}: ${errorMessage(e)}`, { cause: e });
  }
  try {
    return decoder.decode(bytes);
  } catch (e) {
    throw new DocumentReadError(path, `${path} is not valid UTF-8`, { cause: e });
  }
}

function lineStarts(content: string): number[] {
  const starts = [0];
  for (let i = 0; i < content.length; i++) {
    if (content.charCodeAt(i) === 10) starts.push(i + 1);
  }
  return starts;
}

function locate(starts: number[], offset: number): { line: number; column: number } {
  let lo = 0;
  let hi = starts.length - 1;
  while (lo < hi) {
    const mid = (lo + hi + 1) >> 1;
    if (starts[mid] <= offset) lo = mid;
    else hi = mid - 1;
  }
  return { line: lo + 1, column: offset - starts[lo] + 1 };
}

/**
 * Extract every link reference from one document.
 *
 * Classes run in table order. A match whose whole span overlaps a span
 * already claimed by an earlier class is dropped, so one occurrence yields
 * exactly one reference.
 */
export function extractReferences(
  source: string,
  content: string,
  table: readonly PatternClass[] = buildPatternTable(DEFAULT_DOCS_PREFIX, classesFor(source, LINK_CLASSES))
): LinkReference[] {
  const claimed: Array<[number, number]> = [];
  const refs: LinkReference[] = [];
  const starts = lineStarts(content);

  const overlaps = (s: number, e: number): boolean => claimed.some(([cs, ce]) => s < ce && cs < e);

  for (const { kind, pattern, group } of table) {
    for (const match of content.matchAll(pattern)) {
      const span = match.indices?.[group];
      const target = match[group];
      if (span === undefined || target === undefined || match.index === undefined) continue;

      const matchEnd = match.index + match[0].length;
      if (overlaps(match.index, matchEnd)) continue;
      claimed.push([match.index, matchEnd]);

      refs.push({
        source,
        kind,
        raw: match[0],
        target,
        start: span[0],
        end: span[1],
        ...locate(starts, span[0]),
      });
    }
  }

  return refs.sort((a, b) => a.start - b.start);
}

/**
 * Pattern table for one document of the configured tree
 */
export function tableFor(config: LinkmendConfig, path: string): PatternClass[] {
  return buildPatternTable(config.docsPrefix, classesFor(path, config.classes));
}

/**
 * Scan the whole tree. Unreadable documents are recorded and skipped.
 */
export function scanTree(config: LinkmendConfig): ScanResult {
  const documents: Document[] = [];
  const references: LinkReference[] = [];
  const errors: ErrorRecord[] = [];

  for (const path of findDocuments(config.root, config.extensions, config.ignore)) {
    let content: string;
    try {
      content = readDocument(config.root, path);
    } catch (e) {
      if (e instanceof DocumentReadError) {
        errors.push(toErrorRecord(e));
        continue;
      }
      throw e;
    }
    documents.push({ path, content });
    references.push(
      ...extractReferences(path, content, tableFor(config, path)).filter(ref => !isIgnored(ref.target, config.ignore))
    );
  }

  return { documents, references, errors };
}
