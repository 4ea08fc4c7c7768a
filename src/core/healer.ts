import { chmodSync, copyFileSync, existsSync, mkdirSync, renameSync, rmSync, statSync, unlinkSync, writeFileSync } from 'node:fs';
import { basename, dirname, join, posix } from 'node:path';
import {
  ConfigurationError,
  DocumentRewriteError,
  DocumentWriteError,
  ErrorRecord,
  FileMoveError,
  LinkmendError,
  errorMessage,
  toErrorRecord,
} from './errors.js';
import { LinkClass, normalizeDocsPrefix, PatternClass } from './patterns.js';
import { isRootAnchored, normalizeRootPath, ResolvedLink } from './resolver.js';
import { extractReferences, readDocument, tableFor } from './scanner.js';
import type { LinkmendConfig } from './config.js';

export interface RenamePair {
  from: string;
  to: string;
}

/**
 * A checked, normalized rename mapping. Pair order is kept.
 */
export interface RenameMapping {
  pairs: RenamePair[];
  byFrom: Map<string, string>;
  /**
   * Every rename already happened on disk: sources that are not also
   * destinations are gone and every destination exists. Only links that
   * are broken get healed then, and nothing is moved.
   */
  applied: boolean;
}

export interface PlannedEdit {
  document: string;
  kind: LinkClass;
  start: number;
  end: number;
  line: number;
  column: number;
  oldTarget: string;
  newTarget: string;
}

export interface HealOptions {
  /** Write rewritten documents. Without it nothing on disk changes. */
  apply?: boolean;
  /** Rewrite links as if renamed documents already sat at their new paths */
  relocateSources?: boolean;
}

export interface HealOutcome {
  planned: PlannedEdit[];
  /** Edits that were written, or would be written in a dry run */
  healed: PlannedEdit[];
  filesUpdated: string[];
  errors: ErrorRecord[];
}

export interface MoveOutcome {
  moved: RenamePair[];
  skipped: RenamePair[];
  errors: ErrorRecord[];
}

function normalizePair(raw: string, side: 'from' | 'to'): string {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new ConfigurationError(`rename ${side} path is empty`);
  }
  const normalized = normalizeRootPath(trimmed);
  if (normalized === null || normalized === '') {
    throw new ConfigurationError(`rename ${side} path escapes the root: ${raw}`);
  }
  return normalized;
}

/**
 * Normalize and check a rename mapping before anything is written.
 *
 * Rejects empty or escaping paths, duplicate sources, duplicate
 * destinations, and destinations that already exist next to a source that
 * still exists (unless the destination is itself being renamed away, or
 * the whole mapping was already carried out).
 */
export function prepareMapping(pairs: readonly RenamePair[], root: string): RenameMapping {
  if (pairs.length === 0) {
    throw new ConfigurationError('rename mapping is empty');
  }

  const normalized = pairs.map(p => ({ from: normalizePair(p.from, 'from'), to: normalizePair(p.to, 'to') }));
  const byFrom = new Map<string, string>();
  const tos = new Set<string>();

  for (const { from, to } of normalized) {
    if (from === to) {
      throw new ConfigurationError(`rename maps a path to itself: ${from}`);
    }
    if (byFrom.has(from)) {
      throw new ConfigurationError(`duplicate rename source: ${from}`);
    }
    if (tos.has(to)) {
      throw new ConfigurationError(`two renames target the same destination: ${to}`);
    }
    byFrom.set(from, to);
    tos.add(to);
  }

  const exists = (p: string): boolean => existsSync(join(root, p));
  const heads = normalized.filter(({ from }) => !tos.has(from));
  const applied = heads.length > 0 && heads.every(({ from }) => !exists(from)) && normalized.every(({ to }) => exists(to));

  if (!applied) {
    for (const { from, to } of normalized) {
      if (byFrom.has(to)) continue;
      if (exists(to) && exists(from)) {
        throw new ConfigurationError(`destination already exists: ${to}`);
      }
    }
  }

  return { pairs: normalized, byFrom, applied };
}

/**
 * Spell `newPath` the way `link` spelled its old target, as seen from a
 * document at `source`.
 */
export function rewriteTarget(link: ResolvedLink, source: string, newPath: string, docsPrefix: string): string {
  const prefix = normalizeDocsPrefix(docsPrefix);

  if (link.kind === 'bare_path') return newPath;
  if (link.target.startsWith('/')) return `/${newPath}`;
  if (link.target.startsWith(prefix) && newPath.startsWith(prefix)) return newPath;

  const sourceDir = posix.dirname(source);
  const rel = posix.relative(sourceDir, newPath);
  // a relative path that starts with the prefix would read as root-anchored
  if (rel.startsWith(prefix) && sourceDir !== '.') return `./${rel}`;
  if (link.target.startsWith('./') && !rel.startsWith('../')) return `./${rel}`;
  return rel;
}

/**
 * Plan every target rewrite for a mapping. Pure: reads nothing from disk.
 *
 * Links match on their resolved path, so every spelling of a renamed file
 * is found. With `relocateSources`, links inside renamed documents are
 * also re-spelled for the document's new directory.
 */
export function planHeal(
  links: readonly ResolvedLink[],
  mapping: RenameMapping,
  docsPrefix: string,
  options: Pick<HealOptions, 'relocateSources'> = {}
): PlannedEdit[] {
  const edits: PlannedEdit[] = [];
  const relocate = options.relocateSources && !mapping.applied;

  for (const link of links) {
    if (link.resolvedPath === null) continue;

    const renamedTarget = mapping.applied && link.exists ? undefined : mapping.byFrom.get(link.resolvedPath);
    const newSource = relocate ? mapping.byFrom.get(link.source) : undefined;
    if (renamedTarget === undefined && newSource === undefined) continue;
    if (renamedTarget === undefined && isRootAnchored(link.target, docsPrefix)) continue;

    const newTarget = rewriteTarget(
      link,
      newSource ?? link.source,
      renamedTarget ?? link.resolvedPath,
      docsPrefix
    );
    if (newTarget === link.target) continue;

    edits.push({
      document: link.source,
      kind: link.kind,
      start: link.start,
      end: link.end,
      line: link.line,
      column: link.column,
      oldTarget: link.target,
      newTarget,
    });
  }

  return edits;
}

/**
 * Apply edits to one document's content, last span first.
 * Throws if a span no longer holds its expected text or two spans overlap.
 */
export function applyEdits(document: string, content: string, edits: readonly PlannedEdit[]): string {
  const ordered = [...edits].sort((a, b) => b.start - a.start);
  let out = content;
  let floor = Infinity;

  for (const edit of ordered) {
    if (edit.end > floor) {
      throw new DocumentRewriteError(document, `overlapping rewrite spans at ${edit.line}:${edit.column}`);
    }
    if (content.slice(edit.start, edit.end) !== edit.oldTarget) {
      throw new DocumentRewriteError(
        document,
        `${document} changed since it was scanned (expected "${edit.oldTarget}" at ${edit.line}:${edit.column})`
      );
    }
    out = out.slice(0, edit.start) + edit.newTarget + out.slice(edit.end);
    floor = edit.start;
  }

  return out;
}

/**
 * Throw unless every rewritten target is found again, at its shifted
 * offsets, when the rewritten text is scanned with the same table.
 */
function assertRecognized(
  document: string,
  next: string,
  edits: readonly PlannedEdit[],
  table: readonly PatternClass[]
): void {
  const found = new Set(extractReferences(document, next, table).map(ref => `${ref.start}:${ref.end}`));
  let shift = 0;
  for (const edit of [...edits].sort((a, b) => a.start - b.start)) {
    const start = edit.start + shift;
    if (!found.has(`${start}:${start + edit.newTarget.length}`)) {
      throw new DocumentRewriteError(
        document,
        `${document}: ${edit.newTarget} at ${edit.line}:${edit.column} would no longer read as a link`
      );
    }
    shift += edit.newTarget.length - (edit.end - edit.start);
  }
}

function atomicWriteFileSync(absPath: string, text: string): void {
  const { mode } = statSync(absPath);
  const tmpPath = join(dirname(absPath), `.${basename(absPath)}.tmp-${process.pid}-${Date.now()}`);
  try {
    writeFileSync(tmpPath, text, 'utf-8');
    chmodSync(tmpPath, mode & 0o7777);
    renameSync(tmpPath, absPath);
  } catch (e) {
    if (existsSync(tmpPath)) rmSync(tmpPath);
    throw e;
  }
}

function groupByDocument(edits: readonly PlannedEdit[]): Map<string, PlannedEdit[]> {
  const groups = new Map<string, PlannedEdit[]>();
  for (const edit of edits) {
    const arr = groups.get(edit.document) || [];
    arr.push(edit);
    groups.set(edit.document, arr);
  }
  return new Map([...groups].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)));
}

/**
 * Rewrite documents for a set of planned edits.
 *
 * Every document is handled on its own: it is re-read, rewritten in memory
 * and written atomically, or left untouched with the failure recorded. A
 * rewrite that a later scan would no longer find is refused.
 */
export function healDocuments(
  config: LinkmendConfig,
  planned: readonly PlannedEdit[],
  options: Pick<HealOptions, 'apply'> = {}
): HealOutcome {
  const healed: PlannedEdit[] = [];
  const filesUpdated: string[] = [];
  const errors: ErrorRecord[] = [];

  for (const [document, edits] of groupByDocument(planned)) {
    try {
      const content = readDocument(config.root, document);
      const next = applyEdits(document, content, edits);
      if (next === content) continue;
      assertRecognized(document, next, edits, tableFor(config, document));

      if (options.apply) {
        try {
          atomicWriteFileSync(join(config.root, document), next);
        } catch (e) {
          throw new DocumentWriteError(document, `could not write ${document}: ${errorMessage(e)}`, { cause: e });
        }
      }
      healed.push(...edits);
      filesUpdated.push(document);
    } catch (e) {
      if (!(e instanceof LinkmendError)) throw e;
      errors.push(toErrorRecord(e));
    }
  }

  return { planned: [...planned], healed, filesUpdated, errors };
}

function renameOrCopy(fromAbs: string, toAbs: string): void {
  try {
    renameSync(fromAbs, toAbs);
  } catch (e) {
    const code = e instanceof Error && 'code' in e ? e.code : undefined;
    if (code !== 'EXDEV') throw e;
    copyFileSync(fromAbs, toAbs);
    unlinkSync(fromAbs);
  }
}

/**
 * Move every renamed file that still sits at its old path.
 *
 * Sources are first staged under temporary names beside themselves, so
 * chains (a→b, b→c) and swaps work in any order.
 */
export function moveFiles(root: string, mapping: RenameMapping): MoveOutcome {
  const moved: RenamePair[] = [];
  const skipped: RenamePair[] = [];
  const errors: ErrorRecord[] = [];
  const staged: Array<{ pair: RenamePair; tmp: string }> = [];

  if (mapping.applied) {
    return { moved, skipped: [...mapping.pairs], errors };
  }

  mapping.pairs.forEach((pair, i) => {
    const fromAbs = join(root, pair.from);
    if (!existsSync(fromAbs)) {
      skipped.push(pair);
      return;
    }
    const tmp = join(dirname(fromAbs), `.${basename(fromAbs)}.linkmend-${process.pid}-${i}`);
    try {
      renameSync(fromAbs, tmp);
      staged.push({ pair, tmp });
    } catch (e) {
      errors.push(toErrorRecord(new FileMoveError(pair.from, `could not move ${pair.from}: ${errorMessage(e)}`, { cause: e })));
    }
  });

  for (const { pair, tmp } of staged) {
    const toAbs = join(root, pair.to);
    try {
      mkdirSync(dirname(toAbs), { recursive: true });
      renameOrCopy(tmp, toAbs);
      moved.push(pair);
    } catch (e) {
      let message = `could not move ${pair.from} to ${pair.to}: ${errorMessage(e)}`;
      try {
        renameSync(tmp, join(root, pair.from));
      } catch (restoreError) {
        message += `; original left at ${tmp}: ${errorMessage(restoreError)}`;
      }
      errors.push(toErrorRecord(new FileMoveError(pair.from, message, { cause: e })));
    }
  }

  return { moved, skipped, errors };
}

/**
 * Heal and move in one go. Documents that are themselves renamed are
 * rewritten after their move, spelled for the new directory; one whose move
 * failed is healed where it stayed.
 */
export function healAndMove(
  config: LinkmendConfig,
  links: readonly ResolvedLink[],
  mapping: RenameMapping
): { heal: HealOutcome; moves: MoveOutcome } {
  const planned = planHeal(links, mapping, config.docsPrefix, { relocateSources: true });
  const first = healDocuments(
    config,
    planned.filter(edit => !mapping.byFrom.has(edit.document)),
    { apply: true }
  );
  const moves = moveFiles(config.root, mapping);

  const moved = new Map(moves.moved.map(pair => [pair.from, pair.to]));
  const relocated: PlannedEdit[] = [];
  for (const edit of planned) {
    const to = moved.get(edit.document);
    if (to !== undefined) relocated.push({ ...edit, document: to });
  }
  const unmoved = links.filter(link => mapping.byFrom.has(link.source) && !moved.has(link.source));
  const second = healDocuments(config, [...relocated, ...planHeal(unmoved, mapping, config.docsPrefix)], {
    apply: true,
  });

  return {
    heal: {
      planned,
      healed: [...first.healed, ...second.healed],
      filesUpdated: [...first.filesUpdated, ...second.filesUpdated],
      errors: [...first.errors, ...second.errors],
    },
    moves,
  };
}
