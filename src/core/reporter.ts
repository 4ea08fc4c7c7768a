import { ErrorRecord } from './errors.js';
import type { HealOutcome, MoveOutcome, PlannedEdit, RenameMapping, RenamePair } from './healer.js';
import { LINK_CLASSES, LinkClass } from './patterns.js';
import { isBroken, LinkStatus, ResolvedLink, ValidationResult } from './resolver.js';
import type { ScanResult } from './scanner.js';

export interface LinkCounts {
  found: number;
  valid: number;
  broken: number;
  external: number;
}

export interface BrokenEntry {
  file: string;
  line: number;
  column: number;
  kind: LinkClass;
  target: string;
  resolvedPath: string | null;
  status: LinkStatus;
}

export interface ValidationReport {
  root: string;
  documents: number;
  totals: LinkCounts;
  byClass: Record<LinkClass, LinkCounts>;
  byDocument: Record<string, LinkCounts>;
  broken: BrokenEntry[];
  errors: ErrorRecord[];
}

export interface EditEntry {
  file: string;
  line: number;
  kind: LinkClass;
  old: string;
  new: string;
}

export interface HealingReport {
  dryRun: boolean;
  mapping: RenamePair[];
  before: ValidationReport;
  /** Null in a dry run: nothing was written, so there is nothing to re-check */
  after: ValidationReport | null;
  planned: number;
  healed: number;
  healedByClass: Record<LinkClass, number>;
  healedByDocument: Record<string, number>;
  edits: EditEntry[];
  filesUpdated: string[];
  filesMoved: RenamePair[];
  /** Broken links into the renamed paths after healing */
  stillBroken: number;
  stillBrokenLinks: BrokenEntry[];
  /** Broken links outside the mapping; reported, never a failure */
  baselineBroken: number;
  errors: ErrorRecord[];
  passed: boolean;
}

function emptyCounts(): LinkCounts {
  return { found: 0, valid: 0, broken: 0, external: 0 };
}

function byClassOf<T>(make: () => T): Record<LinkClass, T> {
  return {
    markdown_link: make(),
    relative_path_link: make(),
    docs_reference_link: make(),
    inline_code_file_reference: make(),
    bare_path: make(),
    source_path_reference: make(),
  };
}

function tally(counts: LinkCounts, link: ResolvedLink): void {
  counts.found++;
  if (link.status === 'valid') counts.valid++;
  else if (link.status === 'external') counts.external++;
  else counts.broken++;
}

function toBrokenEntry(link: ResolvedLink): BrokenEntry {
  return {
    file: link.source,
    line: link.line,
    column: link.column,
    kind: link.kind,
    target: link.target,
    resolvedPath: link.resolvedPath,
    status: link.status,
  };
}

/**
 * Aggregate a scan and its validation into counts by class and document.
 */
export function summarize(root: string, scan: ScanResult, validation: ValidationResult): ValidationReport {
  const totals = emptyCounts();
  const byClass = byClassOf(emptyCounts);
  const byDocument: Record<string, LinkCounts> = {};
  for (const doc of scan.documents) byDocument[doc.path] = emptyCounts();

  for (const link of validation.links) {
    tally(totals, link);
    tally(byClass[link.kind], link);
    if (!byDocument[link.source]) byDocument[link.source] = emptyCounts();
    tally(byDocument[link.source], link);
  }

  return {
    root,
    documents: scan.documents.length,
    totals,
    byClass,
    byDocument,
    broken: validation.links.filter(isBroken).map(toBrokenEntry),
    errors: validation.errors,
  };
}

function toEditEntry(edit: PlannedEdit): EditEntry {
  return { file: edit.document, line: edit.line, kind: edit.kind, old: edit.oldTarget, new: edit.newTarget };
}

/**
 * Partition broken links into those touching the mapping and the rest.
 */
export function partitionBroken(
  links: readonly ResolvedLink[],
  mapping: RenameMapping
): { inScope: ResolvedLink[]; baseline: ResolvedLink[] } {
  const scope = new Set<string>();
  for (const { from, to } of mapping.pairs) {
    scope.add(from);
    scope.add(to);
  }
  const inScope: ResolvedLink[] = [];
  const baseline: ResolvedLink[] = [];
  for (const link of links) {
    if (!isBroken(link)) continue;
    if (link.resolvedPath !== null && scope.has(link.resolvedPath)) inScope.push(link);
    else baseline.push(link);
  }
  return { inScope, baseline };
}

export interface HealingReportInput {
  mapping: RenameMapping;
  before: ValidationReport;
  heal: HealOutcome;
  moves: MoveOutcome | null;
  /** Re-validation after writing; null for a dry run */
  after: { report: ValidationReport; links: ResolvedLink[] } | null;
  /** Links before healing, used for the baseline in a dry run */
  beforeLinks: readonly ResolvedLink[];
}

/**
 * Build the healing report. The run passes when no link into a renamed
 * path is broken afterwards and no document failed to rewrite.
 */
export function buildHealingReport(input: HealingReportInput): HealingReport {
  const { mapping, before, heal, moves, after } = input;

  const healedByClass = byClassOf(() => 0);
  const healedByDocument: Record<string, number> = {};
  for (const edit of heal.healed) {
    healedByClass[edit.kind]++;
    healedByDocument[edit.document] = (healedByDocument[edit.document] ?? 0) + 1;
  }

  const errors = [...heal.errors, ...(moves?.errors ?? [])];
  const { inScope, baseline } = partitionBroken(after ? after.links : input.beforeLinks, mapping);
  const stillBroken = after ? inScope : [];

  return {
    dryRun: after === null,
    mapping: mapping.pairs,
    before,
    after: after ? after.report : null,
    planned: heal.planned.length,
    healed: heal.healed.length,
    healedByClass,
    healedByDocument,
    edits: heal.healed.map(toEditEntry),
    filesUpdated: heal.filesUpdated,
    filesMoved: moves?.moved ?? [],
    stillBroken: stillBroken.length,
    stillBrokenLinks: stillBroken.map(toBrokenEntry),
    baselineBroken: baseline.length,
    errors,
    passed: stillBroken.length === 0 && errors.length === 0,
  };
}

// ANSI color codes
const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const CYAN = '\x1b[36m';
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';
const RESET = '\x1b[0m';
const GREEN = '\x1b[32m';

export interface FormatOptions {
  color?: boolean;
}

function palette(color: boolean) {
  const c = (code: string) => (s: string) => (color ? `${code}${s}${RESET}` : s);
  return { red: c(RED), yellow: c(YELLOW), cyan: c(CYAN), dim: c(DIM), bold: c(BOLD), green: c(GREEN) };
}

function truncate(s: string, max: number): string {
  return s.length > max ? s.slice(0, max - 1) + '…' : s;
}

function pad(s: string, width: number): string {
  return ' '.repeat(Math.max(1, width - s.length));
}

function classBreakdown(byClass: Record<LinkClass, LinkCounts>): string[] {
  return LINK_CLASSES.filter(kind => byClass[kind].found > 0).map(kind => {
    const c = byClass[kind];
    return `  ${kind}${pad(kind, 30)}${c.found} found, ${c.valid} valid, ${c.broken} broken, ${c.external} external`;
  });
}

/**
 * Format a validation report as a table for terminal output.
 */
export function formatTable(report: ValidationReport, opts: FormatOptions = {}): string {
  const p = palette(opts.color ?? true);
  const { totals } = report;

  if (report.broken.length === 0 && report.errors.length === 0) {
    return `${p.green('✓')} ${report.documents} files scanned, ${totals.found} links checked — ${p.green('all links valid')}`;
  }

  const lines: string[] = [''];
  lines.push(p.bold(`linkmend: ${totals.broken} broken links`) + ` (${totals.valid} valid, ${totals.external} external)`);
  lines.push('');
  lines.push(...classBreakdown(report.byClass));
  lines.push('');

  if (report.broken.length > 0) {
    lines.push(p.bold(`  FILE${' '.repeat(30)}TARGET${' '.repeat(24)}CLASS`));
    lines.push(p.dim(`  ${'─'.repeat(90)}`));
    for (const b of report.broken) {
      const file = truncate(`${b.file}:${b.line}`, 34);
      const target = truncate(b.target, 28);
      const kind = b.status === 'escapes_root' ? `${b.kind} ${p.yellow('(outside root)')}` : b.kind;
      lines.push(`  ${p.red(file)}${pad(file, 35)}${target}${pad(target, 30)}${p.cyan(kind)}`);
    }
  }

  if (report.errors.length > 0) {
    lines.push('');
    for (const e of report.errors) {
      lines.push(`  ${p.yellow(e.code)} ${e.message}`);
    }
  }

  lines.push('');
  lines.push(`${p.red('✗')} ${report.documents} files scanned, ${totals.found} links checked — ${p.red(`${totals.broken} broken`)}`);
  lines.push('');

  return lines.join('\n');
}

/**
 * Format a healing report for terminal output.
 */
export function formatHealReport(report: HealingReport, opts: FormatOptions = {}): string {
  const p = palette(opts.color ?? true);
  const lines: string[] = [];

  if (report.edits.length === 0 && report.errors.length === 0) {
    lines.push('no links reference the renamed paths');
  } else if (report.dryRun) {
    lines.push(`would heal ${report.healed} links in ${report.filesUpdated.length} files (run with --apply to write):`);
  } else {
    lines.push(`healed ${report.healed} links in ${report.filesUpdated.length} files`);
  }

  for (const e of report.edits) {
    lines.push(`  ${e.file}:${e.line}  ${p.dim(e.old)} → ${p.green(e.new)}`);
  }

  for (const m of report.filesMoved) {
    lines.push(`moved ${m.from} → ${m.to}`);
  }

  if (report.errors.length > 0) {
    lines.push('');
    lines.push(p.yellow(`${report.errors.length} documents could not be healed:`));
    for (const e of report.errors) {
      lines.push(`  ${e.code} ${e.message}`);
    }
  }

  if (report.stillBroken > 0) {
    lines.push('');
    lines.push(p.red(`${report.stillBroken} links into renamed paths are still broken:`));
    for (const b of report.stillBrokenLinks) {
      lines.push(`  ${b.file}:${b.line}  ${b.target}`);
    }
  }

  if (report.baselineBroken > 0) {
    lines.push(p.dim(`${report.baselineBroken} broken links outside the rename mapping (not counted as failures)`));
  }

  return lines.join('\n');
}
