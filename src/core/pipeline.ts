import type { LinkmendConfig } from './config.js';
import { healAndMove, healDocuments, HealOutcome, MoveOutcome, planHeal, prepareMapping, RenamePair } from './healer.js';
import { buildHealingReport, HealingReport, summarize, ValidationReport } from './reporter.js';
import { validateReferences, ValidationResult } from './resolver.js';
import { scanTree, ScanResult } from './scanner.js';

export interface CheckResult {
  scan: ScanResult;
  validation: ValidationResult;
  report: ValidationReport;
}

export interface HealTreeOptions {
  /** Write rewritten documents (and move files with `move`) */
  apply?: boolean;
  /** Also move each renamed file to its new path */
  move?: boolean;
}

/**
 * Scan and validate the tree.
 */
export function checkTree(config: LinkmendConfig): CheckResult {
  const scan = scanTree(config);
  const validation = validateReferences(scan, config);
  return { scan, validation, report: summarize(config.root, scan, validation) };
}

/**
 * Scan, validate, heal, optionally move, and re-validate.
 *
 * Throws ConfigurationError for an invalid mapping before touching
 * anything; every later failure is recorded per document in the report.
 */
export function healTree(
  config: LinkmendConfig,
  pairs: readonly RenamePair[],
  options: HealTreeOptions = {}
): HealingReport {
  const mapping = prepareMapping(pairs, config.root);
  const before = checkTree(config);

  let heal: HealOutcome;
  let moves: MoveOutcome | null = null;
  if (options.apply && options.move) {
    ({ heal, moves } = healAndMove(config, before.validation.links, mapping));
  } else {
    const planned = planHeal(before.validation.links, mapping, config.docsPrefix, {
      relocateSources: Boolean(options.move),
    });
    heal = healDocuments(config, planned, { apply: options.apply });
  }

  let after: { report: ValidationReport; links: ValidationResult['links'] } | null = null;
  if (options.apply) {
    const recheck = checkTree(config);
    after = { report: recheck.report, links: recheck.validation.links };
  }

  return buildHealingReport({
    mapping,
    before: before.report,
    heal,
    moves,
    after,
    beforeLinks: before.validation.links,
  });
}
