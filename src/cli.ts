import { resolve } from 'node:path';
import { ConfigOverrides, loadConfig } from './core/config.js';
import { ConfigurationError } from './core/errors.js';
import type { RenamePair } from './core/healer.js';
import { loadRenameMapping, parseRenameArg } from './core/mapping.js';
import { checkTree, healTree } from './core/pipeline.js';
import { formatHealReport, formatTable } from './core/reporter.js';

export const VERSION = '0.1.0';

const HELP = `
linkmend — find broken path references in a docs tree and heal them across renames

USAGE
  linkmend check [dir]                    scan and validate links (default: .)
  linkmend heal [dir] --map <file>        rewrite links for a rename mapping (dry-run by default)
  linkmend heal [dir] --rename old=new    inline rename, repeatable
  linkmend heal [dir] ... --apply         actually write rewritten documents
  linkmend heal [dir] ... --apply --move  also move the renamed files
  linkmend mv <old> <new> [dir]           heal links and move one file

FLAGS
  --json                   output as JSON
  --ignore <pattern>       skip documents or targets matching pattern (repeatable)
  --ext <suffix>           document suffix to scan (repeatable, default: .md)
  --docs-prefix <prefix>   prefix of root-anchored targets (default: docs/)
  --apply                  (heal only) write changes
  --move                   (heal only) move renamed files after healing
  --dry-run                (mv only) show affected links without writing
  --quiet-if-clean         (check only) no output if no broken links found
`;

export interface ParsedArgs {
  command: string;
  positionals: string[];
  json: boolean;
  ignore: string[];
  ext: string[];
  docsPrefix: string | null;
  map: string | null;
  rename: string[];
  help: boolean;
  version: boolean;
  apply: boolean;
  move: boolean;
  dryRun: boolean;
  quietIfClean: boolean;
}

export interface CliIO {
  stdout: { write(chunk: string): unknown };
  stderr: { write(chunk: string): unknown };
  env: NodeJS.ProcessEnv;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const opts: ParsedArgs = {
    command: '',
    positionals: [],
    json: false,
    ignore: [],
    ext: [],
    docsPrefix: null,
    map: null,
    rename: [],
    help: false,
    version: false,
    apply: false,
    move: false,
    dryRun: false,
    quietIfClean: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const hasValue = i + 1 < args.length;
    if (arg === '--help' || arg === '-h') {
      opts.help = true;
    } else if (arg === '--version' || arg === '-v') {
      opts.version = true;
    } else if (arg === '--json') {
      opts.json = true;
    } else if (arg === '--apply') {
      opts.apply = true;
    } else if (arg === '--move') {
      opts.move = true;
    } else if (arg === '--dry-run') {
      opts.dryRun = true;
    } else if (arg === '--quiet-if-clean') {
      opts.quietIfClean = true;
    } else if (arg === '--ignore' && hasValue) {
      opts.ignore.push(args[++i]);
    } else if (arg === '--ext' && hasValue) {
      opts.ext.push(args[++i]);
    } else if (arg === '--docs-prefix' && hasValue) {
      opts.docsPrefix = args[++i];
    } else if (arg === '--map' && hasValue) {
      opts.map = args[++i];
    } else if (arg === '--rename' && hasValue) {
      opts.rename.push(args[++i]);
    } else if (!opts.command && !arg.startsWith('-')) {
      opts.command = arg;
    } else if (opts.command && !arg.startsWith('-')) {
      opts.positionals.push(arg);
    }
  }

  return opts;
}

function overridesFrom(opts: ParsedArgs): ConfigOverrides {
  const overrides: ConfigOverrides = { ignore: opts.ignore };
  if (opts.ext.length > 0) overrides.extensions = opts.ext;
  if (opts.docsPrefix !== null) overrides.docsPrefix = opts.docsPrefix;
  return overrides;
}

function useColor(opts: ParsedArgs, io: CliIO): boolean {
  return !opts.json && !io.env.NO_COLOR;
}

/**
 * check command: scan and validate
 */
function cmdCheck(opts: ParsedArgs, io: CliIO): number {
  const config = loadConfig(opts.positionals[0] ?? '.', overridesFrom(opts), io.env);
  const { report } = checkTree(config);

  if (report.documents === 0) {
    if (opts.json) {
      io.stdout.write(JSON.stringify(report, null, 2) + '\n');
    } else if (!opts.quietIfClean) {
      io.stdout.write('No documents found.\n');
    }
    return 0;
  }

  const failed = report.broken.length > 0;
  if (opts.quietIfClean && !failed) {
    return 0;
  }

  if (opts.json) {
    io.stdout.write(JSON.stringify(report, null, 2) + '\n');
  } else {
    io.stdout.write(formatTable(report, { color: useColor(opts, io) }) + '\n');
  }

  return failed ? 1 : 0;
}

function runHeal(
  dir: string,
  pairs: RenamePair[],
  heal: { apply: boolean; move: boolean },
  opts: ParsedArgs,
  io: CliIO
): number {
  const config = loadConfig(dir, overridesFrom(opts), io.env);
  const report = healTree(config, pairs, heal);

  if (opts.json) {
    io.stdout.write(JSON.stringify(report, null, 2) + '\n');
  } else {
    io.stdout.write(formatHealReport(report, { color: useColor(opts, io) }) + '\n');
  }

  return report.passed ? 0 : 1;
}

/**
 * heal command: rewrite links for a rename mapping
 */
function cmdHeal(opts: ParsedArgs, io: CliIO): number {
  const pairs: RenamePair[] = [
    ...(opts.map ? loadRenameMapping(resolve(opts.map)) : []),
    ...opts.rename.map(parseRenameArg),
  ];
  if (pairs.length === 0) {
    throw new ConfigurationError('heal needs --map <file> or --rename old=new');
  }
  return runHeal(opts.positionals[0] ?? '.', pairs, { apply: opts.apply, move: opts.move }, opts, io);
}

/**
 * mv command: heal links to one file and move it
 */
function cmdMove(opts: ParsedArgs, io: CliIO): number {
  const [from, to, dir] = opts.positionals;
  if (!from || !to) {
    throw new ConfigurationError('usage: linkmend mv <old> <new> [dir]');
  }
  return runHeal(dir ?? '.', [{ from, to }], { apply: !opts.dryRun, move: true }, opts, io);
}

const defaultIO: CliIO = { stdout: process.stdout, stderr: process.stderr, env: process.env };

export function main(argv: string[] = process.argv, io: CliIO = defaultIO): number {
  const opts = parseArgs(argv);

  if (opts.help || (!opts.command && !opts.version)) {
    io.stdout.write(HELP.trim() + '\n');
    return 0;
  }

  if (opts.version) {
    io.stdout.write(`linkmend v${VERSION}\n`);
    return 0;
  }

  try {
    switch (opts.command) {
      case 'check':
        return cmdCheck(opts, io);
      case 'heal':
        return cmdHeal(opts, io);
      case 'mv':
        return cmdMove(opts, io);
      default:
        io.stderr.write(`Unknown command: ${opts.command}\nRun linkmend --help for usage.\n`);
        return 1;
    }
  } catch (e) {
    if (e instanceof ConfigurationError) {
      io.stderr.write(`Error: ${e.message}\n`);
      return 1;
    }
    throw e;
  }
}
