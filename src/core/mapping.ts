import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { formatIssues } from './config.js';
import { ConfigurationError, errorMessage } from './errors.js';
import type { RenamePair } from './healer.js';

const pathSchema = z.string().trim().min(1);

// { "old.md": "new.md" } | [["old.md", "new.md"]] | [{ "from": "old.md", "to": "new.md" }]
const mappingFileSchema = z.union([
  z.record(pathSchema, pathSchema),
  z.array(z.tuple([pathSchema, pathSchema])),
  z.array(z.object({ from: pathSchema, to: pathSchema }).strict()),
]);

/**
 * Turn any accepted mapping shape into ordered rename pairs.
 */
export function parseRenamePairs(raw: unknown): RenamePair[] {
  const parsed = mappingFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`invalid rename mapping: ${formatIssues(parsed.error)}`);
  }

  const data = parsed.data;
  if (!Array.isArray(data)) {
    return Object.entries(data).map(([from, to]) => ({ from, to }));
  }
  const pairs: RenamePair[] = [];
  for (const entry of data) {
    pairs.push(Array.isArray(entry) ? { from: entry[0], to: entry[1] } : { from: entry.from, to: entry.to });
  }
  return pairs;
}

/**
 * Read a JSON rename mapping file.
 */
export function loadRenameMapping(file: string): RenamePair[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, 'utf-8'));
  } catch (e) {
    throw new ConfigurationError(`could not read rename mapping ${file}: ${errorMessage(e)}`, { cause: e });
  }
  return parseRenamePairs(raw);
}

/**
 * Parse an `old=new` command-line rename.
 */
export function parseRenameArg(arg: string): RenamePair {
  const idx = arg.indexOf('=');
  if (idx <= 0 || idx === arg.length - 1) {
    throw new ConfigurationError(`expected --rename old=new, got "${arg}"`);
  }
  return { from: arg.slice(0, idx), to: arg.slice(idx + 1) };
}
