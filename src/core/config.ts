import { existsSync, readFileSync, statSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from './errors.js';
import { loadIgnorePatterns } from './ignore.js';
import { DEFAULT_DOCS_PREFIX, LINK_CLASSES, LinkClass, normalizeDocsPrefix } from './patterns.js';

export const CONFIG_FILE = 'linkmend.config.json';
export const DEFAULT_EXTENSIONS = ['.md'];

export interface LinkmendConfig {
  /** Absolute path of the tree being scanned */
  root: string;
  /** Document suffixes to include, lower-cased with a leading dot */
  extensions: string[];
  /** Prefix that marks a target as written relative to the root */
  docsPrefix: string;
  ignore: string[];
  classes: LinkClass[];
}

export type ConfigOverrides = Partial<Omit<LinkmendConfig, 'root'>>;

const configFileSchema = z
  .object({
    extensions: z.array(z.string().min(1)).min(1).optional(),
    docsPrefix: z.string().min(1).optional(),
    ignore: z.array(z.string().min(1)).optional(),
    classes: z.array(z.enum(LINK_CLASSES)).min(1).optional(),
  })
  .strict();

export type ConfigFile = z.infer<typeof configFileSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

export function normalizeExtension(ext: string): string {
  const lower = ext.trim().toLowerCase();
  return lower.startsWith('.') ? lower : `.${lower}`;
}

/**
 * Read linkmend.config.json from the root, if present.
 */
export function loadConfigFile(root: string): ConfigFile {
  const configPath = join(root, CONFIG_FILE);
  if (!existsSync(configPath)) return {};

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (e) {
    throw new ConfigurationError(`could not parse ${CONFIG_FILE}: ${errorMessage(e)}`, { cause: e });
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`invalid ${CONFIG_FILE}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Resolve the effective configuration for a root.
 *
 * Precedence, highest first:
 *  1. Explicit `overrides` (CLI flags).
 *  2. `LINKMEND_DOCS_PREFIX` environment variable.
 *  3. linkmend.config.json in the root.
 *  4. Built-in defaults.
 *
 * Ignore patterns accumulate from the config file, .linkmendignore and overrides.
 */
export function loadConfig(
  root: string,
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): LinkmendConfig {
  const absRoot = resolve(root);
  if (!existsSync(absRoot) || !statSync(absRoot).isDirectory()) {
    throw new ConfigurationError(`root is not a directory: ${root}`);
  }

  const file = loadConfigFile(absRoot);
  const envPrefix = env.LINKMEND_DOCS_PREFIX?.trim() || undefined;

  const extensions = overrides.extensions && overrides.extensions.length > 0
    ? overrides.extensions
    : file.extensions ?? DEFAULT_EXTENSIONS;

  return {
    root: absRoot,
    extensions: [...new Set(extensions.map(normalizeExtension))],
    docsPrefix: normalizeDocsPrefix(overrides.docsPrefix ?? envPrefix ?? file.docsPrefix ?? DEFAULT_DOCS_PREFIX),
    ignore: [...(file.ignore ?? []), ...loadIgnorePatterns(absRoot), ...(overrides.ignore ?? [])],
    classes: [...(overrides.classes ?? file.classes ?? LINK_CLASSES)],
  };
}
