import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

export const IGNORE_FILE = '.linkmendignore';

/**
 * Load ignore patterns from .linkmendignore.
 * Each line is an exact path or a pattern with * wildcards.
 * Lines starting with # are comments.
 */
export function loadIgnorePatterns(root: string): string[] {
  const ignorePath = join(root, IGNORE_FILE);
  if (!existsSync(ignorePath)) return [];
  return readFileSync(ignorePath, 'utf-8')
    .split(/\r?\n/)
    .map(l => l.trim())
    .filter(l => l && !l.startsWith('#'));
}

function wildcardToRegExp(pattern: string): RegExp {
  const body = pattern
    .split('*')
    .map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
    .join('.*');
  return new RegExp(`^${body}$`);
}

/**
 * Check if a document path or link target matches any ignore pattern.
 * Supports exact match and simple * wildcard.
 */
export function isIgnored(value: string, patterns: readonly string[]): boolean {
  return patterns.some(pattern => {
    if (pattern === value) return true;
    if (pattern.includes('*')) {
      return wildcardToRegExp(pattern).test(value);
    }
    return false;
  });
}
