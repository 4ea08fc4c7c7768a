import { existsSync, statSync } from 'node:fs';
import { join, posix } from 'node:path';
import { ErrorRecord, PathEscapeError, toErrorRecord } from './errors.js';
import { normalizeDocsPrefix } from './patterns.js';
import type { LinkmendConfig } from './config.js';
import type { LinkReference, ScanResult } from './scanner.js';

export type LinkStatus = 'valid' | 'broken' | 'external' | 'escapes_root';

export interface ResolvedLink extends LinkReference {
  /** Root-relative target, null for external or escaping links */
  resolvedPath: string | null;
  absolutePath: string | null;
  status: LinkStatus;
  exists: boolean;
}

export interface ValidationResult {
  links: ResolvedLink[];
  errors: ErrorRecord[];
}

/**
 * Normalize a root-relative path. Returns null when it climbs above the root.
 */
export function normalizeRootPath(p: string): string | null {
  const cleaned = p.replace(/\\/g, '/').replace(/^\/+/, '');
  const normalized = posix.normalize(cleaned || '.');
  if (normalized === '..' || normalized.startsWith('../')) return null;
  return normalized === '.' ? '' : normalized.replace(/\/$/, '');
}

export function isExternal(target: string): boolean {
  return target.includes('://') || /^mailto:/i.test(target);
}

/**
 * True if the target is written relative to the root rather than to the
 * document it appears in.
 */
export function isRootAnchored(target: string, docsPrefix: string): boolean {
  return target.startsWith('/') || target.startsWith(normalizeDocsPrefix(docsPrefix));
}

/**
 * Resolve a target, as written in `source`, to a root-relative path.
 * Returns null when it escapes the root.
 */
export function resolveTarget(target: string, source: string, docsPrefix: string): string | null {
  if (isRootAnchored(target, docsPrefix)) {
    return normalizeRootPath(target);
  }
  return normalizeRootPath(posix.join(posix.dirname(source), target));
}

function isFile(absPath: string): boolean {
  return existsSync(absPath) && statSync(absPath).isFile();
}

/**
 * Resolve one reference against the filesystem
 */
export function resolveReference(ref: LinkReference, config: LinkmendConfig): ResolvedLink {
  if (isExternal(ref.target)) {
    return { ...ref, resolvedPath: null, absolutePath: null, status: 'external', exists: false };
  }

  const resolvedPath = resolveTarget(ref.target, ref.source, config.docsPrefix);
  if (resolvedPath === null || resolvedPath === '') {
    return { ...ref, resolvedPath: null, absolutePath: null, status: 'escapes_root', exists: false };
  }

  const absolutePath = join(config.root, resolvedPath);
  const exists = isFile(absolutePath);
  return { ...ref, resolvedPath, absolutePath, status: exists ? 'valid' : 'broken', exists };
}

/**
 * Resolve every scanned reference. Escaping targets are recorded, never thrown.
 */
export function validateReferences(scan: ScanResult, config: LinkmendConfig): ValidationResult {
  const links = scan.references.map(ref => resolveReference(ref, config));
  const errors: ErrorRecord[] = [...scan.errors];

  for (const link of links) {
    if (link.status === 'escapes_root') {
      errors.push(toErrorRecord(new PathEscapeError(link.source, link.target), link.kind));
    }
  }

  return { links, errors };
}

export function isBroken(link: ResolvedLink): boolean {
  return link.status === 'broken' || link.status === 'escapes_root';
}
