import { mkdirSync, rmSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';

/**
 * A scratch directory under the working directory, recreated per test.
 */
export function scratch(name: string): { root: string; setup(): void; teardown(): void } {
  const root = join(process.cwd(), `.test-tmp-${name}`);
  return {
    root,
    setup() {
      rmSync(root, { recursive: true, force: true });
      mkdirSync(root, { recursive: true });
    },
    teardown() {
      rmSync(root, { recursive: true, force: true });
    },
  };
}

export function writeTree(root: string, files: Record<string, string>): void {
  for (const [rel, content] of Object.entries(files)) {
    const full = join(root, rel);
    mkdirSync(dirname(full), { recursive: true });
    writeFileSync(full, content);
  }
}
