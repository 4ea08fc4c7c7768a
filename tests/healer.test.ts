import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { chmodSync, existsSync, readdirSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { loadConfig } from '../src/core/config.js';
import {
  applyEdits,
  healDocuments,
  moveFiles,
  planHeal,
  PlannedEdit,
  prepareMapping,
  rewriteTarget,
} from '../src/core/healer.js';
import type { LinkClass } from '../src/core/patterns.js';
import { ResolvedLink, validateReferences } from '../src/core/resolver.js';
import { scanTree } from '../src/core/scanner.js';
import { scratch, writeTree } from './helpers.js';

const tmp = scratch('healer');

function link(kind: LinkClass, target: string, source: string, resolvedPath: string): ResolvedLink {
  return {
    source,
    kind,
    raw: target,
    target,
    start: 0,
    end: target.length,
    line: 1,
    column: 1,
    resolvedPath,
    absolutePath: null,
    status: 'valid',
    exists: true,
  };
}

function edit(start: number, end: number, oldTarget: string, newTarget: string): PlannedEdit {
  return { document: 'a.md', kind: 'markdown_link', start, end, line: 1, column: start + 1, oldTarget, newTarget };
}

function read(rel: string): string {
  return readFileSync(join(tmp.root, rel), 'utf-8');
}

describe('prepareMapping', () => {
  it('normalizes paths and keeps pair order', () => {
    tmp.setup();
    const mapping = prepareMapping(
      [
        { from: '/old/./b.md', to: 'new\\b.md' },
        { from: 'x.md', to: 'y.md' },
      ],
      tmp.root
    );
    assert.deepEqual(mapping.pairs, [
      { from: 'old/b.md', to: 'new/b.md' },
      { from: 'x.md', to: 'y.md' },
    ]);
    assert.equal(mapping.byFrom.get('old/b.md'), 'new/b.md');
    tmp.teardown();
  });

  it('rejects malformed mappings', () => {
    tmp.setup();
    const cases: Array<[Array<{ from: string; to: string }>, string]> = [
      [[], 'rename mapping is empty'],
      [[{ from: ' ', to: 'a.md' }], 'rename from path is empty'],
      [[{ from: '../x.md', to: 'a.md' }], 'rename from path escapes the root: ../x.md'],
      [[{ from: 'a.md', to: './a.md' }], 'rename maps a path to itself: a.md'],
      [[{ from: 'a.md', to: 'b.md' }, { from: './a.md', to: 'c.md' }], 'duplicate rename source: a.md'],
      [[{ from: 'a.md', to: 'c.md' }, { from: 'b.md', to: 'c.md' }], 'two renames target the same destination: c.md'],
    ];
    for (const [pairs, message] of cases) {
      assert.throws(() => prepareMapping(pairs, tmp.root), { code: 'CONFIGURATION', message });
    }
    tmp.teardown();
  });

  it('rejects a destination that already exists', () => {
    tmp.setup();
    writeTree(tmp.root, { 'a.md': 'A', 'b.md': 'B' });
    assert.throws(() => prepareMapping([{ from: 'a.md', to: 'b.md' }], tmp.root), {
      message: 'destination already exists: b.md',
    });
    tmp.teardown();
  });

  it('allows swaps and renames that already happened', () => {
    tmp.setup();
    writeTree(tmp.root, { 'a.md': 'A', 'b.md': 'B', 'moved.md': 'M' });
    assert.doesNotThrow(() =>
      prepareMapping([{ from: 'a.md', to: 'b.md' }, { from: 'b.md', to: 'a.md' }], tmp.root)
    );
    assert.doesNotThrow(() => prepareMapping([{ from: 'gone.md', to: 'moved.md' }], tmp.root));
    tmp.teardown();
  });

  it('marks a mapping that was already carried out', () => {
    tmp.setup();
    const chain = [{ from: 'a.md', to: 'b.md' }, { from: 'b.md', to: 'c.md' }];
    const swap = [{ from: 'a.md', to: 'b.md' }, { from: 'b.md', to: 'a.md' }];

    writeTree(tmp.root, { 'a.md': 'A', 'b.md': 'B' });
    assert.equal(prepareMapping(chain, tmp.root).applied, false);
    assert.equal(prepareMapping(swap, tmp.root).applied, false);

    tmp.teardown();
    tmp.setup();
    writeTree(tmp.root, { 'b.md': 'A', 'c.md': 'B' });
    assert.equal(prepareMapping(chain, tmp.root).applied, true);
    assert.equal(prepareMapping([{ from: 'gone.md', to: 'missing.md' }], tmp.root).applied, false);
    tmp.teardown();
  });
});

describe('rewriteTarget', () => {
  it('keeps a relative spelling relative to the source', () => {
    assert.equal(rewriteTarget(link('markdown_link', 'old/b.md', 'a.md', 'old/b.md'), 'a.md', 'new/b.md', 'docs/'), 'new/b.md');
    assert.equal(rewriteTarget(link('markdown_link', 'old.md', 'docs/x.md', 'docs/old.md'), 'docs/x.md', 'archive/old.md', 'docs/'), '../archive/old.md');
    assert.equal(rewriteTarget(link('relative_path_link', '../a.md', 'docs/guide/x.md', 'docs/a.md'), 'docs/guide/x.md', 'docs/guides/a.md', 'docs/'), '../guides/a.md');
  });

  it('keeps root-anchored spellings anchored', () => {
    assert.equal(rewriteTarget(link('docs_reference_link', 'docs/a.md', 'guide/x.md', 'docs/a.md'), 'guide/x.md', 'docs/b/a.md', 'docs/'), 'docs/b/a.md');
    assert.equal(rewriteTarget(link('markdown_link', '/docs/a.md', 'x.md', 'docs/a.md'), 'x.md', 'docs/b.md', 'docs/'), '/docs/b.md');
    assert.equal(rewriteTarget(link('bare_path', 'docs/a.md', 'x/y.md', 'docs/a.md'), 'x/y.md', 'docs/b/a.md', 'docs/'), 'docs/b/a.md');
  });

  it('keeps a leading ./', () => {
    assert.equal(rewriteTarget(link('markdown_link', './old.md', 'a.md', 'old.md'), 'a.md', 'new.md', 'docs/'), './new.md');
  });

  it('marks a relative path that would read as root-anchored', () => {
    assert.equal(rewriteTarget(link('markdown_link', 'old.md', 'site/index.md', 'site/old.md'), 'site/index.md', 'site/docs/a.md', 'docs/'), './docs/a.md');
  });
});

describe('planHeal', () => {
  it('plans one edit per link into a renamed path', () => {
    tmp.setup();
    writeTree(tmp.root, { 'a.md': '[x](old/b.md) [y](other.md)', 'old/b.md': 'B', 'other.md': 'O' });
    const config = loadConfig(tmp.root, {}, {});
    const { links } = validateReferences(scanTree(config), config);
    const mapping = prepareMapping([{ from: 'old/b.md', to: 'new/b.md' }], tmp.root);

    assert.deepEqual(planHeal(links, mapping, config.docsPrefix), [
      { document: 'a.md', kind: 'markdown_link', start: 4, end: 12, line: 1, column: 5, oldTarget: 'old/b.md', newTarget: 'new/b.md' },
    ]);
    tmp.teardown();
  });

  it('only heals broken links once the mapping was carried out', () => {
    tmp.setup();
    writeTree(tmp.root, { 'index.md': '[a](a.md) [b](b.md)', 'b.md': 'A', 'c.md': 'B' });
    const config = loadConfig(tmp.root, {}, {});
    const { links } = validateReferences(scanTree(config), config);
    const mapping = prepareMapping([{ from: 'a.md', to: 'b.md' }, { from: 'b.md', to: 'c.md' }], tmp.root);

    assert.deepEqual(planHeal(links, mapping, config.docsPrefix), [
      { document: 'index.md', kind: 'markdown_link', start: 4, end: 8, line: 1, column: 5, oldTarget: 'a.md', newTarget: 'b.md' },
    ]);
    tmp.teardown();
  });
});

describe('applyEdits', () => {
  it('rewrites every span and nothing else', () => {
    const content = '[x](old/b.md) and [y](old/b.md)';
    const out = applyEdits('a.md', content, [edit(4, 12, 'old/b.md', 'new/b.md'), edit(22, 30, 'old/b.md', 'new/b.md')]);
    assert.equal(out, '[x](new/b.md) and [y](new/b.md)');
  });

  it('handles replacements of a different length', () => {
    const content = '[x](a.md) [y](a.md)';
    const out = applyEdits('a.md', content, [edit(4, 8, 'a.md', 'archive/a.md'), edit(14, 18, 'a.md', 'archive/a.md')]);
    assert.equal(out, '[x](archive/a.md) [y](archive/a.md)');
  });

  it('refuses a stale span', () => {
    assert.throws(() => applyEdits('a.md', '[x](old/b.md)', [edit(4, 12, 'old/c.md', 'new/c.md')]), {
      code: 'DOCUMENT_REWRITE',
      message: 'a.md changed since it was scanned (expected "old/c.md" at 1:5)',
    });
  });

  it('refuses overlapping spans', () => {
    const content = '[x](old/b.md) tail';
    assert.throws(
      () => applyEdits('a.md', content, [edit(4, 12, 'old/b.md', 'new/b.md'), edit(8, 14, content.slice(8, 14), 'z')]),
      { code: 'DOCUMENT_REWRITE', message: 'overlapping rewrite spans at 1:5' }
    );
  });
});

describe('healDocuments', () => {
  function plan() {
    writeTree(tmp.root, { 'a.md': '[x](old/b.md)\n', 'old/b.md': 'B' });
    const config = loadConfig(tmp.root, {}, {});
    const { links } = validateReferences(scanTree(config), config);
    const mapping = prepareMapping([{ from: 'old/b.md', to: 'new/b.md' }], tmp.root);
    return { config, planned: planHeal(links, mapping, config.docsPrefix) };
  }

  it('changes nothing in a dry run', () => {
    tmp.setup();
    const { config, planned } = plan();
    const outcome = healDocuments(config, planned);
    assert.equal(outcome.healed.length, 1);
    assert.deepEqual(outcome.filesUpdated, ['a.md']);
    assert.equal(read('a.md'), '[x](old/b.md)\n');
    tmp.teardown();
  });

  it('writes rewritten documents with apply', () => {
    tmp.setup();
    const { config, planned } = plan();
    const outcome = healDocuments(config, planned, { apply: true });
    assert.deepEqual(outcome.errors, []);
    assert.equal(read('a.md'), '[x](new/b.md)\n');
    tmp.teardown();
  });

  it('records a document that vanished after the scan', () => {
    tmp.setup();
    const config = loadConfig(tmp.root, {}, {});
    const gone: PlannedEdit = { ...edit(4, 12, 'old/b.md', 'new/b.md'), document: 'gone.md' };
    const outcome = healDocuments(config, [gone], { apply: true });
    assert.deepEqual(outcome.healed, []);
    assert.equal(outcome.errors.length, 1);
    assert.equal(outcome.errors[0].code, 'DOCUMENT_READ');
    assert.equal(outcome.errors[0].document, 'gone.md');
    tmp.teardown();
  });

  it('records a stale document and still heals the others', () => {
    tmp.setup();
    writeTree(tmp.root, { 'a.md': '[x](old/b.md)', 'c.md': '[y](old/b.md)' });
    const config = loadConfig(tmp.root, {}, {});
    const stale: PlannedEdit = { ...edit(4, 12, 'old/z.md', 'new/z.md'), document: 'c.md' };
    const outcome = healDocuments(config, [edit(4, 12, 'old/b.md', 'new/b.md'), stale], { apply: true });
    assert.deepEqual(outcome.filesUpdated, ['a.md']);
    assert.deepEqual(outcome.errors.map(e => [e.code, e.document]), [['DOCUMENT_REWRITE', 'c.md']]);
    assert.equal(read('a.md'), '[x](new/b.md)');
    assert.equal(read('c.md'), '[y](old/b.md)');
    tmp.teardown();
  });

  it('refuses a rewrite that would no longer be found as a link', () => {
    tmp.setup();
    writeTree(tmp.root, { 'index.md': 'see docs/a.md', 'docs/a.md': 'A' });
    const config = loadConfig(tmp.root, {}, {});
    const { links } = validateReferences(scanTree(config), config);
    const planned = planHeal(links, prepareMapping([{ from: 'docs/a.md', to: 'guide/b.md' }], tmp.root), config.docsPrefix);

    const outcome = healDocuments(config, planned, { apply: true });
    assert.deepEqual(outcome.healed, []);
    assert.deepEqual(outcome.errors, [
      { code: 'DOCUMENT_REWRITE', document: 'index.md', message: 'index.md: guide/b.md at 1:5 would no longer read as a link' },
    ]);
    assert.equal(read('index.md'), 'see docs/a.md');
    tmp.teardown();
  });

  it('records a document that cannot be written and leaves no temporary file', () => {
    tmp.setup();
    const long = `${'n'.repeat(236)}.md`;
    writeTree(tmp.root, { [long]: '[x](old.md)', 'a.md': '[x](old.md)', 'old.md': 'O' });
    const config = loadConfig(tmp.root, {}, {});
    const { links } = validateReferences(scanTree(config), config);
    const planned = planHeal(links, prepareMapping([{ from: 'old.md', to: 'new.md' }], tmp.root), config.docsPrefix);

    const outcome = healDocuments(config, planned, { apply: true });
    assert.deepEqual(outcome.errors.map(e => [e.code, e.document]), [['DOCUMENT_WRITE', long]]);
    assert.deepEqual(outcome.filesUpdated, ['a.md']);
    assert.equal(read(long), '[x](old.md)');
    assert.equal(read('a.md'), '[x](new.md)');
    assert.deepEqual(readdirSync(tmp.root).filter(name => name.includes('.tmp-')), []);
    tmp.teardown();
  });

  it('keeps the file mode of a rewritten document', () => {
    tmp.setup();
    const { config, planned } = plan();
    chmodSync(join(tmp.root, 'a.md'), 0o640);
    healDocuments(config, planned, { apply: true });
    assert.equal(read('a.md'), '[x](new/b.md)\n');
    assert.equal(statSync(join(tmp.root, 'a.md')).mode & 0o777, 0o640);
    tmp.teardown();
  });
});

describe('moveFiles', () => {
  it('moves a chain of renames', () => {
    tmp.setup();
    writeTree(tmp.root, { 'a.md': 'A', 'b.md': 'B' });
    const mapping = prepareMapping([{ from: 'a.md', to: 'b.md' }, { from: 'b.md', to: 'c.md' }], tmp.root);
    const outcome = moveFiles(tmp.root, mapping);
    assert.equal(outcome.moved.length, 2);
    assert.equal(existsSync(join(tmp.root, 'a.md')), false);
    assert.equal(read('b.md'), 'A');
    assert.equal(read('c.md'), 'B');
    tmp.teardown();
  });

  it('swaps two files', () => {
    tmp.setup();
    writeTree(tmp.root, { 'a.md': 'A', 'b.md': 'B' });
    moveFiles(tmp.root, prepareMapping([{ from: 'a.md', to: 'b.md' }, { from: 'b.md', to: 'a.md' }], tmp.root));
    assert.equal(read('a.md'), 'B');
    assert.equal(read('b.md'), 'A');
    tmp.teardown();
  });

  it('creates missing directories and skips sources already moved', () => {
    tmp.setup();
    writeTree(tmp.root, { 'a.md': 'A' });
    const outcome = moveFiles(
      tmp.root,
      prepareMapping([{ from: 'a.md', to: 'deep/dir/a.md' }, { from: 'x.md', to: 'y.md' }], tmp.root)
    );
    assert.deepEqual(outcome.moved, [{ from: 'a.md', to: 'deep/dir/a.md' }]);
    assert.deepEqual(outcome.skipped, [{ from: 'x.md', to: 'y.md' }]);
    assert.equal(read('deep/dir/a.md'), 'A');
    tmp.teardown();
  });

  it('puts a file back when its destination cannot be created', () => {
    tmp.setup();
    writeTree(tmp.root, { blocker: 'not a directory', 'x.md': 'X', 'a.md': 'A' });
    const outcome = moveFiles(
      tmp.root,
      prepareMapping([{ from: 'x.md', to: 'blocker/x.md' }, { from: 'a.md', to: 'moved/a.md' }], tmp.root)
    );
    assert.deepEqual(outcome.errors.map(e => [e.code, e.document]), [['FILE_MOVE', 'x.md']]);
    assert.deepEqual(outcome.moved, [{ from: 'a.md', to: 'moved/a.md' }]);
    assert.equal(read('x.md'), 'X');
    assert.equal(read('moved/a.md'), 'A');
    assert.deepEqual(readdirSync(tmp.root).filter(name => name.includes('.linkmend-')), []);
    tmp.teardown();
  });

  it('moves nothing once the mapping was carried out', () => {
    tmp.setup();
    writeTree(tmp.root, { 'b.md': 'A', 'c.md': 'B' });
    const pairs = [{ from: 'a.md', to: 'b.md' }, { from: 'b.md', to: 'c.md' }];
    const outcome = moveFiles(tmp.root, prepareMapping(pairs, tmp.root));
    assert.deepEqual(outcome.moved, []);
    assert.deepEqual(outcome.skipped, pairs);
    assert.equal(read('b.md'), 'A');
    assert.equal(read('c.md'), 'B');
    tmp.teardown();
  });
});
