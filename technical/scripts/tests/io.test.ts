import assert from 'node:assert/strict';
import fg from 'fast-glob';
import fs from 'fs-extra';
import path from 'node:path';
import test from 'node:test';
import { fileURLToPath } from 'node:url';

import { getRunOptions, listXmlFiles, repoPath, toPosixRelative, writeJsonFile } from '../lib/io.js';
import { withTempCwd, writeFixtureFile } from './test_fs.js';

test('getRunOptions reads the --check flag', () => {
  assert.deepEqual(getRunOptions(['--check']), { check: true });
  assert.deepEqual(getRunOptions([]), { check: false });
});

test('writeJsonFile reports changes without writing in check mode', async () => {
  await withTempCwd('form15cb-io-', async (root) => {
    const target = repoPath('lookups', 'nature_codes.json');
    assert.equal(toPosixRelative(target), 'lookups/nature_codes.json');

    assert.deepEqual(await writeJsonFile(target, { a: 'b' }, { check: true }), { changed: true, wrote: false });
    assert.equal(await fs.pathExists(path.join(root, 'lookups')), false);

    assert.deepEqual(await writeJsonFile(target, { a: 'b' }, { check: false }), { changed: true, wrote: true });
    assert.equal(await fs.readFile(target, 'utf8'), '{\n  "a": "b"\n}\n');
    assert.deepEqual(await writeJsonFile(target, { a: 'b' }, { check: true }), { changed: false, wrote: false });
  });
});

test('listXmlFiles returns sorted relative paths of XML documents', async () => {
  await withTempCwd('form15cb-io-', async (root) => {
    assert.deepEqual(await listXmlFiles(path.join(root, 'data/output')), []);

    await writeFixtureFile(root, 'data/output/generated_b.xml', '<a/>');
    await writeFixtureFile(root, 'data/output/archive/generated_a.xml', '<a/>');
    await writeFixtureFile(root, 'data/output/notes.txt', 'ignored');

    assert.deepEqual(await listXmlFiles(path.join(root, 'data/output')), [
      'archive/generated_a.xml',
      'generated_b.xml'
    ]);
  });
});

function testScript(manifest: unknown): string {
  if (manifest && typeof manifest === 'object' && 'scripts' in manifest) {
    const scripts = manifest.scripts;
    if (scripts && typeof scripts === 'object' && 'test' in scripts && typeof scripts.test === 'string') {
      return scripts.test;
    }
  }
  return '';
}

test('the npm test script names every test file', async () => {
  const testsDir = fileURLToPath(new URL('.', import.meta.url));
  const manifest: unknown = JSON.parse(
    await fs.readFile(fileURLToPath(new URL('../../../package.json', import.meta.url)), 'utf8')
  );

  const listed = testScript(manifest)
    .split(/\s+/)
    .filter((token) => token.endsWith('.test.ts'))
    .map((token) => path.posix.basename(token))
    .sort();
  const present = (await fg('*.test.ts', { cwd: testsDir, onlyFiles: true })).sort();

  assert.deepEqual(listed, present);
});
