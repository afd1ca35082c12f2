import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import { mkdir, mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { compareNames, isDirectory, listSlideFiles, loadSlideDocuments } from '../slide-loader.js';

describe('slide loader', () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(join(tmpdir(), 'termslides-loader-'));
    await writeFile(join(dir, 'b.md'), '# B');
    await writeFile(join(dir, 'a.md'), '# A');
    await writeFile(join(dir, '10.md'), '# Ten');
    await writeFile(join(dir, 'notes.txt'), 'not a slide');
    await mkdir(join(dir, 'z.md'));
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('lists slide files only, in code-unit order', async () => {
    expect(await listSlideFiles(dir)).toEqual(['10.md', 'a.md', 'b.md']);
    expect(await listSlideFiles(dir, '.txt')).toEqual(['notes.txt']);
  });

  it('loads documents with their text', async () => {
    const docs = await loadSlideDocuments(dir);
    expect(docs.map((doc) => doc.name)).toEqual(['10.md', 'a.md', 'b.md']);
    expect(docs[1].text).toBe('# A');
  });

  it('recognises directories', async () => {
    expect(await isDirectory(dir)).toBe(true);
    expect(await isDirectory(join(dir, 'a.md'))).toBe(false);
    expect(await isDirectory(join(dir, 'missing'))).toBe(false);
  });

  it('compares names without locale rules', () => {
    expect(['b', 'B', 'a'].sort(compareNames)).toEqual(['B', 'a', 'b']);
  });
});
