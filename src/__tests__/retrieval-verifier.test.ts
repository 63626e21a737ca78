import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fsp } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { RetrievalVerifier, collect, hasWildcard, verify } from '../services/retrieval-verifier.js';
import type { RemoteEntry, RemoteFiles, RetrievalSpec } from '../types/device.js';
import { FakeFiles } from './helpers/fake-shell.js';

function spec(remotePath: string, extra: Partial<RetrievalSpec> = {}): RetrievalSpec {
  return { task: 'get_ec', remotePath, minSize: 1, ...extra };
}

const listing: RemoteEntry[] = [
  { path: '/tmp/EC_1_0.dat', size: 2048 },
  { path: '/tmp/EC_1_1.dat', size: 0 },
  { path: '/tmp/sub/EC_1_9.dat', size: 10 },
  { path: '/tmp/fw.log', size: 0 },
];

describe('verify', () => {
  it('passes an exact path that exists with content', () => {
    const [outcome] = verify(listing, [spec('/tmp/EC_1_0.dat')]);
    expect(outcome).toEqual({ status: 'ok', spec: spec('/tmp/EC_1_0.dat'), entries: [{ path: '/tmp/EC_1_0.dat', size: 2048 }] });
  });

  it('reports a missing path', () => {
    const [outcome] = verify(listing, [spec('/tmp/EC_8_0.dat')]);
    expect(outcome).toMatchObject({ status: 'MissingArtifact', path: '/tmp/EC_8_0.dat' });
  });

  it('reports a file below the minimum size as empty', () => {
    const [outcome] = verify(listing, [spec('/tmp/fw.log')]);
    expect(outcome).toMatchObject({ status: 'EmptyArtifact', path: '/tmp/fw.log', size: 0 });
  });

  it('matches wildcards in the same directory only and drops empty matches', () => {
    const [outcome] = verify(listing, [spec('/tmp/EC_1_*.dat')]);
    expect(outcome).toMatchObject({ status: 'ok', entries: [{ path: '/tmp/EC_1_0.dat', size: 2048 }] });
  });

  it('honours a larger minimum size', () => {
    const [outcome] = verify(listing, [spec('/tmp/EC_1_0.dat', { minSize: 4096 })]);
    expect(outcome).toMatchObject({ status: 'EmptyArtifact', size: 2048 });
  });

  it('treats a zero-size file as empty even when no minimum size is set', () => {
    const [exact] = verify(listing, [spec('/tmp/fw.log', { minSize: 0 })]);
    expect(exact).toMatchObject({ status: 'EmptyArtifact', path: '/tmp/fw.log', size: 0 });

    const [pattern] = verify(listing, [spec('/tmp/EC_1_*.dat', { minSize: 0 })]);
    expect(pattern).toMatchObject({ status: 'ok', entries: [{ path: '/tmp/EC_1_0.dat', size: 2048 }] });
  });
});

describe('collect', () => {
  it('lists each wildcard directory once and stats exact paths', async () => {
    const files = new FakeFiles(listing);

    const found = await collect(files, [spec('/tmp/EC_1_*.dat'), spec('/tmp/EC_8_*.dat'), spec('/tmp/fw.log')]);

    expect(files.calls).toEqual(['list /tmp', 'stat /tmp/fw.log']);
    expect(found.map((entry) => entry.path)).toEqual(['/tmp/EC_1_0.dat', '/tmp/EC_1_1.dat', '/tmp/fw.log', '/tmp/fw.log']);
  });

  it('recognises wildcards in the file name only', () => {
    expect(hasWildcard('/tmp/EC_?.dat')).toBe(true);
    expect(hasWildcard('/tmp/*/EC.dat')).toBe(false);
  });
});

describe('RetrievalVerifier', () => {
  let outputDir: string;

  beforeEach(async () => {
    outputDir = await fsp.mkdtemp(join(tmpdir(), 'artifacts-'));
  });

  afterEach(async () => {
    await fsp.rm(outputDir, { recursive: true, force: true });
  });

  it('verifies everything before downloading anything', async () => {
    const files = new FakeFiles(listing);
    const verifier = new RetrievalVerifier(outputDir);

    const outcomes = await verifier.retrieve('24a1861dda90', files, [spec('/tmp/EC_1_*.dat'), spec('/tmp/EC_8_0.dat')]);

    expect(files.calls).toEqual([
      'list /tmp',
      'stat /tmp/EC_8_0.dat',
      `download /tmp/EC_1_0.dat ${join(outputDir, '24a1861dda90_EC_1_0.dat')}`,
    ]);
    expect(outcomes).toEqual([
      { remotePath: '/tmp/EC_1_0.dat', status: 'Retrieved', size: 2048, localPath: join(outputDir, '24a1861dda90_EC_1_0.dat') },
      { remotePath: '/tmp/EC_8_0.dat', status: 'MissingArtifact' },
    ]);
  });

  it('uses the local name for a single match', async () => {
    const files = new FakeFiles(listing);
    const verifier = new RetrievalVerifier(outputDir);

    const [outcome] = await verifier.retrieve('k1', files, [spec('/tmp/EC_1_0.dat', { localName: 'ec.dat' })]);

    expect(outcome.localPath).toBe(join(outputDir, 'k1_ec.dat'));
  });

  it('reports a failed download without touching the others', async () => {
    const files = new FakeFiles([{ path: '/tmp/a.dat', size: 5 }, { path: '/tmp/b.dat', size: 5 }]);
    files.failDownloads.add('/tmp/a.dat');
    const verifier = new RetrievalVerifier(outputDir);

    const outcomes = await verifier.retrieve('k1', files, [spec('/tmp/*.dat')]);

    expect(outcomes.map((outcome) => [outcome.remotePath, outcome.status])).toEqual([
      ['/tmp/a.dat', 'TransferFailed'],
      ['/tmp/b.dat', 'Retrieved'],
    ]);
    expect(outcomes[0].error).toBe('transfer interrupted');
  });

  it('marks every spec as failed when the listing itself faults', async () => {
    const broken: RemoteFiles = {
      stat: async () => {
        throw new Error('sftp channel closed');
      },
      list: async () => [],
      download: async () => undefined,
    };
    const verifier = new RetrievalVerifier(outputDir);

    const outcomes = await verifier.retrieve('k1', broken, [spec('/tmp/a.dat'), spec('/tmp/b.dat')]);

    expect(outcomes).toEqual([
      { remotePath: '/tmp/a.dat', status: 'TransferFailed', error: 'sftp channel closed' },
      { remotePath: '/tmp/b.dat', status: 'TransferFailed', error: 'sftp channel closed' },
    ]);
  });

  it('returns nothing for no specs', async () => {
    const files = new FakeFiles(listing);
    await expect(new RetrievalVerifier(outputDir).retrieve('k1', files, [])).resolves.toEqual([]);
    expect(files.calls).toEqual([]);
  });
});
