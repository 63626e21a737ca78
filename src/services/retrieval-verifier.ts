import { mkdir } from 'fs/promises';
import { join, posix } from 'path';
import config from '../config/index.js';
import logger from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';
import { escapeRegExp } from '../utils/output.js';
import type {
  ArtifactOutcome,
  RemoteEntry,
  RemoteFiles,
  RetrievalSpec,
  VerificationOutcome,
} from '../types/device.js';

export function hasWildcard(path: string): boolean {
  return /[*?]/.test(posix.basename(path));
}

function globToRegExp(glob: string): RegExp {
  const body = glob.split('').map((char) => {
    if (char === '*') return '[^/]*';
    if (char === '?') return '[^/]';
    return escapeRegExp(char);
  }).join('');
  return new RegExp(`^${body}$`);
}

function matching(listing: readonly RemoteEntry[], spec: RetrievalSpec): RemoteEntry[] {
  if (!hasWildcard(spec.remotePath)) {
    return listing.filter((entry) => entry.path === spec.remotePath);
  }
  const dir = posix.dirname(spec.remotePath);
  const pattern = globToRegExp(posix.basename(spec.remotePath));
  return listing.filter((entry) => posix.dirname(entry.path) === dir && pattern.test(posix.basename(entry.path)));
}

/**
 * Checks the listed remote files against what each spec expects. Pure: it
 * decides, it never transfers.
 */
export function verify(listing: readonly RemoteEntry[], specs: readonly RetrievalSpec[]): VerificationOutcome[] {
  return specs.map((spec): VerificationOutcome => {
    const found = matching(listing, spec);
    if (found.length === 0) {
      return { status: 'MissingArtifact', spec, path: spec.remotePath };
    }
    // A zero-size file is never usable, whatever minSize says
    const usable = found.filter((entry) => entry.size > 0 && entry.size >= spec.minSize);
    if (usable.length === 0) {
      return { status: 'EmptyArtifact', spec, path: found[0].path, size: found[0].size };
    }
    return { status: 'ok', spec, entries: usable };
  });
}

/** Lists what the remote side has for the given specs. Faults propagate. */
export async function collect(files: RemoteFiles, specs: readonly RetrievalSpec[]): Promise<RemoteEntry[]> {
  const listing: RemoteEntry[] = [];
  const listed = new Set<string>();
  for (const spec of specs) {
    if (hasWildcard(spec.remotePath)) {
      const dir = posix.dirname(spec.remotePath);
      if (!listed.has(dir)) {
        listed.add(dir);
        listing.push(...await files.list(dir));
      }
    } else {
      const entry = await files.stat(spec.remotePath);
      if (entry) {
        listing.push(entry);
      }
    }
  }
  return listing;
}

export class RetrievalVerifier {
  constructor(private readonly outputDir: string = config.paths.outputDir) {}

  localPathFor(deviceKey: string, entry: RemoteEntry, spec: RetrievalSpec, single: boolean): string {
    const name = spec.localName && single ? spec.localName : posix.basename(entry.path);
    return join(this.outputDir, `${deviceKey}_${name}`);
  }

  /**
   * Verifies every spec first, then downloads only what passed. Neither a
   * verification failure nor a transfer fault is retried.
   */
  async retrieve(deviceKey: string, files: RemoteFiles, specs: readonly RetrievalSpec[]): Promise<ArtifactOutcome[]> {
    if (specs.length === 0) {
      return [];
    }
    const log = logger.child({ device: deviceKey });

    let listing: RemoteEntry[];
    try {
      listing = await collect(files, specs);
    } catch (error) {
      log.warn('Listing remote artifacts failed', { error: errorMessage(error) });
      return specs.map((spec): ArtifactOutcome => ({ remotePath: spec.remotePath, status: 'TransferFailed', error: errorMessage(error) }));
    }

    const outcomes: ArtifactOutcome[] = [];
    for (const verdict of verify(listing, specs)) {
      if (verdict.status === 'MissingArtifact') {
        log.warn('Artifact missing', { path: verdict.path });
        outcomes.push({ remotePath: verdict.path, status: 'MissingArtifact' });
        continue;
      }
      if (verdict.status === 'EmptyArtifact') {
        log.warn('Artifact empty', { path: verdict.path, size: verdict.size });
        outcomes.push({ remotePath: verdict.path, status: 'EmptyArtifact', size: verdict.size });
        continue;
      }

      await mkdir(this.outputDir, { recursive: true });
      for (const entry of verdict.entries) {
        const localPath = this.localPathFor(deviceKey, entry, verdict.spec, verdict.entries.length === 1);
        try {
          await files.download(entry.path, localPath);
          log.info('Artifact retrieved', { path: entry.path, localPath, size: entry.size });
          outcomes.push({ remotePath: entry.path, status: 'Retrieved', size: entry.size, localPath });
        } catch (error) {
          log.warn('Artifact transfer failed', { path: entry.path, error: errorMessage(error) });
          outcomes.push({ remotePath: entry.path, status: 'TransferFailed', size: entry.size, error: errorMessage(error) });
        }
      }
    }
    return outcomes;
  }
}
