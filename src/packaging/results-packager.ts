/**
 * Results packager.
 *
 * Turns a simulation results directory into a single deterministic ZIP
 * artifact. Two layouts are recognized:
 *
 *   - a run-output directory itself      (`RUN4/`        → `RUN4/out.csv`)
 *   - a parent of run-output directories (`out/RUN1/...` → `RUN1/out.csv`)
 *
 * Both produce the same archive structure, so downstream analysis tools
 * see identical paths whichever directory was handed in.
 */

import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import path from 'path';
import { zipSync, type Zippable } from 'fflate';
import { PackagedArtifact } from '../domain/artifact';
import {
  InvalidResultsDirectoryError,
  PackagingFailureError,
  PublishCancelledError,
  RunControlError,
  errorMessage,
} from '../domain/errors';
import { Logger, logger as rootLogger } from '../logger';

export interface ResultsPackagerOptions {
  /** Matches run-output directory names. Default: names starting with "RUN", any case. */
  outputDirectoryPattern?: RegExp;
  /** Deflate level, 0-9. */
  compressionLevel?: 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7 | 8 | 9;
  logger?: Logger;
}

export interface PackageOptions {
  signal?: AbortSignal;
}

/** Packages a results directory into an artifact. */
export interface ResultsPackager {
  package(directory: string, options?: PackageOptions): Promise<PackagedArtifact>;
}

/** Fixed entry timestamp so identical input yields identical bytes. */
const ARCHIVE_MTIME = new Date(2000, 0, 1, 0, 0, 0);

interface ArchiveEntry {
  archivePath: string;
  filePath: string;
}

/** Shape check for `fs` errors, which may belong to another realm. */
function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return typeof err === 'object' && err !== null && 'code' in err;
}

function toArchivePath(...segments: string[]): string {
  return segments.join('/').split(path.sep).join('/');
}

export class ZipResultsPackager implements ResultsPackager {
  private readonly pattern: RegExp;
  private readonly level: NonNullable<ResultsPackagerOptions['compressionLevel']>;
  private readonly log: Logger;

  constructor(options: ResultsPackagerOptions = {}) {
    this.pattern = options.outputDirectoryPattern ?? /^RUN/i;
    this.level = options.compressionLevel ?? 6;
    this.log = (options.logger ?? rootLogger).child({ module: 'results-packager' });
  }

  async package(directory: string, options: PackageOptions = {}): Promise<PackagedArtifact> {
    const root = path.resolve(directory);
    await this.assertDirectory(root);

    try {
      const realRoot = await fs.realpath(root);
      const outputDirs = await this.findOutputDirectories(root);
      const isOutputDir = this.pattern.test(path.basename(root));

      if (outputDirs.length === 0 && !isOutputDir) {
        this.log.warn('No run output directories found', { directory: root });
        throw new InvalidResultsDirectoryError('No run output directories found', root);
      }

      const entries: ArchiveEntry[] = [];
      if (outputDirs.length > 0) {
        for (const name of outputDirs) {
          await this.collect(path.join(root, name), name, realRoot, entries, options.signal);
        }
      } else {
        await this.collect(root, path.basename(root), realRoot, entries, options.signal);
      }
      entries.sort((a, b) => (a.archivePath < b.archivePath ? -1 : a.archivePath > b.archivePath ? 1 : 0));

      const files: Zippable = {};
      let totalSizeBytes = 0;
      for (const entry of entries) {
        if (options.signal?.aborted) throw new PublishCancelledError({});
        const data = await fs.readFile(entry.filePath);
        files[entry.archivePath] = new Uint8Array(data.buffer, data.byteOffset, data.byteLength);
        totalSizeBytes += data.byteLength;
      }

      const bytes = zipSync(files, { level: this.level, mtime: ARCHIVE_MTIME });
      const checksum = `sha256:${createHash('sha256').update(bytes).digest('hex')}`;

      this.log.info('Packaged results', {
        directory: root,
        fileCount: entries.length,
        totalSizeBytes,
        archiveSizeBytes: bytes.byteLength,
      });

      return Object.freeze({
        bytes,
        fileCount: entries.length,
        totalSizeBytes,
        archiveSizeBytes: bytes.byteLength,
        checksum,
        entries: Object.freeze(entries.map((e) => e.archivePath)),
        directoryName: path.basename(root),
      });
    } catch (err) {
      if (err instanceof RunControlError) throw err;
      this.log.error('Packaging failed', { directory: root, error: errorMessage(err) });
      throw new PackagingFailureError(`Failed to package results in ${root}`, root, err);
    }
  }

  private async assertDirectory(root: string): Promise<void> {
    const stats = await fs.stat(root).catch((err: unknown): never => {
      if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
        throw new InvalidResultsDirectoryError('Results directory does not exist', root);
      }
      throw new PackagingFailureError(`Cannot read results directory ${root}`, root, err);
    });
    if (!stats.isDirectory()) {
      throw new InvalidResultsDirectoryError('Results path is not a directory', root);
    }
  }

  private async findOutputDirectories(root: string): Promise<string[]> {
    const dirents = await fs.readdir(root, { withFileTypes: true });
    return dirents
      .filter((d) => d.isDirectory() && this.pattern.test(d.name))
      .map((d) => d.name)
      .sort();
  }

  /** Recursively gather files under `dir`, skipping anything that resolves outside `realRoot`. */
  private async collect(
    dir: string,
    archivePrefix: string,
    realRoot: string,
    out: ArchiveEntry[],
    signal?: AbortSignal,
  ): Promise<void> {
    if (signal?.aborted) throw new PublishCancelledError({});

    const dirents = await fs.readdir(dir, { withFileTypes: true });
    for (const dirent of dirents) {
      const filePath = path.join(dir, dirent.name);
      const archivePath = toArchivePath(archivePrefix, dirent.name);

      if (dirent.isDirectory()) {
        await this.collect(filePath, archivePath, realRoot, out, signal);
        continue;
      }

      if (dirent.isSymbolicLink()) {
        const target = await fs.realpath(filePath).catch((err: unknown) => {
          if (isErrnoException(err) && (err.code === 'ENOENT' || err.code === 'ELOOP')) return null;
          throw err;
        });
        if (target === null) {
          this.log.warn('Skipping dangling symlink', { file: filePath });
          continue;
        }
        if (target !== realRoot && !target.startsWith(realRoot + path.sep)) {
          this.log.warn('Skipping file outside results root', { file: filePath });
          continue;
        }
        const stats = await fs.stat(target);
        if (!stats.isFile()) continue;
        out.push({ archivePath, filePath: target });
        continue;
      }

      if (dirent.isFile()) {
        out.push({ archivePath, filePath });
      }
    }
  }
}
