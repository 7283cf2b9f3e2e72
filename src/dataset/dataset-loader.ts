import { readdir, stat } from 'node:fs/promises';
import path from 'node:path';
import { FatalIOError, type ParseError } from '@/types/evaluation-errors';
import type { GroundTruthRecord } from '@/types/evaluation';
import { loadManifestFile, type ManifestOptions } from '@/dataset/manifest-parser';

export const LABEL_FILE_NAME = 'Label.txt';

export type DatasetOptions = Omit<ManifestOptions, 'mapImagePath' | 'directory'>;

export interface Dataset {
  rootDir: string;
  labelDirectories: string[];
  records: GroundTruthRecord[];
  skippedLines: number;
  errors: ParseError[];
}

async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isDirectory();
  } catch {
    return false;
  }
}

async function isFile(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isFile();
  } catch {
    return false;
  }
}

async function listSubdirectories(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => path.join(dir, entry.name))
    .sort();
}

/**
 * Finds label directories: each child of `rootDir` holding a Label.txt, or, for a child without
 * one, each of its own children holding a Label.txt.
 */
export async function discoverLabelDirectories(rootDir: string): Promise<string[]> {
  const found: string[] = [];
  for (const child of await listSubdirectories(rootDir)) {
    if (await isFile(path.join(child, LABEL_FILE_NAME))) {
      found.push(child);
      continue;
    }
    for (const grandchild of await listSubdirectories(child)) {
      if (await isFile(path.join(grandchild, LABEL_FILE_NAME))) {
        found.push(grandchild);
      }
    }
  }
  return found;
}

function toPosix(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}

export function datasetKey(relativeDir: string, manifestImagePath: string): string {
  const basename = path.posix.basename(manifestImagePath.replace(/\\/g, '/'));
  return relativeDir.length > 0 ? `${relativeDir}/${basename}` : basename;
}

export function resolveImagePath(rootDir: string, imageKey: string): string {
  return path.resolve(rootDir, ...imageKey.split('/'));
}

export async function loadDataset(rootDir: string, options: DatasetOptions = {}): Promise<Dataset> {
  if (!(await isDirectory(rootDir))) {
    throw new FatalIOError(`Images directory does not exist: ${rootDir}`, rootDir);
  }

  const labelDirectories = await discoverLabelDirectories(rootDir);
  if (labelDirectories.length === 0) {
    throw new FatalIOError(`No ${LABEL_FILE_NAME} found under ${rootDir}`, rootDir);
  }

  const records: GroundTruthRecord[] = [];
  const errors: ParseError[] = [];
  let skippedLines = 0;

  for (const labelDir of labelDirectories) {
    const relativeDir = toPosix(path.relative(rootDir, labelDir));
    const result = await loadManifestFile(path.join(labelDir, LABEL_FILE_NAME), {
      ...options,
      directory: relativeDir,
      mapImagePath: (imagePath) => datasetKey(relativeDir, imagePath),
    });
    records.push(...result.records);
    errors.push(...result.errors);
    skippedLines += result.skippedLines;
  }

  return { rootDir, labelDirectories, records, skippedLines, errors };
}
