import { readFile } from 'node:fs/promises';
import { FatalIOError, ParseError } from '@/types/evaluation-errors';
import type { GroundTruthRecord, Point, Quad } from '@/types/evaluation';

export type AnnotationPolicy = 'first' | 'all';

export interface ManifestOptions {
  /** `first`: one ground truth per image. `all`: every well-formed annotation is scored. */
  annotationPolicy?: AnnotationPolicy;
  skipDifficult?: boolean;
  /** Rewrites the manifest's image path into the dataset key, e.g. to prefix a directory. */
  mapImagePath?: (imagePath: string) => string;
  directory?: string;
}

export interface ManifestParseResult {
  records: GroundTruthRecord[];
  skippedLines: number;
  errors: ParseError[];
}

interface Annotation {
  transcription: string;
  points?: Quad;
  difficult: boolean;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function toPoint(value: unknown): Point | null {
  if (!Array.isArray(value) || value.length !== 2) {
    return null;
  }
  const [x, y] = value;
  if (typeof x !== 'number' || typeof y !== 'number' || !Number.isFinite(x) || !Number.isFinite(y)) {
    return null;
  }
  return [x, y];
}

export function toQuad(value: unknown): Quad | null {
  if (!Array.isArray(value) || value.length !== 4) {
    return null;
  }
  const points = value.map(toPoint);
  const [a, b, c, d] = points;
  if (!a || !b || !c || !d) {
    return null;
  }
  return [a, b, c, d];
}

/** Returns `null` for anything that is not a usable annotation object. */
export function toAnnotation(value: unknown): Annotation | null {
  if (!isRecord(value) || typeof value.transcription !== 'string') {
    return null;
  }

  let points: Quad | undefined;
  if (value.points !== undefined) {
    const quad = toQuad(value.points);
    if (!quad) {
      return null;
    }
    points = quad;
  }

  if (value.difficult !== undefined && typeof value.difficult !== 'boolean') {
    return null;
  }

  return {
    transcription: value.transcription,
    ...(points ? { points } : {}),
    difficult: value.difficult === true,
  };
}

function parseAnnotations(segment: string, lineNumber: number): unknown[] | ParseError {
  let parsed: unknown;
  try {
    parsed = JSON.parse(segment);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return new ParseError(`invalid annotation JSON (${detail})`, lineNumber);
  }

  if (!Array.isArray(parsed)) {
    return new ParseError('annotations must be a JSON array', lineNumber);
  }
  return parsed;
}

export function parseManifest(text: string, options: ManifestOptions = {}): ManifestParseResult {
  const policy = options.annotationPolicy ?? 'first';
  const mapImagePath = options.mapImagePath ?? ((imagePath: string) => imagePath);
  const records: GroundTruthRecord[] = [];
  const errors: ParseError[] = [];

  const lines = text.replace(/^\uFEFF/, '').split(/\r?\n/);

  lines.forEach((rawLine, index) => {
    const lineNumber = index + 1;
    const line = rawLine.trim();
    if (line.length === 0) {
      return;
    }

    const tabIndex = line.indexOf('\t');
    if (tabIndex <= 0) {
      errors.push(new ParseError('expected "<image path>\\t<annotations>"', lineNumber));
      return;
    }

    const imagePath = line.slice(0, tabIndex).trim();
    const annotations = parseAnnotations(line.slice(tabIndex + 1), lineNumber);
    if (annotations instanceof ParseError) {
      errors.push(annotations);
      return;
    }

    const wellFormed = annotations
      .map(toAnnotation)
      .filter((annotation): annotation is Annotation => annotation !== null);

    if (wellFormed.length === 0) {
      errors.push(new ParseError('no well-formed annotation', lineNumber));
      return;
    }

    // A line whose annotations are all difficult yields no records and no error.
    const usable = options.skipDifficult
      ? wellFormed.filter((annotation) => !annotation.difficult)
      : wellFormed;

    const selected = policy === 'first' ? usable.slice(0, 1) : usable;
    const key = mapImagePath(imagePath);
    for (const annotation of selected) {
      records.push({
        imagePath: key,
        transcription: annotation.transcription,
        ...(annotation.points ? { points: annotation.points } : {}),
        difficult: annotation.difficult,
        ...(options.directory !== undefined ? { directory: options.directory } : {}),
        lineNumber,
      });
    }
  });

  return { records, skippedLines: errors.length, errors };
}

export async function loadManifestFile(
  manifestPath: string,
  options: ManifestOptions = {}
): Promise<ManifestParseResult> {
  let text: string;
  try {
    text = await readFile(manifestPath, 'utf-8');
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new FatalIOError(`Cannot read manifest ${manifestPath}: ${detail}`, manifestPath);
  }
  return parseManifest(text, options);
}
