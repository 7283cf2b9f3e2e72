import { EvaluationError, EvaluationErrorCode } from '@/types/evaluation-errors';

export type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Field-by-field validation of a report read back from disk; errors name the offending field. */
export class JsonReader {
  private readonly documentName: string;

  constructor(documentName: string) {
    this.documentName = documentName;
  }

  fail(field: string, expected: string): never {
    throw new EvaluationError(
      `Invalid ${this.documentName}: ${field} must be ${expected}.`,
      EvaluationErrorCode.REPORT_FAILED,
      false
    );
  }

  parse(text: string): unknown {
    try {
      return JSON.parse(text);
    } catch (error) {
      const detail = error instanceof Error ? error.message : String(error);
      throw new EvaluationError(
        `Invalid ${this.documentName}: ${detail}`,
        EvaluationErrorCode.REPORT_FAILED,
        false
      );
    }
  }

  object(value: unknown, field: string): JsonObject {
    return isJsonObject(value) ? value : this.fail(field, 'an object');
  }

  array(source: JsonObject, key: string, field: string): unknown[] {
    const value = source[key];
    return Array.isArray(value) ? value : this.fail(`${field}.${key}`, 'an array');
  }

  string(source: JsonObject, key: string, field: string): string {
    const value = source[key];
    return typeof value === 'string' ? value : this.fail(`${field}.${key}`, 'a string');
  }

  number(source: JsonObject, key: string, field: string): number {
    const value = source[key];
    return typeof value === 'number' && Number.isFinite(value)
      ? value
      : this.fail(`${field}.${key}`, 'a finite number');
  }

  nullableNumber(source: JsonObject, key: string, field: string): number | null {
    return source[key] === null ? null : this.number(source, key, field);
  }

  optionalNumber(source: JsonObject, key: string, field: string): number | undefined {
    return source[key] === undefined ? undefined : this.number(source, key, field);
  }

  boolean(source: JsonObject, key: string, field: string): boolean {
    const value = source[key];
    return typeof value === 'boolean' ? value : this.fail(`${field}.${key}`, 'a boolean');
  }
}
