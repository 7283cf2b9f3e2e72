import type { GroundTruthRecord } from '../src/types/evaluation';
import type { IOCREngine, OCRResult, ProcessOptions, RecognitionOutcome } from '../src/types/ocr-engine';
import type { LogLevel, LogSink } from '../src/utils/logger';

export function groundTruth(
  imagePath: string,
  transcription: string,
  extra: Partial<GroundTruthRecord> = {}
): GroundTruthRecord {
  return { imagePath, transcription, difficult: false, lineNumber: 1, ...extra };
}

export function succeeded(imagePath: string, recognizedText: string): RecognitionOutcome {
  return { imagePath, recognizedText, succeeded: true };
}

export function failed(imagePath: string, errorDetail: string = 'engine crashed'): RecognitionOutcome {
  return { imagePath, recognizedText: '', succeeded: false, errorDetail };
}

export interface FakeEngine extends IOCREngine {
  calls: string[];
  loaded: boolean;
  destroyed: boolean;
}

export function fakeEngine(
  id: string,
  process: (imagePath: string, options?: ProcessOptions) => Promise<OCRResult>
): FakeEngine {
  const engine: FakeEngine = {
    id,
    kind: 'local',
    isLoading: false,
    calls: [],
    loaded: false,
    destroyed: false,
    load: (): Promise<void> => {
      engine.loaded = true;
      return Promise.resolve();
    },
    process: (imagePath, options) => {
      engine.calls.push(imagePath);
      return process(imagePath, options);
    },
    destroy: (): Promise<void> => {
      engine.destroyed = true;
      return Promise.resolve();
    },
    describe: () => ({ backend: 'fake' }),
  };
  return engine;
}

/** Engine that reads the text to return from a lookup keyed by image file name. */
export function lookupEngine(id: string, answers: Record<string, string>): FakeEngine {
  return fakeEngine(id, (imagePath) => {
    const name = imagePath.split(/[\\/]/).pop() ?? imagePath;
    const text = answers[name];
    return text === undefined
      ? Promise.reject(new Error(`no answer for ${name}`))
      : Promise.resolve({ text });
  });
}

export function recordingSink(): { sink: LogSink; lines: string[]; entries: [LogLevel, string][] } {
  const lines: string[] = [];
  const entries: [LogLevel, string][] = [];
  return {
    lines,
    entries,
    sink: (level, line) => {
      lines.push(line);
      entries.push([level, line]);
    },
  };
}
