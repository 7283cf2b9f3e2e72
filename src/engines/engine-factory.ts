import type { IOCREngine } from '@/types/ocr-engine';
import { TesseractEngine } from '@/engines/tesseract-engine';
import { VisionLanguageEngine } from '@/engines/vision-language-engine';
import { createInvalidConfigError } from '@/utils/error-handling';
import type { Logger } from '@/utils/logger';

/** Engine-specific options, passed through to the backend's constructor uninterpreted. */
export type EngineOptions = Record<string, unknown>;

export type EngineFactoryCreator = (options: EngineOptions) => IOCREngine | Promise<IOCREngine>;

export class EngineFactory {
  private readonly registry = new Map<string, EngineFactoryCreator>();

  register(id: string, creator: EngineFactoryCreator): void {
    if (this.registry.has(id)) {
      throw new Error(`Engine already registered: ${id}`);
    }

    this.registry.set(id, creator);
  }

  async create(id: string, options: EngineOptions = {}): Promise<IOCREngine> {
    const creator = this.registry.get(id);
    if (!creator) {
      throw createInvalidConfigError(
        `Unknown engine "${id}". Available engines: ${this.getAvailableEngines().join(', ')}.`
      );
    }

    const engine = await creator(options);
    if (engine.id !== id) {
      throw new Error(`Engine id mismatch for ${id}`);
    }

    return engine;
  }

  getAvailableEngines(): string[] {
    return Array.from(this.registry.keys()).sort();
  }
}

export function createDefaultEngineFactory(logger?: Logger): EngineFactory {
  const factory = new EngineFactory();
  factory.register('tesseract', (options) =>
    TesseractEngine.fromOptions(options, logger?.child('tesseract'))
  );
  factory.register('qwen-vl', (options) =>
    VisionLanguageEngine.fromOptions(options, logger?.child('qwen-vl'))
  );
  return factory;
}
