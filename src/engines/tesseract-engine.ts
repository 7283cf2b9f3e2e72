import { createWorker, PSM, type RecognizeResult, type Worker } from 'tesseract.js';
import type { EngineKind, IOCREngine, OCRResult, ProcessOptions } from '@/types/ocr-engine';
import { normalizeTesseractLanguage } from '@/utils/language-config';
import type { Logger } from '@/utils/logger';
import { readBoolean, readNumber, readString } from '@/utils/options';

export type TesseractProgressCallback = (status: string, progress: number) => void;

export interface TesseractEngineOptions {
  language?: string;
  /** Words below this confidence (0-1) are dropped from the recognized text. */
  minConfidence?: number;
  singleLine?: boolean;
  charWhitelist?: string;
  cachePath?: string;
  onProgress?: TesseractProgressCallback;
}

export class TesseractEngine implements IOCREngine {
  public readonly id = 'tesseract';
  public readonly kind: EngineKind = 'local';
  public isLoading = false;
  private worker: Worker | null = null;
  /** Jobs run one at a time so an abandoned job can be cut off without touching the next. */
  private queue: Promise<void> = Promise.resolve();
  private readonly onProgress?: TesseractProgressCallback;
  private readonly language: string;
  private readonly minConfidence: number;
  private readonly singleLine: boolean;
  private readonly charWhitelist?: string;
  private readonly cachePath?: string;

  constructor(options: TesseractEngineOptions = {}) {
    this.onProgress = options.onProgress;
    this.language = normalizeTesseractLanguage(options.language ?? 'eng');
    this.minConfidence = options.minConfidence ?? 0;
    this.singleLine = options.singleLine ?? true;
    this.charWhitelist = options.charWhitelist;
    this.cachePath = options.cachePath;
  }

  /** Builds an engine from the opaque option mapping of the config file or `--model-config`. */
  static fromOptions(options: Record<string, unknown> = {}, logger?: Logger): TesseractEngine {
    return new TesseractEngine({
      language: readString(options, 'lang') ?? readString(options, 'language'),
      minConfidence: readNumber(options, 'min_confidence'),
      singleLine: readBoolean(options, 'single_line'),
      charWhitelist: readString(options, 'char_whitelist'),
      cachePath: readString(options, 'cache_path'),
      onProgress: logger
        ? (status, progress) => logger.debug(`${status} ${(progress * 100).toFixed(0)}%`)
        : undefined,
    });
  }

  async load(): Promise<void> {
    if (this.worker) {
      return;
    }

    this.isLoading = true;
    try {
      this.worker = await this.createConfiguredWorker();
    } finally {
      this.isLoading = false;
    }
  }

  private async createConfiguredWorker(): Promise<Worker> {
    const worker = await createWorker(this.language, 1, {
      ...(this.cachePath ? { cachePath: this.cachePath } : {}),
      logger: (message) => {
        if (this.onProgress) {
          this.onProgress(message.status, message.progress ?? 0);
        }
      },
    });
    try {
      await worker.setParameters({
        tessedit_pageseg_mode: this.singleLine ? PSM.SINGLE_LINE : PSM.AUTO,
        ...(this.charWhitelist ? { tessedit_char_whitelist: this.charWhitelist } : {}),
      });
    } catch (error) {
      await worker.terminate();
      throw error;
    }
    return worker;
  }

  async process(imagePath: string, options: ProcessOptions = {}): Promise<OCRResult> {
    if (!this.worker) {
      throw new Error('Tesseract engine not loaded.');
    }

    const job = this.queue.then(() => this.recognize(imagePath, options.signal));
    // The caller observes a failure through `job`; the queue only needs to know it settled.
    this.queue = job.then(
      () => undefined,
      () => undefined
    );
    return job;
  }

  private async recognize(imagePath: string, signal?: AbortSignal): Promise<OCRResult> {
    const worker = this.worker;
    if (!worker) {
      throw new Error('Tesseract engine not loaded.');
    }
    signal?.throwIfAborted();
    if (!signal) {
      return this.toResult(await worker.recognize(imagePath));
    }

    let onAbort = (): void => {};
    const aborted = new Promise<never>((_, reject) => {
      onAbort = () => reject(signal.reason);
      signal.addEventListener('abort', onAbort, { once: true });
    });
    try {
      return this.toResult(await Promise.race([worker.recognize(imagePath), aborted]));
    } catch (error) {
      if (signal.aborted) {
        // The worker is still busy with the abandoned job.
        await this.replaceWorker(worker);
      }
      throw error;
    } finally {
      signal.removeEventListener('abort', onAbort);
    }
  }

  private async replaceWorker(stale: Worker): Promise<void> {
    this.worker = null;
    await stale.terminate();
    this.worker = await this.createConfiguredWorker();
  }

  private toResult(result: RecognizeResult): OCRResult {
    const words = result.data.words ?? [];
    const text =
      this.minConfidence > 0 && words.length > 0
        ? words
            .filter((word) => word.confidence / 100 >= this.minConfidence)
            .map((word) => word.text)
            .join(' ')
        : (result.data.text ?? '');

    return {
      text: text.split(/\s*\n\s*/).filter(Boolean).join(' ').trim(),
      confidence: result.data.confidence / 100,
    };
  }

  async destroy(): Promise<void> {
    if (this.worker) {
      await this.worker.terminate();
      this.worker = null;
    }
  }

  describe(): Record<string, unknown> {
    return {
      backend: 'tesseract.js',
      language: this.language,
      minConfidence: this.minConfidence,
      singleLine: this.singleLine,
      ...(this.charWhitelist ? { charWhitelist: this.charWhitelist } : {}),
    };
  }
}
