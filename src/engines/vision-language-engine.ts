import { readFile } from 'node:fs/promises';
import path from 'node:path';
import OpenAI from 'openai';
import type { EngineKind, IOCREngine, OCRResult, ProcessOptions } from '@/types/ocr-engine';
import { retryWithBackoff } from '@/utils/error-handling';
import { createLogger, type Logger } from '@/utils/logger';
import { readBoolean, readNumber, readString } from '@/utils/options';
import { cleanModelResponse } from '@/utils/response-cleaner';

export const DEFAULT_VL_MODEL = 'qwen/qwen2.5-vl-7b';
export const DEFAULT_VL_BASE_URL = 'http://localhost:1234/v1';
export const DEFAULT_VL_TEMPERATURE = 0.1;
export const DEFAULT_VL_MAX_TOKENS = 50;
export const DEFAULT_VL_PROMPT =
  'Please look at this image carefully and extract the exact text/code shown in the image. ' +
  'This appears to be an alphanumeric code or product number. Please provide ONLY the exact ' +
  'text you see, without any additional explanation or formatting. The text typically consists ' +
  'of letters, numbers, and may include symbols like # or .';

const MIME_TYPES: Record<string, string> = {
  '.png': 'image/png',
  '.webp': 'image/webp',
  '.bmp': 'image/bmp',
  '.tiff': 'image/tiff',
};

export interface VisionLanguageEngineOptions {
  model?: string;
  baseUrl?: string;
  apiKey?: string;
  temperature?: number;
  maxTokens?: number;
  prompt?: string;
  cleanResponse?: boolean;
  connectRetryDelaysMs?: number[];
  logger?: Logger;
}

/** Accepts the `ws://host:port` form of LM Studio URLs as well as plain HTTP base URLs. */
export function toHttpBaseUrl(url: string): string {
  const httpUrl = url.replace(/^ws(s?):\/\//, 'http$1://').replace(/\/+$/, '');
  return /\/v\d+$/.test(httpUrl) ? httpUrl : `${httpUrl}/v1`;
}

export async function imageToDataUrl(imagePath: string): Promise<string> {
  const buffer = await readFile(imagePath);
  const mimeType = MIME_TYPES[path.extname(imagePath).toLowerCase()] ?? 'image/jpeg';
  return `data:${mimeType};base64,${buffer.toString('base64')}`;
}

function extractContent(content: unknown): string {
  return typeof content === 'string' ? content : '';
}

/**
 * A multimodal model behind an OpenAI-compatible chat endpoint (LM Studio, vLLM, ...).
 * One client, and so one pooled keep-alive connection, is shared by every call of a run.
 */
export class VisionLanguageEngine implements IOCREngine {
  public readonly id = 'qwen-vl';
  public readonly kind: EngineKind = 'remote';
  public isLoading = false;
  private client: OpenAI | null = null;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly temperature: number;
  private readonly maxTokens: number;
  private readonly prompt: string;
  private readonly cleanResponse: boolean;
  private readonly connectRetryDelaysMs: number[];
  private readonly logger: Logger;

  constructor(options: VisionLanguageEngineOptions = {}) {
    this.model = options.model ?? DEFAULT_VL_MODEL;
    this.baseUrl = toHttpBaseUrl(options.baseUrl ?? DEFAULT_VL_BASE_URL);
    this.apiKey = options.apiKey ?? 'lm-studio';
    this.temperature = options.temperature ?? DEFAULT_VL_TEMPERATURE;
    this.maxTokens = options.maxTokens ?? DEFAULT_VL_MAX_TOKENS;
    this.prompt = options.prompt ?? DEFAULT_VL_PROMPT;
    this.cleanResponse = options.cleanResponse ?? true;
    this.connectRetryDelaysMs = options.connectRetryDelaysMs ?? [500, 1000, 2000];
    this.logger = options.logger ?? createLogger('qwen-vl');
  }

  static fromOptions(options: Record<string, unknown> = {}, logger?: Logger): VisionLanguageEngine {
    return new VisionLanguageEngine({
      model: readString(options, 'model_name'),
      baseUrl: readString(options, 'base_url') ?? readString(options, 'lmstudio_url'),
      apiKey: readString(options, 'api_key'),
      temperature: readNumber(options, 'temperature'),
      maxTokens: readNumber(options, 'max_tokens'),
      prompt: readString(options, 'prompt_template'),
      cleanResponse: readBoolean(options, 'clean_response'),
      logger,
    });
  }

  async load(): Promise<void> {
    if (this.client) {
      return;
    }

    this.isLoading = true;
    try {
      const client = new OpenAI({ baseURL: this.baseUrl, apiKey: this.apiKey, maxRetries: 0 });
      await retryWithBackoff(() => client.models.list(), {
        delaysMs: this.connectRetryDelaysMs,
        onRetry: (error, attempt) => {
          const detail = error instanceof Error ? error.message : String(error);
          this.logger.warn(`Connection check failed (attempt ${attempt}): ${detail}`);
        },
      });
      this.client = client;
      this.logger.info(`Connected to ${this.baseUrl} (model ${this.model})`);
    } finally {
      this.isLoading = false;
    }
  }

  async process(imagePath: string, options: ProcessOptions = {}): Promise<OCRResult> {
    if (!this.client) {
      throw new Error('Vision-language engine not loaded.');
    }

    const dataUrl = await imageToDataUrl(imagePath);
    const response = await this.client.chat.completions.create(
      {
        model: this.model,
        temperature: this.temperature,
        max_tokens: this.maxTokens,
        messages: [
          {
            role: 'user',
            content: [
              { type: 'text', text: this.prompt },
              { type: 'image_url', image_url: { url: dataUrl } },
            ],
          },
        ],
      },
      options.signal ? { signal: options.signal } : undefined
    );

    const raw = extractContent(response.choices[0]?.message?.content).trim();
    return { text: this.cleanResponse ? cleanModelResponse(raw) : raw };
  }

  async destroy(): Promise<void> {
    this.client = null;
  }

  describe(): Record<string, unknown> {
    return {
      backend: 'openai-compatible',
      model: this.model,
      baseUrl: this.baseUrl,
      temperature: this.temperature,
      maxTokens: this.maxTokens,
      prompt: this.prompt,
      cleanResponse: this.cleanResponse,
    };
  }
}
