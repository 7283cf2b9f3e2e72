import { stat } from 'node:fs/promises';
import path from 'node:path';

export const SUPPORTED_IMAGE_EXTENSIONS = new Set(['.jpg', '.jpeg', '.png', '.bmp', '.tiff', '.webp']);

export const MAX_IMAGE_BYTES = 10 * 1024 * 1024;

export type ImageValidation = { valid: true } | { valid: false; reason: string };

export async function validateImage(imagePath: string): Promise<ImageValidation> {
  const extension = path.extname(imagePath).toLowerCase();
  if (!SUPPORTED_IMAGE_EXTENSIONS.has(extension)) {
    return { valid: false, reason: `unsupported image format: ${extension || '(none)'}` };
  }

  let info;
  try {
    info = await stat(imagePath);
  } catch {
    return { valid: false, reason: 'image not found' };
  }

  if (!info.isFile()) {
    return { valid: false, reason: 'image path is not a file' };
  }
  if (info.size > MAX_IMAGE_BYTES) {
    return { valid: false, reason: `image exceeds ${MAX_IMAGE_BYTES} bytes` };
  }
  return { valid: true };
}
