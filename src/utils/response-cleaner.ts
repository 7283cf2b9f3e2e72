export const EXPLANATION_PREFIXES = [
  'The text shown in the image is:',
  'The code in the image is:',
  'The text appears to be:',
  'I can see:',
  'The image shows:',
  'The alphanumeric code is:',
  'The product number is:',
  'Looking at this image, I can see:',
];

export const QUOTE_CHARS = '"\'`';

const CODE_PATTERN = /[A-Z0-9]+[#.\-A-Z0-9]*/g;

function stripChars(value: string, chars: string): string {
  let start = 0;
  let end = value.length;
  while (start < end && chars.includes(value[start])) start += 1;
  while (end > start && chars.includes(value[end - 1])) end -= 1;
  return value.slice(start, end);
}

/**
 * Reduces a chatty model reply to the code it read: known preambles and quotes are stripped,
 * only the first line is kept, and the longest code-like token wins.
 */
export function cleanModelResponse(response: string): string {
  let cleaned = response.trim();
  if (cleaned.length === 0) {
    return '';
  }

  for (const prefix of EXPLANATION_PREFIXES) {
    if (cleaned.toLowerCase().startsWith(prefix.toLowerCase())) {
      cleaned = cleaned.slice(prefix.length).trim();
    }
  }

  cleaned = stripChars(cleaned, QUOTE_CHARS);
  cleaned = (cleaned.split('\n')[0] ?? '').trim();

  const matches = cleaned.toUpperCase().match(CODE_PATTERN);
  if (matches && matches.length > 0) {
    return matches.reduce((longest, match) => (match.length > longest.length ? match : longest));
  }

  return cleaned;
}
