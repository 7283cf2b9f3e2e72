import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { cleanModelResponse, EXPLANATION_PREFIXES } from '../src/utils/response-cleaner';

describe('cleanModelResponse property tests', () => {
  it('returns a bare code unchanged', () => {
    fc.assert(
      fc.property(fc.stringMatching(/^[A-Z0-9]{1,8}([#.][A-Z0-9]{1,4})?$/), (code) => {
        expect(cleanModelResponse(code)).toBe(code);
      }),
      { numRuns: 100 }
    );
  });

  it('strips every known preamble', () => {
    fc.assert(
      fc.property(fc.constantFrom(...EXPLANATION_PREFIXES), (prefix) => {
        expect(cleanModelResponse(`${prefix} PPT770#02`)).toBe('PPT770#02');
      }),
      { numRuns: 25 }
    );
  });
});

describe('cleanModelResponse unit tests', () => {
  it('removes a preamble and the quotes around the code', () => {
    expect(cleanModelResponse('The code in the image is: "PLA196.12"')).toBe('PLA196.12');
  });

  it('keeps only the first line and upper-cases the code', () => {
    expect(cleanModelResponse('p4p601#03\nLet me know if you need anything else.')).toBe('P4P601#03');
  });

  it('picks the longest code-like token', () => {
    expect(cleanModelResponse('`AB-12` and C')).toBe('AB-12');
    expect(cleanModelResponse('hello world')).toBe('HELLO');
  });

  it('returns text without a code-like token as it is', () => {
    expect(cleanModelResponse('  ¿?  ')).toBe('¿?');
    expect(cleanModelResponse('   ')).toBe('');
  });
});
