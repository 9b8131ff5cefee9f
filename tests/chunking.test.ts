import { describe, it, expect } from 'vitest';
import { chunkText, normalizeText } from '../src/utils/chunking.js';
import { ChunkingConfigError } from '../src/errors.js';

function letters(length: number): string {
  return Array.from({ length }, (_, i) => String.fromCharCode(97 + (i % 26))).join('');
}

describe('normalizeText', () => {
  it('drops characters outside the allow-list and collapses whitespace', () => {
    const raw = '  Hello,   world!  ©2024 caf\u00e9 — “quoted” @home\n\t(ok); fine: yes? ';
    expect(normalizeText(raw)).toBe('Hello, world! 2024 caf\u00e9 quoted home (ok); fine: yes?');
  });

  it('is idempotent', () => {
    const inputs = ['a  @  b', 'Fees – ₹50,000 per year!', '\n\nAdmissions open\t now.', ''];
    for (const input of inputs) {
      const once = normalizeText(input);
      expect(normalizeText(once)).toBe(once);
    }
  });
});

describe('chunkText', () => {
  it('overlaps consecutive windows by exactly the overlap when no sentence break is found', () => {
    const content = letters(1000);
    const chunks = chunkText(content, 600, 150);

    expect(chunks).toEqual([content.slice(0, 600), content.slice(450, 1000)]);
    expect(chunks[0].slice(-150)).toBe(chunks[1].slice(0, 150));
  });

  it('cuts right after a sentence terminal inside the lookback window', () => {
    const content = 'x'.repeat(500) + '.' + 'y'.repeat(499);
    const chunks = chunkText(content, 600, 150);

    expect(chunks.map((c) => c.length)).toEqual([501, 600, 199]);
    expect(chunks[0].endsWith('.')).toBe(true);
    expect(chunks[0].slice(-150)).toBe(chunks[1].slice(0, 150));
    expect(chunks[1].slice(-150)).toBe(chunks[2].slice(0, 150));
  });

  it('ignores sentence terminals before the lookback window', () => {
    const content = 'x'.repeat(300) + '!' + 'y'.repeat(699);
    const chunks = chunkText(content, 600, 150);
    expect(chunks[0]).toBe(content.slice(0, 600));
  });

  it('never grows a chunk past chunkSize to reach a terminal right after the window', () => {
    const content = 'x'.repeat(600) + '.' + 'y'.repeat(399);
    const chunks = chunkText(content, 600, 150);
    expect(chunks[0]).toBe('x'.repeat(600));
    expect(chunks[1]).toBe(content.slice(450));
  });

  it('discards fragments of 100 characters or fewer', () => {
    expect(chunkText('A'.repeat(50))).toEqual([]);
    expect(chunkText('A'.repeat(100))).toEqual([]);
    expect(chunkText('A'.repeat(101))).toEqual(['A'.repeat(101)]);
    expect(chunkText('')).toEqual([]);
  });

  it('keeps every chunk within (100, chunkSize] characters', () => {
    const sentence = 'Students can apply for hostel rooms before the semester begins. ';
    const content = normalizeText(sentence.repeat(40));
    const chunks = chunkText(content, 300, 80);

    expect(chunks.length).toBeGreaterThan(5);
    for (const c of chunks) {
      expect(c.length).toBeGreaterThan(100);
      expect(c.length).toBeLessThanOrEqual(300);
    }
  });

  it('rejects an overlap that would stop the window from advancing', () => {
    expect(() => chunkText(letters(1000), 150, 150)).toThrow(ChunkingConfigError);
    expect(() => chunkText(letters(1000), 100, 200)).toThrow(ChunkingConfigError);
    expect(() => chunkText(letters(1000), 0, 0)).toThrow(ChunkingConfigError);
    expect(() => chunkText(letters(1000), 600, -1)).toThrow(ChunkingConfigError);
  });

  it('always advances with a small window and a large overlap', () => {
    const content = 'Short one. '.repeat(100).trim();
    const chunks = chunkText(content, 200, 150);
    expect(chunks.length).toBeGreaterThan(0);
    expect(chunks.length).toBeLessThan(content.length);
  });
});
