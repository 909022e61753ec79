import { describe, it, expect } from 'vitest';
import { charLength, mergePieces, sliceChars, splitKeepingSeparator, splitText } from './text-splitter';

describe('charLength', () => {
  it('counts a surrogate pair as one character', () => {
    expect(charLength('a😀b')).toBe(3);
    expect(charLength('')).toBe(0);
  });

  it('counts an unpaired surrogate once', () => {
    expect(charLength('x\ud83d')).toBe(2);
  });
});

describe('sliceChars', () => {
  it('never cuts a surrogate pair', () => {
    expect(sliceChars('😀😀😀', 2)).toBe('😀😀');
    expect(sliceChars('ab', 5)).toBe('ab');
  });
});

describe('splitKeepingSeparator', () => {
  it('keeps the separator at the head of the following piece', () => {
    expect(splitKeepingSeparator('a. b. c', '. ')).toEqual(['a', '. b', '. c']);
  });

  it('drops empty pieces', () => {
    expect(splitKeepingSeparator('\n\nx', '\n\n')).toEqual(['\n\nx']);
  });

  it('splits into characters on the empty separator', () => {
    expect(splitKeepingSeparator('abc', '')).toEqual(['a', 'b', 'c']);
  });
});

describe('mergePieces', () => {
  it('carries trailing pieces within the overlap into the next chunk', () => {
    expect(mergePieces(['aa', 'bb', 'cc'], { chunkSize: 4, chunkOverlap: 2 })).toEqual(['aabb', 'bbcc']);
  });
});

describe('splitText', () => {
  it('returns short text as a single trimmed chunk', () => {
    expect(splitText('  Hello there.  ', { chunkSize: 100, chunkOverlap: 10 })).toEqual(['Hello there.']);
  });

  it('prefers paragraph boundaries', () => {
    expect(splitText('First para.\n\nSecond para.', { chunkSize: 15, chunkOverlap: 0 })).toEqual([
      'First para.',
      'Second para.',
    ]);
  });

  it('falls back to characters with overlap', () => {
    expect(splitText('abcdefghij', { chunkSize: 4, chunkOverlap: 1 })).toEqual(['abcd', 'defg', 'ghij']);
  });

  it('splits 5000 characters of words into overlapping chunks of at most 2000', () => {
    const content = Array(1000).fill('abcd').join(' ') + '.';
    expect(content).toHaveLength(5000);

    const chunks = splitText(content, { chunkSize: 2000, chunkOverlap: 50 });

    expect(chunks.map((c) => c.length)).toEqual([1999, 1999, 1100]);
    expect(chunks[1].startsWith(chunks[0].slice(-49))).toBe(true);
    expect(chunks[2].endsWith('abcd.')).toBe(true);
  });

  it('never emits a chunk longer than chunkSize', () => {
    const text = 'One sentence here. Another one, with a clause! A question? '.repeat(40);
    for (const chunk of splitText(text, { chunkSize: 120, chunkOverlap: 20 })) {
      expect(chunk.length).toBeLessThanOrEqual(120);
      expect(chunk).toBe(chunk.trim());
    }
  });
});
