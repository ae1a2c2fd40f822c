import { TRUNCATION_MARKER } from '@repairbench/shared';
import { BoundedOutput, characterBoundary } from './output';

describe('BoundedOutput', () => {
  it('keeps everything under the cap', () => {
    const out = new BoundedOutput(10);
    out.push(Buffer.from('abc'));
    out.push(Buffer.from('def'));
    expect(out.text()).toBe('abcdef');
    expect(out.truncated).toBe(false);
  });

  it('cuts at the cap across chunks', () => {
    const out = new BoundedOutput(4);
    out.push(Buffer.from('abc'));
    out.push(Buffer.from('defg'));
    out.push(Buffer.from('h'));
    expect(out.text()).toBe(`abcd${TRUNCATION_MARKER}`);
    expect(out.truncated).toBe(true);
  });

  it('does not split a multi-byte character at the cap', () => {
    const out = new BoundedOutput(10);
    // 'é' is two bytes; the cap falls between them.
    out.push(Buffer.from(`${'a'.repeat(9)}é tail`));
    expect(out.text()).toBe(`${'a'.repeat(9)}${TRUNCATION_MARKER}`);
  });

  it('finds the watch pattern past the cap', () => {
    const out = new BoundedOutput(8, /MemoryError/);
    out.push(Buffer.from('w'.repeat(100)));
    expect(out.sawWatched).toBe(false);
    out.push(Buffer.from('Memory'));
    out.push(Buffer.from('Error: cannot allocate\n'));
    expect(out.sawWatched).toBe(true);
    expect(out.text()).toBe(`wwwwwwww${TRUNCATION_MARKER}`);
  });
});

describe('characterBoundary', () => {
  it('keeps complete sequences', () => {
    expect(characterBoundary(Buffer.from('aé'))).toBe(3);
    expect(characterBoundary(Buffer.from('€'))).toBe(3);
    expect(characterBoundary(Buffer.alloc(0))).toBe(0);
  });

  it('drops a trailing partial sequence', () => {
    const euro = Buffer.from('a€');
    expect(characterBoundary(euro.subarray(0, 3))).toBe(1);
    expect(characterBoundary(euro.subarray(0, 2))).toBe(1);
  });
});
