import { TRUNCATION_MARKER } from '@repairbench/shared';

// Characters carried between chunks so a match split across two reads is found.
const WATCH_OVERLAP = 256;

/**
 * Collects a child stream up to a byte cap. Bytes past the cap are dropped so the
 * child never blocks on a full pipe.
 *
 * When given a `watch` pattern, every chunk is tested against it as it arrives,
 * including the ones past the cap.
 */
export class BoundedOutput {
  private readonly chunks: Buffer[] = [];
  private kept = 0;
  private total = 0;
  private window = '';
  private matched = false;

  constructor(
    private readonly maxBytes: number,
    private readonly watch?: RegExp,
  ) {}

  push(chunk: Buffer): void {
    this.total += chunk.length;
    if (this.watch && !this.matched) {
      const text = this.window + chunk.toString('utf8');
      this.matched = this.watch.test(text);
      this.window = text.slice(-WATCH_OVERLAP);
    }

    const room = this.maxBytes - this.kept;
    if (room <= 0) return;
    const slice = chunk.length > room ? chunk.subarray(0, room) : chunk;
    this.chunks.push(slice);
    this.kept += slice.length;
  }

  get truncated(): boolean {
    return this.total > this.maxBytes;
  }

  /** Whether the watch pattern appeared anywhere in the stream */
  get sawWatched(): boolean {
    return this.matched;
  }

  text(): string {
    const body = Buffer.concat(this.chunks, this.kept);
    if (!this.truncated) return body.toString('utf8');
    return `${body.subarray(0, characterBoundary(body)).toString('utf8')}${TRUNCATION_MARKER}`;
  }
}

/**
 * Length of the longest prefix of `buf` that does not end inside a UTF-8
 * sequence.
 */
export function characterBoundary(buf: Buffer): number {
  let start = buf.length - 1;
  while (start >= 0 && (buf[start] & 0xc0) === 0x80) start--;
  if (start < 0) return buf.length;

  const lead = buf[start];
  let width = 1;
  if ((lead & 0xe0) === 0xc0) width = 2;
  else if ((lead & 0xf0) === 0xe0) width = 3;
  else if ((lead & 0xf8) === 0xf0) width = 4;

  return buf.length - start < width ? start : buf.length;
}
