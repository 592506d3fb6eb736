/**
 * @module codec/framing
 * @description Length-prefixed framing for serial and TCP links.
 *
 * BLE delivers one frame per notification, but byte streams need a
 * delimiter: `'<' len:u16le payload` towards the radio and
 * `'>' len:u16le payload` back from it.
 */

/** `<`, host to radio. */
export const FRAME_MARKER_OUT = 0x3c;
/** `>`, radio to host. */
export const FRAME_MARKER_IN = 0x3e;
/** Larger declared lengths are treated as line noise. */
export const MAX_FRAME_LENGTH = 512;

export function frameOutbound(payload: Uint8Array): Uint8Array {
  if (payload.length > 0xffff) {
    throw new RangeError(`Frame of ${payload.length} bytes exceeds the length field`);
  }
  const out = new Uint8Array(payload.length + 3);
  out[0] = FRAME_MARKER_OUT;
  out[1] = payload.length & 0xff;
  out[2] = payload.length >>> 8;
  out.set(payload, 3);
  return out;
}

/**
 * Reassembles inbound frames from arbitrary chunks. Bytes before a marker
 * are discarded, as is a marker whose length is implausible.
 */
export class FrameAccumulator {
  private buffer = new Uint8Array(0);

  constructor(
    private readonly marker: number = FRAME_MARKER_IN,
    private readonly maxLength: number = MAX_FRAME_LENGTH
  ) {}

  /** Bytes held while waiting for the rest of a frame. */
  get pending(): number {
    return this.buffer.length;
  }

  push(chunk: Uint8Array): Uint8Array[] {
    const merged = new Uint8Array(this.buffer.length + chunk.length);
    merged.set(this.buffer, 0);
    merged.set(chunk, this.buffer.length);

    const frames: Uint8Array[] = [];
    let offset = 0;

    while (offset < merged.length) {
      const start = merged.indexOf(this.marker, offset);
      if (start === -1) {
        offset = merged.length;
        break;
      }
      if (merged.length - start < 3) {
        offset = start;
        break;
      }
      const length = (merged[start + 1] ?? 0) | ((merged[start + 2] ?? 0) << 8);
      if (length === 0 || length > this.maxLength) {
        offset = start + 1;
        continue;
      }
      if (merged.length - start - 3 < length) {
        offset = start;
        break;
      }
      frames.push(merged.slice(start + 3, start + 3 + length));
      offset = start + 3 + length;
    }

    this.buffer = merged.slice(offset);
    return frames;
  }

  reset(): void {
    this.buffer = new Uint8Array(0);
  }
}
