/**
 * @module codec/bytes
 * @description Cursor-based byte reader/writer used by every codec.
 *
 * Endianness is chosen per call, never globally: companion-protocol fields
 * are little-endian, LPP sub-fields are big-endian.
 */

const utf8Decoder = new TextDecoder("utf-8");
const strictUtf8Decoder = new TextDecoder("utf-8", { fatal: true });
const utf8Encoder = new TextEncoder();

/**
 * Sequential reader over a Uint8Array. Out-of-range reads throw RangeError
 * (from DataView); callers check `remaining` first or catch at the frame
 * boundary.
 */
export class ByteReader {
  private readonly view: DataView;
  private offset = 0;

  constructor(private readonly data: Uint8Array) {
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.data.length - this.offset;
  }

  skip(count: number): this {
    this.ensure(count);
    this.offset += count;
    return this;
  }

  u8(): number {
    const v = this.view.getUint8(this.offset);
    this.offset += 1;
    return v;
  }

  i8(): number {
    const v = this.view.getInt8(this.offset);
    this.offset += 1;
    return v;
  }

  u16le(): number {
    const v = this.view.getUint16(this.offset, true);
    this.offset += 2;
    return v;
  }

  i16le(): number {
    const v = this.view.getInt16(this.offset, true);
    this.offset += 2;
    return v;
  }

  u32le(): number {
    const v = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return v;
  }

  i32le(): number {
    const v = this.view.getInt32(this.offset, true);
    this.offset += 4;
    return v;
  }

  u16be(): number {
    const v = this.view.getUint16(this.offset, false);
    this.offset += 2;
    return v;
  }

  i16be(): number {
    const v = this.view.getInt16(this.offset, false);
    this.offset += 2;
    return v;
  }

  /** Signed 24-bit big-endian, sign-extended from bit 23. */
  i24be(): number {
    const hi = this.view.getUint16(this.offset, false);
    const lo = this.view.getUint8(this.offset + 2);
    this.offset += 3;
    const v = hi * 0x100 + lo;
    return v & 0x800000 ? v - 0x1000000 : v;
  }

  u32be(): number {
    const v = this.view.getUint32(this.offset, false);
    this.offset += 4;
    return v;
  }

  i32be(): number {
    const v = this.view.getInt32(this.offset, false);
    this.offset += 4;
    return v;
  }

  bytes(count: number): Uint8Array {
    this.ensure(count);
    const out = this.data.slice(this.offset, this.offset + count);
    this.offset += count;
    return out;
  }

  rest(): Uint8Array {
    const out = this.data.slice(this.offset);
    this.offset = this.data.length;
    return out;
  }

  /** Fixed-width, NUL-padded UTF-8 field. */
  cString(width: number): string {
    return decodeCString(this.bytes(width));
  }

  private ensure(count: number): void {
    if (count < 0 || this.offset + count > this.data.length) {
      throw new RangeError(
        `Read of ${count} bytes at offset ${this.offset} exceeds ${this.data.length}`
      );
    }
  }
}

/**
 * Growable writer. Integer writers truncate to the field width the way a
 * fixed-width C integer would.
 */
export class ByteWriter {
  private readonly chunks: number[] = [];

  get length(): number {
    return this.chunks.length;
  }

  u8(value: number): this {
    this.chunks.push(value & 0xff);
    return this;
  }

  u16le(value: number): this {
    return this.u8(value).u8(value >>> 8);
  }

  u32le(value: number): this {
    return this.u8(value).u8(value >>> 8).u8(value >>> 16).u8(value >>> 24);
  }

  i32le(value: number): this {
    return this.u32le(value | 0);
  }

  u16be(value: number): this {
    return this.u8(value >>> 8).u8(value);
  }

  u24be(value: number): this {
    return this.u8(value >>> 16).u8(value >>> 8).u8(value);
  }

  u32be(value: number): this {
    return this.u8(value >>> 24).u8(value >>> 16).u8(value >>> 8).u8(value);
  }

  bytes(data: Uint8Array): this {
    for (const b of data) this.chunks.push(b);
    return this;
  }

  utf8(text: string): this {
    return this.bytes(utf8Encoder.encode(text));
  }

  /** Writes `data` truncated or zero-padded to exactly `width` bytes. */
  fixed(data: Uint8Array, width: number): this {
    for (let i = 0; i < width; i++) this.chunks.push(data[i] ?? 0);
    return this;
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.chunks);
  }
}

// ─── String helpers ────────────────────────────────────────────────

export function encodeUtf8(text: string): Uint8Array {
  return utf8Encoder.encode(text);
}

/** Lossy UTF-8 decode (invalid sequences become U+FFFD). */
export function decodeUtf8(data: Uint8Array): string {
  return utf8Decoder.decode(data);
}

/** Strict UTF-8 decode. Returns null on invalid input. */
export function tryDecodeUtf8(data: Uint8Array): string | null {
  try {
    return strictUtf8Decoder.decode(data);
  } catch {
    return null;
  }
}

/** Decodes up to the first NUL and strips control characters at the ends. */
export function decodeCString(data: Uint8Array): string {
  const end = data.indexOf(0);
  const text = decodeUtf8(end === -1 ? data : data.subarray(0, end));
  return text.replace(/^[\x00-\x1f\x7f]+|[\x00-\x1f\x7f]+$/g, "");
}

// ─── Hex helpers ───────────────────────────────────────────────────

export function toHex(data: Uint8Array): string {
  let out = "";
  for (const b of data) out += b.toString(16).padStart(2, "0");
  return out;
}

/** Parses lowercase or uppercase hex. Returns null for odd length or bad digits. */
export function fromHex(hex: string): Uint8Array | null {
  if (hex.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(hex)) return null;
  const out = new Uint8Array(hex.length / 2);
  for (let i = 0; i < out.length; i++) {
    out[i] = parseInt(hex.slice(i * 2, i * 2 + 2), 16);
  }
  return out;
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

export function startsWith(data: Uint8Array, prefix: Uint8Array): boolean {
  if (prefix.length > data.length) return false;
  for (let i = 0; i < prefix.length; i++) {
    if (data[i] !== prefix[i]) return false;
  }
  return true;
}
