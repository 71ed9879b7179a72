import { byteOverflow, unexpectedEnd, vlqOverflow } from "./errors";

export const U7_MAX = 0x7f;
export const U14_MAX = 0x3fff;
export const U21_MAX = 0x1fffff;
export const U28_MAX = 0xfffffff;
export const U35_MAX = 0x7ffffffff;
export const VLQ_MAX = 0x0fffffff;

/** Truncates to an integer and clamps into [min, max]. NaN becomes `min`. */
export function clampInt(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  const v = Math.trunc(value);
  if (v < min) return min;
  if (v > max) return max;
  return v;
}

export function toU7(value: number): number {
  return clampInt(value, 0, U7_MAX);
}

/** Signed 7-bit value in [-64, 63], biased by 64. */
export function iToU7(value: number): number {
  return clampInt(value, -64, 63) + 64;
}

export function u7ToI(byte: number): number {
  return byte - 64;
}

export function boolToU7(on: boolean): number {
  return on ? 0x7f : 0x00;
}

export function boolFromU7(byte: number): boolean {
  return byte >= 0x40;
}

/** Returns `[msb, lsb]`. */
export function toU14(value: number): [number, number] {
  const v = clampInt(value, 0, U14_MAX);
  return [v >> 7, v & 0x7f];
}

/** Signed 14-bit value in [-8192, 8191], biased by 8192. Returns `[msb, lsb]`. */
export function iToU14(value: number): [number, number] {
  return toU14(clampInt(value, -8192, 8191) + 8192);
}

export function pushU14(value: number, out: number[]): void {
  const [msb, lsb] = toU14(value);
  out.push(lsb, msb);
}

export function u14FromU7s(msb: number, lsb: number): number {
  return ((msb & 0x7f) << 7) | (lsb & 0x7f);
}

export function i14FromU7s(msb: number, lsb: number): number {
  return u14FromU7s(msb, lsb) - 8192;
}

export function replaceU14Lsb(value: number, lsb: number): number {
  return (value & 0x3f80) | (lsb & 0x7f);
}

/** 14-bit two's complement, clamped to [-8192, 8191]. Returns `[msb, lsb]`. */
export function toI14(value: number): [number, number] {
  const v = clampInt(value, -8192, 8191);
  const u = v < 0 ? v + 0x4000 : v;
  return [u >> 7, u & 0x7f];
}

export function pushI14(value: number, out: number[]): void {
  const [msb, lsb] = toI14(value);
  out.push(lsb, msb);
}

export function i14FromTwosComplement(msb: number, lsb: number): number {
  const u = u14FromU7s(msb, lsb);
  return u >= 0x2000 ? u - 0x4000 : u;
}

function pushSeptets(value: number, count: number, max: number, out: number[]): void {
  let v = clampInt(value, 0, max);
  for (let i = 0; i < count; i++) {
    out.push(v % 128);
    v = Math.floor(v / 128);
  }
}

export function pushU21(value: number, out: number[]): void {
  pushSeptets(value, 3, U21_MAX, out);
}

export function pushU28(value: number, out: number[]): void {
  pushSeptets(value, 4, U28_MAX, out);
}

export function pushU35(value: number, out: number[]): void {
  pushSeptets(value, 5, U35_MAX, out);
}

export function decodeU7(byte: number): number {
  if (byte > U7_MAX) throw byteOverflow();
  return byte;
}

/** Reads a data byte, rejecting exhausted input and bytes with the top bit set. */
export function readU7(bytes: ArrayLike<number>, offset: number): number {
  if (offset >= bytes.length) throw unexpectedEnd();
  return decodeU7(bytes[offset]);
}

export function encodeVlq(value: number): number[] {
  let v = clampInt(value, 0, VLQ_MAX);
  const out = [v & 0x7f];
  v >>>= 7;
  while (v > 0) {
    out.unshift((v & 0x7f) | 0x80);
    v >>>= 7;
  }
  return out;
}

export function pushVlq(value: number, out: number[]): void {
  out.push(...encodeVlq(value));
}

export interface VlqRead {
  value: number;
  length: number;
}

export function readVlq(bytes: ArrayLike<number>, offset = 0): VlqRead {
  let value = 0;
  for (let i = 0; i < 4; i++) {
    if (offset + i >= bytes.length) throw unexpectedEnd();
    const b = bytes[offset + i];
    value = value * 128 + (b & 0x7f);
    if ((b & 0x80) === 0) return { value, length: i + 1 };
  }
  throw vlqOverflow();
}

export function sliceBytes(bytes: ArrayLike<number>, start: number, end = bytes.length): number[] {
  const out: number[] = [];
  for (let i = start; i < Math.min(end, bytes.length); i++) out.push(bytes[i]);
  return out;
}

/** XOR of every byte. */
export function checksum(bytes: ArrayLike<number>, start = 0, end = bytes.length): number {
  let sum = 0;
  for (let i = start; i < end; i++) sum ^= bytes[i];
  return sum;
}

export function pushU16(value: number, out: number[]): void {
  const v = clampInt(value, 0, 0xffff);
  out.push(v >> 8, v & 0xff);
}

export function pushU24(value: number, out: number[]): void {
  const v = clampInt(value, 0, 0xffffff);
  out.push((v >> 16) & 0xff, (v >> 8) & 0xff, v & 0xff);
}

export function pushU32(value: number, out: number[]): void {
  const v = clampInt(value, 0, 0xffffffff);
  out.push(Math.floor(v / 0x1000000) & 0xff, (v >> 16) & 0xff, (v >> 8) & 0xff, v & 0xff);
}

function readBigEndian(bytes: ArrayLike<number>, offset: number, count: number): number {
  if (offset + count > bytes.length) throw unexpectedEnd();
  let value = 0;
  for (let i = 0; i < count; i++) value = value * 256 + (bytes[offset + i] & 0xff);
  return value;
}

export function readU16(bytes: ArrayLike<number>, offset: number): number {
  return readBigEndian(bytes, offset, 2);
}

export function readU24(bytes: ArrayLike<number>, offset: number): number {
  return readBigEndian(bytes, offset, 3);
}

export function readU32(bytes: ArrayLike<number>, offset: number): number {
  return readBigEndian(bytes, offset, 4);
}

export function readAscii(bytes: ArrayLike<number>, offset: number, length: number): string {
  if (offset + length > bytes.length) throw unexpectedEnd();
  let s = "";
  for (let i = 0; i < length; i++) s += String.fromCharCode(bytes[offset + i] & 0x7f);
  return s;
}

/** Writes `text` as exactly `length` 7-bit characters, padding with spaces. */
export function pushAscii(text: string, length: number, out: number[]): void {
  for (let i = 0; i < length; i++) {
    out.push(i < text.length ? text.charCodeAt(i) & 0x7f : 0x20);
  }
}

export function centsToU14(cents: number): number {
  const c = Math.min(100, Math.max(0, cents));
  return Math.round((c / 100) * U14_MAX);
}

export function freqToMidiNoteFloat(freq: number): number {
  return 12 * Math.log2(freq / 440) + 69;
}

/** Splits a frequency into its semitone and the cents above it. */
export function freqToMidiNoteCents(freq: number): { note: number; cents: number } {
  const semitone = freqToMidiNoteFloat(freq);
  const note = Math.floor(semitone);
  return { note, cents: (semitone - note) * 100 };
}

/** Sequential reader over a message body. Every read validates 7-bit data. */
export class ByteReader {
  private readonly bytes: ArrayLike<number>;
  private position: number;
  private readonly end: number;

  constructor(bytes: ArrayLike<number>, offset = 0, end = bytes.length) {
    this.bytes = bytes;
    this.position = offset;
    this.end = end;
  }

  get offset(): number {
    return this.position;
  }

  get remaining(): number {
    return Math.max(0, this.end - this.position);
  }

  peek(): number | undefined {
    return this.position < this.end ? this.bytes[this.position] : undefined;
  }

  u7(): number {
    if (this.position >= this.end) throw unexpectedEnd();
    const value = readU7(this.bytes, this.position);
    this.position += 1;
    return value;
  }

  /** 14 bits, LSB first. */
  u14(): number {
    const lsb = this.u7();
    return u14FromU7s(this.u7(), lsb);
  }

  /** 14 bits, MSB first. */
  u14Msb(): number {
    const msb = this.u7();
    return u14FromU7s(msb, this.u7());
  }

  u21(): number {
    return this.septets(3);
  }

  u28(): number {
    return this.septets(4);
  }

  u35(): number {
    return this.septets(5);
  }

  take(count: number): number[] {
    if (count > this.remaining) throw unexpectedEnd();
    const out: number[] = [];
    for (let i = 0; i < count; i++) out.push(this.u7());
    return out;
  }

  rest(): number[] {
    return this.take(this.remaining);
  }

  ascii(count: number): string {
    return String.fromCharCode(...this.take(count));
  }

  private septets(count: number): number {
    const groups = this.take(count);
    let value = 0;
    for (let i = count - 1; i >= 0; i--) value = value * 128 + groups[i];
    return value;
  }
}
