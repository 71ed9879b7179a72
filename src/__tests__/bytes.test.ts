import { describe, expect, it } from "vitest";
import {
  ByteReader,
  checksum,
  clampInt,
  encodeVlq,
  i14FromTwosComplement,
  iToU14,
  iToU7,
  pushAscii,
  pushU21,
  pushU32,
  readU24,
  readVlq,
  toI14,
  toU14,
} from "../bytes";
import { MidiParseError, undefinedSystemCommonMessage } from "../errors";

describe("variable-length quantities", () => {
  it("encodes 0x200000 as four bytes", () => {
    expect(encodeVlq(0x200000)).toEqual([0x81, 0x80, 0x80, 0x00]);
    expect(readVlq([0x81, 0x80, 0x80, 0x00])).toEqual({ value: 0x200000, length: 4 });
  });

  it("encodes the boundaries of each width", () => {
    expect(encodeVlq(0)).toEqual([0x00]);
    expect(encodeVlq(0x7f)).toEqual([0x7f]);
    expect(encodeVlq(0x80)).toEqual([0x81, 0x00]);
    expect(encodeVlq(0x0fffffff)).toEqual([0xff, 0xff, 0xff, 0x7f]);
  });

  it("clamps values beyond 28 bits", () => {
    expect(encodeVlq(0x10000000)).toEqual([0xff, 0xff, 0xff, 0x7f]);
    expect(encodeVlq(-5)).toEqual([0x00]);
  });

  it("reads from an offset", () => {
    expect(readVlq([0xff, 0x83, 0x00], 1)).toEqual({ value: 0x180, length: 2 });
  });

  it("rejects a fifth continuation byte", () => {
    expect(() => readVlq([0x80, 0x80, 0x80, 0x80, 0x00])).toThrow(
      "A variable-length quantity exceeded four bytes",
    );
  });

  it("reports truncated input", () => {
    expect(() => readVlq([0x81])).toThrow(MidiParseError);
  });
});

describe("fixed-width values", () => {
  it("clamps and truncates", () => {
    expect(clampInt(Number.NaN, 0, 5)).toBe(0);
    expect(clampInt(3.7, 0, 5)).toBe(3);
    expect(clampInt(9, 0, 5)).toBe(5);
    expect(iToU7(-64)).toBe(0);
    expect(iToU7(100)).toBe(127);
  });

  it("splits 14-bit values", () => {
    expect(toU14(1000)).toEqual([0x07, 0x68]);
    expect(toU14(0x4000)).toEqual([0x7f, 0x7f]);
    expect(iToU14(0)).toEqual([0x40, 0x00]);
    expect(toI14(-1)).toEqual([0x7f, 0x7f]);
    expect(i14FromTwosComplement(0x40, 0x00)).toBe(-8192);
  });

  it("writes septets least significant first", () => {
    const out: number[] = [];
    pushU21(16384, out);
    expect(out).toEqual([0x00, 0x00, 0x01]);
  });

  it("writes and reads big-endian values", () => {
    const out: number[] = [];
    pushU32(0x01020304, out);
    expect(out).toEqual([0x01, 0x02, 0x03, 0x04]);
    expect(readU24([0x07, 0xa1, 0x20], 0)).toBe(500000);
  });

  it("pads ascii text with spaces", () => {
    const out: number[] = [];
    pushAscii("ab", 4, out);
    expect(out).toEqual([0x61, 0x62, 0x20, 0x20]);
  });

  it("XORs bytes for checksums", () => {
    expect(checksum([0x7e, 0x7f, 0x02])).toBe(0x03);
    expect(checksum([0x7e, 0x7f, 0x02], 1)).toBe(0x7d);
  });
});

describe("ByteReader", () => {
  it("reads 14-bit values in both byte orders", () => {
    expect(new ByteReader([0x10, 0x20]).u14()).toBe(4112);
    expect(new ByteReader([0x20, 0x10]).u14Msb()).toBe(4112);
    expect(new ByteReader([0x00, 0x00, 0x01]).u21()).toBe(16384);
  });

  it("stops at its end bound", () => {
    const reader = new ByteReader([0x01, 0x02, 0x03], 1, 2);
    expect(reader.remaining).toBe(1);
    expect(reader.u7()).toBe(0x02);
    expect(() => reader.u7()).toThrow("The input ended before a MIDI message could be fully formed");
  });

  it("rejects bytes with the top bit set", () => {
    expect(() => new ByteReader([0x80]).u7()).toThrow("A data byte exceeded 7 bits");
  });
});

describe("MidiParseError", () => {
  it("prefixes every message and names the offending byte", () => {
    const err = undefinedSystemCommonMessage(0xf4);
    expect(err).toBeInstanceOf(RangeError);
    expect(err.kind).toBe("undefinedSystemCommonMessage");
    expect(err.message).toBe("Error parsing MIDI input: Encountered undefined System Common message 0xF4");
  });
});
