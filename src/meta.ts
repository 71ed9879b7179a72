import { clampInt, pushU16, pushU24, pushVlq, readU16, readU24, readVlq, sliceBytes } from "./bytes";
import { channelIndex } from "./channel-voice";
import { invalid, unexpectedEnd } from "./errors";
import { HighResTimeCode, highResTimeCodeBytes, readHighResTimeCode } from "./time-code";

export type TextMetaKind = "text" | "copyright" | "trackName" | "instrumentName" | "lyric" | "marker" | "cuePoint";

/** `denominator` is the note value itself (4 for a quarter); the file stores its log2. */
export interface FileTimeSignature {
  numerator: number;
  denominator: number;
  clocksPerClick: number;
  thirtySecondsPerQuarter: number;
}

/** `key` counts sharps (positive) or flats (negative), -7 to 7. */
export interface KeySignature {
  key: number;
  scale: "major" | "minor";
}

/** SMF meta events. Only found in track chunks; 0xFF on the wire is System Reset. */
export type Meta =
  | { kind: "sequenceNumber"; number: number }
  | { kind: TextMetaKind; text: string }
  | { kind: "channelPrefix"; channel: number }
  | { kind: "endOfTrack" }
  /** Microseconds per quarter note. */
  | { kind: "setTempo"; tempo: number }
  | { kind: "smpteOffset"; offset: HighResTimeCode }
  | { kind: "timeSignature"; signature: FileTimeSignature }
  | { kind: "keySignature"; signature: KeySignature }
  | { kind: "sequencerSpecific"; data: number[] }
  | { kind: "unknown"; metaType: number; data: number[] };

export const META_PREFIX = 0xff;

const TEXT_TYPES: Record<TextMetaKind, number> = {
  text: 0x01,
  copyright: 0x02,
  trackName: 0x03,
  instrumentName: 0x04,
  lyric: 0x05,
  marker: 0x06,
  cuePoint: 0x07,
};

const META_SEQUENCE_NUMBER = 0x00;
const META_CHANNEL_PREFIX = 0x20;
const META_END_OF_TRACK = 0x2f;
const META_SET_TEMPO = 0x51;
const META_SMPTE_OFFSET = 0x54;
const META_TIME_SIGNATURE = 0x58;
const META_KEY_SIGNATURE = 0x59;
const META_SEQUENCER_SPECIFIC = 0x7f;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function textKindForType(metaType: number): TextMetaKind | undefined {
  for (const [kind, value] of Object.entries(TEXT_TYPES)) {
    if (value === metaType && isTextMetaKind(kind)) return kind;
  }
  return undefined;
}

function isTextMetaKind(kind: string): kind is TextMetaKind {
  return Object.prototype.hasOwnProperty.call(TEXT_TYPES, kind);
}

function pushEvent(metaType: number, data: ArrayLike<number>, out: number[]): void {
  out.push(META_PREFIX, metaType);
  pushVlq(data.length, out);
  for (let i = 0; i < data.length; i++) out.push(data[i] & 0xff);
}

function denominatorPower(denominator: number): number {
  return clampInt(Math.round(Math.log2(Math.max(1, denominator))), 0, 0xff);
}

/** Appends `FF type length data`. */
export function pushMeta(meta: Meta, out: number[]): void {
  switch (meta.kind) {
    case "sequenceNumber": {
      const data: number[] = [];
      pushU16(meta.number, data);
      pushEvent(META_SEQUENCE_NUMBER, data, out);
      return;
    }
    case "text":
    case "copyright":
    case "trackName":
    case "instrumentName":
    case "lyric":
    case "marker":
    case "cuePoint":
      pushEvent(TEXT_TYPES[meta.kind], encoder.encode(meta.text), out);
      return;
    case "channelPrefix":
      pushEvent(META_CHANNEL_PREFIX, [channelIndex(meta.channel)], out);
      return;
    case "endOfTrack":
      pushEvent(META_END_OF_TRACK, [], out);
      return;
    case "setTempo": {
      const data: number[] = [];
      pushU24(meta.tempo, data);
      pushEvent(META_SET_TEMPO, data, out);
      return;
    }
    case "smpteOffset":
      pushEvent(META_SMPTE_OFFSET, highResTimeCodeBytes(meta.offset), out);
      return;
    case "timeSignature": {
      const s = meta.signature;
      pushEvent(
        META_TIME_SIGNATURE,
        [
          clampInt(s.numerator, 0, 0xff),
          denominatorPower(s.denominator),
          clampInt(s.clocksPerClick, 0, 0xff),
          clampInt(s.thirtySecondsPerQuarter, 0, 0xff),
        ],
        out,
      );
      return;
    }
    case "keySignature": {
      const key = clampInt(meta.signature.key, -7, 7);
      pushEvent(META_KEY_SIGNATURE, [key & 0xff, meta.signature.scale === "minor" ? 1 : 0], out);
      return;
    }
    case "sequencerSpecific":
      pushEvent(META_SEQUENCER_SPECIFIC, meta.data, out);
      return;
    case "unknown":
      pushEvent(clampInt(meta.metaType, 0, 0x7f), meta.data, out);
      return;
  }
}

function expectLength(metaType: number, data: number[], length: number): void {
  if (data.length !== length) {
    throw invalid(`Meta event 0x${metaType.toString(16).padStart(2, "0")} must carry ${length} data bytes`);
  }
}

/** Decodes the meta event starting with the 0xFF at `offset`. */
export function decodeMeta(bytes: ArrayLike<number>, offset = 0): { meta: Meta; consumed: number } {
  if (offset + 2 > bytes.length) throw unexpectedEnd();
  if (bytes[offset] !== META_PREFIX) throw invalid("Meta events start with 0xFF");
  const metaType = bytes[offset + 1];
  const length = readVlq(bytes, offset + 2);
  const start = offset + 2 + length.length;
  const end = start + length.value;
  if (end > bytes.length) throw unexpectedEnd();
  const data = sliceBytes(bytes, start, end);
  return { meta: decodeMetaData(metaType, data), consumed: end - offset };
}

function decodeMetaData(metaType: number, data: number[]): Meta {
  const text = textKindForType(metaType);
  if (text !== undefined) return { kind: text, text: decoder.decode(Uint8Array.from(data)) };
  switch (metaType) {
    case META_SEQUENCE_NUMBER:
      expectLength(metaType, data, 2);
      return { kind: "sequenceNumber", number: readU16(data, 0) };
    case META_CHANNEL_PREFIX:
      expectLength(metaType, data, 1);
      if (data[0] > 0x0f) throw invalid("Channel prefix must be 0 to 15");
      return { kind: "channelPrefix", channel: data[0] + 1 };
    case META_END_OF_TRACK:
      expectLength(metaType, data, 0);
      return { kind: "endOfTrack" };
    case META_SET_TEMPO:
      expectLength(metaType, data, 3);
      return { kind: "setTempo", tempo: readU24(data, 0) };
    case META_SMPTE_OFFSET:
      expectLength(metaType, data, 5);
      return { kind: "smpteOffset", offset: readHighResTimeCode(data, 0) };
    case META_TIME_SIGNATURE:
      expectLength(metaType, data, 4);
      return {
        kind: "timeSignature",
        signature: {
          numerator: data[0],
          denominator: 2 ** data[1],
          clocksPerClick: data[2],
          thirtySecondsPerQuarter: data[3],
        },
      };
    case META_KEY_SIGNATURE: {
      expectLength(metaType, data, 2);
      if (data[1] > 1) throw invalid("Key signature scale must be 0 (major) or 1 (minor)");
      const key = data[0] >= 0x80 ? data[0] - 0x100 : data[0];
      return { kind: "keySignature", signature: { key, scale: data[1] === 1 ? "minor" : "major" } };
    }
    case META_SEQUENCER_SPECIFIC:
      return { kind: "sequencerSpecific", data };
    default:
      return { kind: "unknown", metaType, data };
  }
}
