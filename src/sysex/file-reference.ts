import { ByteReader, i14FromU7s, iToU14, pushU14, toU7 } from "../bytes";
import { invalid } from "../errors";

export type FileReferenceType = "dls" | "sf2" | "wav";

/** Maps a bank/program of a DLS or SF2 file onto a destination bank/program. */
export interface SoundFileMap {
  dstBank: number;
  dstProg: number;
  srcBank: number;
  srcProg: number;
  srcDrum: boolean;
  dstDrum: boolean;
  volume: number;
}

/** Places a WAV file on a key range of a destination bank/program. */
export interface WavMap {
  dstBank: number;
  dstProg: number;
  baseKey: number;
  loKey: number;
  hiKey: number;
  /** Fine tuning, signed 14-bit. */
  fine: number;
  volume: number;
}

export type SelectMap =
  | { kind: "soundFile"; maps: SoundFileMap[] }
  | { kind: "wav"; map: WavMap }
  | { kind: "soundFileBankOffset"; bankOffset: number; srcDrum: boolean; dstDrum: boolean }
  | { kind: "wavBankOffset"; map: WavMap; bankOffset: number; srcDrum: boolean; dstDrum: boolean };

export type FileReferenceMsg =
  | { kind: "open"; ctx: number; fileType: FileReferenceType; url: string }
  | { kind: "selectContents"; ctx: number; map: SelectMap }
  | { kind: "openSelectContents"; ctx: number; fileType: FileReferenceType; url: string; map: SelectMap }
  | { kind: "close"; ctx: number };

export const SUB_ID_FILE_REFERENCE = 0x0b;
const OPEN = 0x01;
const SELECT_CONTENTS = 0x02;
const OPEN_SELECT_CONTENTS = 0x03;
const CLOSE = 0x04;

const MAX_URL_LENGTH = 260;
const SOUND_FILE_MAP_LENGTH = 8;
const WAV_MAP_LENGTH = 9;
const BANK_OFFSET_HEADER = [0x00, 0x00, 0x01, 0x03];
const BANK_OFFSET_LENGTH = 7;
const FLAG_SRC_DRUM = 0x01;
const FLAG_DST_DRUM = 0x02;

const FILE_TYPE_TAGS: Record<FileReferenceType, string> = { dls: "DLS ", sf2: "SF2 ", wav: "WAV " };

export function soundFileMap(partial: Partial<SoundFileMap>): SoundFileMap {
  return { dstBank: 0, dstProg: 0, srcBank: 0, srcProg: 0, srcDrum: false, dstDrum: false, volume: 0x7f, ...partial };
}

export function wavMap(partial: Partial<WavMap>): WavMap {
  return { dstBank: 0, dstProg: 0, baseKey: 60, loKey: 0, hiKey: 0x7f, fine: 0, volume: 0x7f, ...partial };
}

function drumFlags(srcDrum: boolean, dstDrum: boolean): number {
  return (srcDrum ? FLAG_SRC_DRUM : 0) | (dstDrum ? FLAG_DST_DRUM : 0);
}

function pushSoundFileMap(map: SoundFileMap, out: number[]): void {
  pushU14(map.dstBank, out);
  out.push(toU7(map.dstProg));
  pushU14(map.srcBank, out);
  out.push(toU7(map.srcProg), drumFlags(map.srcDrum, map.dstDrum), toU7(map.volume));
}

function readSoundFileMap(reader: ByteReader): SoundFileMap {
  const dstBank = reader.u14();
  const dstProg = reader.u7();
  const srcBank = reader.u14();
  const srcProg = reader.u7();
  const flags = reader.u7();
  return {
    dstBank,
    dstProg,
    srcBank,
    srcProg,
    srcDrum: (flags & FLAG_SRC_DRUM) !== 0,
    dstDrum: (flags & FLAG_DST_DRUM) !== 0,
    volume: reader.u7(),
  };
}

function pushWavMap(map: WavMap, out: number[]): void {
  pushU14(map.dstBank, out);
  out.push(toU7(map.dstProg), toU7(map.baseKey), toU7(map.loKey), toU7(map.hiKey));
  const [msb, lsb] = iToU14(map.fine);
  out.push(lsb, msb, toU7(map.volume));
}

function readWavMap(reader: ByteReader): WavMap {
  const dstBank = reader.u14();
  const dstProg = reader.u7();
  const baseKey = reader.u7();
  const loKey = reader.u7();
  const hiKey = reader.u7();
  const lsb = reader.u7();
  const fine = i14FromU7s(reader.u7(), lsb);
  return { dstBank, dstProg, baseKey, loKey, hiKey, fine, volume: reader.u7() };
}

function pushBankOffset(bankOffset: number, srcDrum: boolean, dstDrum: boolean, out: number[]): void {
  out.push(...BANK_OFFSET_HEADER);
  pushU14(bankOffset, out);
  out.push(drumFlags(srcDrum, dstDrum));
}

export function encodeSelectMap(map: SelectMap): number[] {
  const out: number[] = [];
  switch (map.kind) {
    case "soundFile": {
      const maps = map.maps.slice(0, 127);
      out.push(maps.length);
      maps.forEach(m => pushSoundFileMap(m, out));
      break;
    }
    case "wav":
      pushWavMap(map.map, out);
      break;
    case "soundFileBankOffset":
      pushBankOffset(map.bankOffset, map.srcDrum, map.dstDrum, out);
      break;
    case "wavBankOffset":
      pushWavMap(map.map, out);
      pushBankOffset(map.bankOffset, map.srcDrum, map.dstDrum, out);
      break;
  }
  return out;
}

function hasBankOffsetHeader(bytes: number[], at: number): boolean {
  return BANK_OFFSET_HEADER.every((b, i) => bytes[at + i] === b);
}

/**
 * The map form is not tagged on the wire: it is recognised by its length, then by the
 * bank offset header, then by whether the leading count matches a list of sound file maps.
 */
export function decodeSelectMap(bytes: number[]): SelectMap {
  const reader = new ByteReader(bytes);
  if (bytes.length === BANK_OFFSET_LENGTH && hasBankOffsetHeader(bytes, 0)) {
    reader.take(BANK_OFFSET_HEADER.length);
    const bankOffset = reader.u14();
    const flags = reader.u7();
    return { kind: "soundFileBankOffset", bankOffset, srcDrum: (flags & FLAG_SRC_DRUM) !== 0, dstDrum: (flags & FLAG_DST_DRUM) !== 0 };
  }
  if (bytes.length === WAV_MAP_LENGTH + BANK_OFFSET_LENGTH && hasBankOffsetHeader(bytes, WAV_MAP_LENGTH)) {
    const map = readWavMap(reader);
    reader.take(BANK_OFFSET_HEADER.length);
    const bankOffset = reader.u14();
    const flags = reader.u7();
    return { kind: "wavBankOffset", map, bankOffset, srcDrum: (flags & FLAG_SRC_DRUM) !== 0, dstDrum: (flags & FLAG_DST_DRUM) !== 0 };
  }
  if (bytes.length > 0 && bytes.length === 1 + bytes[0] * SOUND_FILE_MAP_LENGTH) {
    const count = reader.u7();
    const maps: SoundFileMap[] = [];
    for (let i = 0; i < count; i++) maps.push(readSoundFileMap(reader));
    return { kind: "soundFile", maps };
  }
  if (bytes.length === WAV_MAP_LENGTH) return { kind: "wav", map: readWavMap(reader) };
  throw invalid("Unrecognised file reference select map");
}

function pushFileTypeAndUrl(fileType: FileReferenceType, url: string, out: number[]): void {
  const tag = FILE_TYPE_TAGS[fileType];
  for (let i = 0; i < tag.length; i++) out.push(tag.charCodeAt(i));
  const text = url.slice(0, MAX_URL_LENGTH);
  for (let i = 0; i < text.length; i++) out.push(text.charCodeAt(i) & 0x7f);
  out.push(0x00);
}

function urlBlockLength(url: string): number {
  return 4 + Math.min(url.length, MAX_URL_LENGTH) + 1;
}

export function pushFileReference(msg: FileReferenceMsg, out: number[]): void {
  switch (msg.kind) {
    case "open":
      out.push(SUB_ID_FILE_REFERENCE, OPEN);
      pushU14(msg.ctx, out);
      pushU14(urlBlockLength(msg.url), out);
      pushFileTypeAndUrl(msg.fileType, msg.url, out);
      return;
    case "selectContents": {
      const map = encodeSelectMap(msg.map);
      out.push(SUB_ID_FILE_REFERENCE, SELECT_CONTENTS);
      pushU14(msg.ctx, out);
      pushU14(map.length, out);
      out.push(...map);
      return;
    }
    case "openSelectContents": {
      const map = encodeSelectMap(msg.map);
      out.push(SUB_ID_FILE_REFERENCE, OPEN_SELECT_CONTENTS);
      pushU14(msg.ctx, out);
      pushU14(urlBlockLength(msg.url) + map.length, out);
      pushFileTypeAndUrl(msg.fileType, msg.url, out);
      out.push(...map);
      return;
    }
    case "close":
      out.push(SUB_ID_FILE_REFERENCE, CLOSE);
      pushU14(msg.ctx, out);
      out.push(0x00, 0x00);
      return;
  }
}

function readFileType(reader: ByteReader): FileReferenceType {
  const tag = reader.ascii(4);
  if (tag === FILE_TYPE_TAGS.dls) return "dls";
  if (tag === FILE_TYPE_TAGS.sf2) return "sf2";
  if (tag === FILE_TYPE_TAGS.wav) return "wav";
  throw invalid(`Unknown file reference type "${tag}"`);
}

function readUrl(reader: ByteReader): string {
  let url = "";
  for (let byte = reader.u7(); byte !== 0x00; byte = reader.u7()) url += String.fromCharCode(byte);
  return url;
}

export function readFileReference(reader: ByteReader, subId: number): FileReferenceMsg {
  const ctx = reader.u14();
  switch (subId) {
    case OPEN: {
      reader.u14();
      const fileType = readFileType(reader);
      return { kind: "open", ctx, fileType, url: readUrl(reader) };
    }
    case SELECT_CONTENTS: {
      const length = reader.u14();
      return { kind: "selectContents", ctx, map: decodeSelectMap(reader.take(length)) };
    }
    case OPEN_SELECT_CONTENTS: {
      const length = reader.u14();
      const fileType = readFileType(reader);
      const url = readUrl(reader);
      const mapLength = length - urlBlockLength(url);
      if (mapLength < 0) throw invalid("File reference length is shorter than its URL");
      return { kind: "openSelectContents", ctx, fileType, url, map: decodeSelectMap(reader.take(mapLength)) };
    }
    case CLOSE:
      reader.take(2);
      return { kind: "close", ctx };
    default:
      throw invalid(`Unknown file reference message 0x${subId.toString(16)}`);
  }
}
