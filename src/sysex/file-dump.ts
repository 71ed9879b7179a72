import { ByteReader, clampInt, pushAscii, pushU28, toU7 } from "../bytes";
import { invalid } from "../errors";

export type KnownFileType = "midi" | "miex" | "eseq" | "text" | "binary" | "macintosh";

export type FileType = KnownFileType | { custom: string };

export interface FileDumpHeader {
  senderDevice: number;
  fileType: FileType;
  /** Unencoded file length in bytes. */
  length: number;
  name: string;
}

export interface FileDumpPacket {
  runningCount: number;
  /** Up to 112 bytes of 8-bit data. */
  data: number[];
}

export interface FileDumpRequest {
  requesterDevice: number;
  fileType: FileType;
  name: string;
}

export const SUB_ID_FILE_DUMP = 0x07;
export const FILE_DUMP_HEADER = 0x01;
export const FILE_DUMP_DATA_PACKET = 0x02;
export const FILE_DUMP_REQUEST = 0x03;

export const MAX_FILE_DUMP_PACKET_DATA = 112;

const FILE_TYPE_TAGS: Record<KnownFileType, string> = {
  midi: "MIDI",
  miex: "MIEX",
  eseq: "ESEQ",
  text: "TEXT",
  binary: "BIN ",
  macintosh: "MAC ",
};

function pushFileType(fileType: FileType, out: number[]): void {
  pushAscii(typeof fileType === "string" ? FILE_TYPE_TAGS[fileType] : fileType.custom, 4, out);
}

function readFileType(reader: ByteReader): FileType {
  const tag = reader.ascii(4);
  for (const [fileType, known] of Object.entries(FILE_TYPE_TAGS)) {
    if (known === tag && isKnownFileType(fileType)) return fileType;
  }
  return { custom: tag };
}

function isKnownFileType(name: string): name is KnownFileType {
  return Object.prototype.hasOwnProperty.call(FILE_TYPE_TAGS, name);
}

function pushText(text: string, out: number[]): void {
  for (let i = 0; i < text.length; i++) out.push(text.charCodeAt(i) & 0x7f);
}

/**
 * Packs 8-bit data into groups of one high-bit byte and up to seven 7-bit bytes.
 * Bit 6 of the high-bit byte holds the top bit of the group's first byte, bit 5 the second's.
 */
export function encodeFileDumpData(data: number[]): number[] {
  const out: number[] = [];
  for (let start = 0; start < data.length; start += 7) {
    const group = data.slice(start, start + 7).map(b => clampInt(b, 0, 0xff));
    let highBits = 0;
    group.forEach((b, i) => {
      highBits |= (b >> 7) << (6 - i);
    });
    out.push(highBits, ...group.map(b => b & 0x7f));
  }
  return out;
}

export function decodeFileDumpData(encoded: number[]): number[] {
  const out: number[] = [];
  for (let start = 0; start < encoded.length; start += 8) {
    const highBits = encoded[start];
    const group = encoded.slice(start + 1, start + 8);
    group.forEach((b, i) => out.push(b | (((highBits >> (6 - i)) & 0x1) << 7)));
  }
  return out;
}

export function pushFileDumpHeader(header: FileDumpHeader, out: number[]): void {
  out.push(SUB_ID_FILE_DUMP, FILE_DUMP_HEADER, toU7(header.senderDevice));
  pushFileType(header.fileType, out);
  pushU28(header.length, out);
  pushText(header.name, out);
}

export function readFileDumpHeader(reader: ByteReader): FileDumpHeader {
  const senderDevice = reader.u7();
  const fileType = readFileType(reader);
  const length = reader.u28();
  return { senderDevice, fileType, length, name: reader.ascii(reader.remaining) };
}

/** Ends with a checksum placeholder. */
export function pushFileDumpPacket(packet: FileDumpPacket, out: number[]): void {
  const encoded = encodeFileDumpData(packet.data.slice(0, MAX_FILE_DUMP_PACKET_DATA));
  out.push(SUB_ID_FILE_DUMP, FILE_DUMP_DATA_PACKET, toU7(packet.runningCount), Math.max(0, encoded.length - 1));
  out.push(...encoded, 0);
}

export function readFileDumpPacket(reader: ByteReader): FileDumpPacket {
  const runningCount = reader.u7();
  const length = reader.u7() + 1;
  if (reader.remaining === 0 && length === 1) return { runningCount, data: [] };
  if (reader.remaining !== length) throw invalid("File dump packet length does not match its data");
  return { runningCount, data: decodeFileDumpData(reader.rest()) };
}

export function pushFileDumpRequest(request: FileDumpRequest, out: number[]): void {
  out.push(SUB_ID_FILE_DUMP, FILE_DUMP_REQUEST, toU7(request.requesterDevice));
  pushFileType(request.fileType, out);
  pushText(request.name, out);
}

export function readFileDumpRequest(reader: ByteReader): FileDumpRequest {
  const requesterDevice = reader.u7();
  const fileType = readFileType(reader);
  return { requesterDevice, fileType, name: reader.ascii(reader.remaining) };
}
