import { ByteReader, clampInt, pushU14, pushU21, pushU28, pushU35, toU7 } from "../bytes";
import { invalid } from "../errors";

export type LoopType = "forward" | "biDirectional" | "off";

export type ExtendedLoopType =
  | "forward"
  | "biDirectional"
  | "forwardRelease"
  | "biDirectionalRelease"
  | "backward"
  | "backwardBiDirectional"
  | "backwardRelease"
  | "backwardBiDirectionalRelease"
  | "off";

export interface SampleDumpHeader {
  sampleNum: number;
  /** Bits per sample, 8 to 28. */
  format: number;
  /** Sample period in nanoseconds. */
  period: number;
  /** Length in words. */
  length: number;
  sustainLoopStart: number;
  sustainLoopEnd: number;
  loopType: LoopType;
}

export interface SampleDumpPacket {
  runningCount: number;
  /** 120 data bytes; shorter data is zero-padded. */
  data: number[];
}

export interface LoopPoint {
  sampleNum: number;
  loopNum: number;
  loopType: LoopType;
  start: number;
  end: number;
}

export interface LoopPointsRequest {
  sampleNum: number;
  loopNum: number | "all";
}

export interface ExtendedSampleDumpHeader {
  sampleNum: number;
  format: number;
  /** Samples per second; the fractional part travels as a 28-bit fraction. */
  sampleRate: number;
  length: number;
  sustainLoopStart: number;
  sustainLoopEnd: number;
  loopType: ExtendedLoopType;
  channels: number;
}

export interface ExtendedLoopPoint {
  sampleNum: number;
  loopNum: number;
  loopType: ExtendedLoopType;
  start: number;
  end: number;
}

export interface SampleName {
  sampleNum: number;
  name: string;
}

export const SUB_ID_SAMPLE_DUMP_HEADER = 0x01;
export const SUB_ID_SAMPLE_DATA_PACKET = 0x02;
export const SUB_ID_SAMPLE_DUMP_REQUEST = 0x03;
export const SUB_ID_SAMPLE_DUMP_EXTENSIONS = 0x05;
export const LOOP_POINT_TRANSMISSION = 0x01;
export const LOOP_POINTS_REQUEST = 0x02;
export const SAMPLE_NAME_TRANSMISSION = 0x03;
export const SAMPLE_NAME_REQUEST = 0x04;
export const EXTENDED_DUMP_HEADER = 0x05;
export const EXTENDED_LOOP_POINT_TRANSMISSION = 0x06;
export const EXTENDED_LOOP_POINTS_REQUEST = 0x07;

const PACKET_DATA_LENGTH = 120;
const ALL_LOOPS = 0x3fff;
const FRACTION_SCALE = 2 ** 28;

const LOOP_TYPES: Record<LoopType, number> = { forward: 0x00, biDirectional: 0x01, off: 0x7f };

const EXTENDED_LOOP_TYPES: Record<ExtendedLoopType, number> = {
  forward: 0x00,
  biDirectional: 0x01,
  forwardRelease: 0x02,
  biDirectionalRelease: 0x03,
  backward: 0x40,
  backwardBiDirectional: 0x41,
  backwardRelease: 0x42,
  backwardBiDirectionalRelease: 0x43,
  off: 0x7f,
};

function decodeLoopType(byte: number): LoopType {
  switch (byte) {
    case 0x00:
      return "forward";
    case 0x01:
      return "biDirectional";
    case 0x7f:
      return "off";
    default:
      throw invalid(`Unknown sample loop type ${byte}`);
  }
}

function decodeExtendedLoopType(byte: number): ExtendedLoopType {
  for (const [name, value] of Object.entries(EXTENDED_LOOP_TYPES)) {
    if (value === byte && isExtendedLoopType(name)) return name;
  }
  throw invalid(`Unknown sample loop type ${byte}`);
}

function isExtendedLoopType(name: string): name is ExtendedLoopType {
  return Object.prototype.hasOwnProperty.call(EXTENDED_LOOP_TYPES, name);
}

function pushLoopNumber(loopNum: number | "all", out: number[]): void {
  pushU14(loopNum === "all" ? ALL_LOOPS : clampInt(loopNum, 0, ALL_LOOPS - 1), out);
}

function readLoopNumber(reader: ByteReader): number | "all" {
  const loopNum = reader.u14();
  return loopNum === ALL_LOOPS ? "all" : loopNum;
}

export function pushSampleDumpHeader(header: SampleDumpHeader, out: number[]): void {
  out.push(SUB_ID_SAMPLE_DUMP_HEADER);
  pushU14(header.sampleNum, out);
  out.push(clampInt(header.format, 8, 28));
  pushU21(header.period, out);
  pushU21(header.length, out);
  pushU21(header.sustainLoopStart, out);
  pushU21(header.sustainLoopEnd, out);
  out.push(LOOP_TYPES[header.loopType]);
}

export function readSampleDumpHeader(reader: ByteReader): SampleDumpHeader {
  return {
    sampleNum: reader.u14(),
    format: reader.u7(),
    period: reader.u21(),
    length: reader.u21(),
    sustainLoopStart: reader.u21(),
    sustainLoopEnd: reader.u21(),
    loopType: decodeLoopType(reader.u7()),
  };
}

/** Ends with a checksum placeholder. */
export function pushSampleDumpPacket(packet: SampleDumpPacket, out: number[]): void {
  out.push(SUB_ID_SAMPLE_DATA_PACKET, toU7(packet.runningCount));
  for (let i = 0; i < PACKET_DATA_LENGTH; i++) out.push(toU7(packet.data[i] ?? 0));
  out.push(0);
}

export function readSampleDumpPacket(reader: ByteReader): SampleDumpPacket {
  const runningCount = reader.u7();
  if (reader.remaining !== PACKET_DATA_LENGTH) throw invalid("Sample dump packets carry 120 data bytes");
  return { runningCount, data: reader.rest() };
}

export function pushSampleDumpRequest(sampleNum: number, out: number[]): void {
  out.push(SUB_ID_SAMPLE_DUMP_REQUEST);
  pushU14(sampleNum, out);
}

export function pushLoopPoint(loop: LoopPoint, out: number[]): void {
  out.push(SUB_ID_SAMPLE_DUMP_EXTENSIONS, LOOP_POINT_TRANSMISSION);
  pushU14(loop.sampleNum, out);
  pushU14(loop.loopNum, out);
  out.push(LOOP_TYPES[loop.loopType]);
  pushU21(loop.start, out);
  pushU21(loop.end, out);
}

export function readLoopPoint(reader: ByteReader): LoopPoint {
  return {
    sampleNum: reader.u14(),
    loopNum: reader.u14(),
    loopType: decodeLoopType(reader.u7()),
    start: reader.u21(),
    end: reader.u21(),
  };
}

export function pushLoopPointsRequest(request: LoopPointsRequest, extended: boolean, out: number[]): void {
  out.push(SUB_ID_SAMPLE_DUMP_EXTENSIONS, extended ? EXTENDED_LOOP_POINTS_REQUEST : LOOP_POINTS_REQUEST);
  pushU14(request.sampleNum, out);
  pushLoopNumber(request.loopNum, out);
}

export function readLoopPointsRequest(reader: ByteReader): LoopPointsRequest {
  const sampleNum = reader.u14();
  return { sampleNum, loopNum: readLoopNumber(reader) };
}

export function pushSampleName(name: SampleName, out: number[]): void {
  const text = name.name.slice(0, 127);
  out.push(SUB_ID_SAMPLE_DUMP_EXTENSIONS, SAMPLE_NAME_TRANSMISSION);
  pushU14(name.sampleNum, out);
  // No language tag.
  out.push(0x00, text.length);
  for (let i = 0; i < text.length; i++) out.push(text.charCodeAt(i) & 0x7f);
}

export function readSampleName(reader: ByteReader): SampleName {
  const sampleNum = reader.u14();
  const tagLength = reader.u7();
  reader.take(tagLength);
  const length = reader.u7();
  return { sampleNum, name: reader.ascii(length) };
}

export function pushSampleNameRequest(sampleNum: number, out: number[]): void {
  out.push(SUB_ID_SAMPLE_DUMP_EXTENSIONS, SAMPLE_NAME_REQUEST);
  pushU14(sampleNum, out);
}

export function pushExtendedSampleDumpHeader(header: ExtendedSampleDumpHeader, out: number[]): void {
  const rate = Math.max(0, header.sampleRate);
  const integer = Math.floor(rate);
  out.push(SUB_ID_SAMPLE_DUMP_EXTENSIONS, EXTENDED_DUMP_HEADER);
  pushU14(header.sampleNum, out);
  out.push(clampInt(header.format, 8, 28));
  pushU28(integer, out);
  pushU28(Math.round((rate - integer) * FRACTION_SCALE), out);
  pushU35(header.length, out);
  pushU35(header.sustainLoopStart, out);
  pushU35(header.sustainLoopEnd, out);
  out.push(EXTENDED_LOOP_TYPES[header.loopType], toU7(header.channels));
}

export function readExtendedSampleDumpHeader(reader: ByteReader): ExtendedSampleDumpHeader {
  const sampleNum = reader.u14();
  const format = reader.u7();
  const integer = reader.u28();
  const fraction = reader.u28();
  return {
    sampleNum,
    format,
    sampleRate: integer + fraction / FRACTION_SCALE,
    length: reader.u35(),
    sustainLoopStart: reader.u35(),
    sustainLoopEnd: reader.u35(),
    loopType: decodeExtendedLoopType(reader.u7()),
    channels: reader.u7(),
  };
}

export function pushExtendedLoopPoint(loop: ExtendedLoopPoint, out: number[]): void {
  out.push(SUB_ID_SAMPLE_DUMP_EXTENSIONS, EXTENDED_LOOP_POINT_TRANSMISSION);
  pushU14(loop.sampleNum, out);
  pushU14(loop.loopNum, out);
  out.push(EXTENDED_LOOP_TYPES[loop.loopType]);
  pushU35(loop.start, out);
  pushU35(loop.end, out);
}

export function readExtendedLoopPoint(reader: ByteReader): ExtendedLoopPoint {
  return {
    sampleNum: reader.u14(),
    loopNum: reader.u14(),
    loopType: decodeExtendedLoopType(reader.u7()),
    start: reader.u35(),
    end: reader.u35(),
  };
}
