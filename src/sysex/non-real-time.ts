import { ByteReader, checksum, pushU14, toU7 } from "../bytes";
import { invalid, unexpectedEnd } from "../errors";
import { pushTimeCodeCueingSetup, readTimeCodeCueingSetup, SUB_ID_CUEING_SETUP, TimeCodeCueingSetup } from "./cueing";
import {
  FILE_DUMP_DATA_PACKET,
  FILE_DUMP_HEADER,
  FILE_DUMP_REQUEST,
  FileDumpHeader,
  FileDumpPacket,
  FileDumpRequest,
  pushFileDumpHeader,
  pushFileDumpPacket,
  pushFileDumpRequest,
  readFileDumpHeader,
  readFileDumpPacket,
  readFileDumpRequest,
  SUB_ID_FILE_DUMP,
} from "./file-dump";
import { FileReferenceMsg, pushFileReference, readFileReference, SUB_ID_FILE_REFERENCE } from "./file-reference";
import { ManufacturerId, pushManufacturerId, readManufacturerId } from "./ids";
import {
  EXTENDED_DUMP_HEADER,
  EXTENDED_LOOP_POINT_TRANSMISSION,
  EXTENDED_LOOP_POINTS_REQUEST,
  ExtendedLoopPoint,
  ExtendedSampleDumpHeader,
  LOOP_POINT_TRANSMISSION,
  LOOP_POINTS_REQUEST,
  LoopPoint,
  LoopPointsRequest,
  pushExtendedLoopPoint,
  pushExtendedSampleDumpHeader,
  pushLoopPoint,
  pushLoopPointsRequest,
  pushSampleDumpHeader,
  pushSampleDumpPacket,
  pushSampleDumpRequest,
  pushSampleName,
  pushSampleNameRequest,
  readExtendedLoopPoint,
  readExtendedSampleDumpHeader,
  readLoopPoint,
  readLoopPointsRequest,
  readSampleDumpHeader,
  readSampleDumpPacket,
  readSampleName,
  SAMPLE_NAME_REQUEST,
  SAMPLE_NAME_TRANSMISSION,
  SampleDumpHeader,
  SampleDumpPacket,
  SampleName,
  SUB_ID_SAMPLE_DATA_PACKET,
  SUB_ID_SAMPLE_DUMP_EXTENSIONS,
  SUB_ID_SAMPLE_DUMP_HEADER,
  SUB_ID_SAMPLE_DUMP_REQUEST,
} from "./sample-dump";
import {
  KEY_BASED_TUNING_DUMP,
  KEY_BASED_TUNING_DUMP_BANK,
  KeyBasedTuningDump,
  pushKeyBasedTuningDump,
  pushScaleTuning,
  pushScaleTuningDump,
  pushTuningBulkDumpRequest,
  pushTuningNoteChange,
  readKeyBasedTuningDump,
  readScaleTuning,
  readScaleTuningDump,
  readTuningBulkDumpRequest,
  readTuningNoteChange,
  SCALE_TUNING_1_BYTE,
  SCALE_TUNING_2_BYTE,
  SCALE_TUNING_DUMP_1_BYTE,
  SCALE_TUNING_DUMP_2_BYTE,
  ScaleTuning,
  ScaleTuningDump,
  SUB_ID_TUNING,
  TUNING_BULK_DUMP_REQUEST,
  TUNING_BULK_DUMP_REQUEST_BANK,
  TUNING_NOTE_CHANGE_BANK,
  TuningBulkDumpRequest,
  TuningNoteChange,
} from "./tuning";

export type GeneralMidiMode = "gm1" | "off" | "gm2";

export interface IdentityReply {
  id: ManufacturerId;
  family: number;
  familyMember: number;
  softwareRevision: [number, number, number, number];
}

/** Flow control for dumps; each names the packet it answers. */
export type HandshakeKind = "endOfFile" | "wait" | "cancel" | "nak" | "ack";

export type UniversalNonRealTimeMsg =
  | { kind: "sampleDumpHeader"; header: SampleDumpHeader }
  | { kind: "sampleDumpPacket"; packet: SampleDumpPacket }
  | { kind: "sampleDumpRequest"; sampleNum: number }
  | { kind: "loopPoint"; loop: LoopPoint }
  | { kind: "loopPointsRequest"; request: LoopPointsRequest }
  | { kind: "sampleName"; name: SampleName }
  | { kind: "sampleNameRequest"; sampleNum: number }
  | { kind: "extendedSampleDumpHeader"; header: ExtendedSampleDumpHeader }
  | { kind: "extendedLoopPoint"; loop: ExtendedLoopPoint }
  | { kind: "extendedLoopPointsRequest"; request: LoopPointsRequest }
  | { kind: "timeCodeCueingSetup"; cue: TimeCodeCueingSetup }
  | { kind: "identityRequest" }
  | { kind: "identityReply"; identity: IdentityReply }
  | { kind: "fileDumpHeader"; header: FileDumpHeader }
  | { kind: "fileDumpPacket"; packet: FileDumpPacket }
  | { kind: "fileDumpRequest"; request: FileDumpRequest }
  | { kind: "tuningBulkDumpRequest"; request: TuningBulkDumpRequest }
  | { kind: "keyBasedTuningDump"; dump: KeyBasedTuningDump }
  | { kind: "scaleTuningDump1Byte"; dump: ScaleTuningDump }
  | { kind: "scaleTuningDump2Byte"; dump: ScaleTuningDump }
  | { kind: "tuningNoteChange"; change: TuningNoteChange }
  | { kind: "scaleTuning1Byte"; tuning: ScaleTuning }
  | { kind: "scaleTuning2Byte"; tuning: ScaleTuning }
  | { kind: "generalMidi"; mode: GeneralMidiMode }
  | { kind: "fileReference"; msg: FileReferenceMsg }
  | { kind: HandshakeKind; packet: number };

const SUB_ID_GENERAL_INFORMATION = 0x06;
const IDENTITY_REQUEST = 0x01;
const IDENTITY_REPLY = 0x02;
const SUB_ID_GENERAL_MIDI = 0x09;

const GENERAL_MIDI_MODES: Record<GeneralMidiMode, number> = { gm1: 0x01, off: 0x02, gm2: 0x03 };

const HANDSHAKES: Record<HandshakeKind, number> = {
  endOfFile: 0x7b,
  wait: 0x7c,
  cancel: 0x7d,
  nak: 0x7e,
  ack: 0x7f,
};

function isHandshake(kind: string): kind is HandshakeKind {
  return Object.prototype.hasOwnProperty.call(HANDSHAKES, kind);
}

/** Messages whose last byte before F7 is a checksum. */
export function hasChecksum(msg: UniversalNonRealTimeMsg): boolean {
  switch (msg.kind) {
    case "sampleDumpPacket":
    case "fileDumpPacket":
    case "keyBasedTuningDump":
    case "scaleTuningDump1Byte":
    case "scaleTuningDump2Byte":
      return true;
    default:
      return false;
  }
}

function subIdsHaveChecksum(sub1: number, sub2: number | undefined): boolean {
  if (sub1 === SUB_ID_SAMPLE_DATA_PACKET) return true;
  if (sub1 === SUB_ID_FILE_DUMP) return sub2 === FILE_DUMP_DATA_PACKET;
  if (sub1 === SUB_ID_TUNING) {
    return (
      sub2 === KEY_BASED_TUNING_DUMP ||
      sub2 === KEY_BASED_TUNING_DUMP_BANK ||
      sub2 === SCALE_TUNING_DUMP_1_BYTE ||
      sub2 === SCALE_TUNING_DUMP_2_BYTE
    );
  }
  return false;
}

export function pushUniversalNonRealTime(msg: UniversalNonRealTimeMsg, out: number[]): void {
  switch (msg.kind) {
    case "sampleDumpHeader":
      pushSampleDumpHeader(msg.header, out);
      return;
    case "sampleDumpPacket":
      pushSampleDumpPacket(msg.packet, out);
      return;
    case "sampleDumpRequest":
      pushSampleDumpRequest(msg.sampleNum, out);
      return;
    case "loopPoint":
      pushLoopPoint(msg.loop, out);
      return;
    case "loopPointsRequest":
      pushLoopPointsRequest(msg.request, false, out);
      return;
    case "sampleName":
      pushSampleName(msg.name, out);
      return;
    case "sampleNameRequest":
      pushSampleNameRequest(msg.sampleNum, out);
      return;
    case "extendedSampleDumpHeader":
      pushExtendedSampleDumpHeader(msg.header, out);
      return;
    case "extendedLoopPoint":
      pushExtendedLoopPoint(msg.loop, out);
      return;
    case "extendedLoopPointsRequest":
      pushLoopPointsRequest(msg.request, true, out);
      return;
    case "timeCodeCueingSetup":
      pushTimeCodeCueingSetup(msg.cue, out);
      return;
    case "identityRequest":
      out.push(SUB_ID_GENERAL_INFORMATION, IDENTITY_REQUEST);
      return;
    case "identityReply": {
      const { id, family, familyMember, softwareRevision } = msg.identity;
      out.push(SUB_ID_GENERAL_INFORMATION, IDENTITY_REPLY);
      pushManufacturerId(id, out);
      pushU14(family, out);
      pushU14(familyMember, out);
      out.push(...softwareRevision.map(toU7));
      return;
    }
    case "fileDumpHeader":
      pushFileDumpHeader(msg.header, out);
      return;
    case "fileDumpPacket":
      pushFileDumpPacket(msg.packet, out);
      return;
    case "fileDumpRequest":
      pushFileDumpRequest(msg.request, out);
      return;
    case "tuningBulkDumpRequest":
      pushTuningBulkDumpRequest(msg.request, out);
      return;
    case "keyBasedTuningDump":
      pushKeyBasedTuningDump(msg.dump, out);
      return;
    case "scaleTuningDump1Byte":
      pushScaleTuningDump(msg.dump, false, out);
      return;
    case "scaleTuningDump2Byte":
      pushScaleTuningDump(msg.dump, true, out);
      return;
    case "tuningNoteChange":
      pushTuningNoteChange(msg.change, false, out);
      return;
    case "scaleTuning1Byte":
      pushScaleTuning(msg.tuning, false, out);
      return;
    case "scaleTuning2Byte":
      pushScaleTuning(msg.tuning, true, out);
      return;
    case "generalMidi":
      out.push(SUB_ID_GENERAL_MIDI, GENERAL_MIDI_MODES[msg.mode]);
      return;
    case "fileReference":
      pushFileReference(msg.msg, out);
      return;
    default:
      out.push(HANDSHAKES[msg.kind], toU7(msg.packet));
  }
}

function readIdentityReply(reader: ByteReader): IdentityReply {
  const id = readManufacturerId(reader);
  const family = reader.u14();
  const familyMember = reader.u14();
  const [a, b, c, d] = reader.take(4);
  return { id, family, familyMember, softwareRevision: [a, b, c, d] };
}

function readGeneralMidiMode(byte: number): GeneralMidiMode {
  for (const [mode, value] of Object.entries(GENERAL_MIDI_MODES)) {
    if (value === byte && (mode === "gm1" || mode === "off" || mode === "gm2")) return mode;
  }
  throw invalid(`Unknown General MIDI mode 0x${byte.toString(16)}`);
}

function readHandshake(sub1: number): HandshakeKind | undefined {
  for (const [kind, value] of Object.entries(HANDSHAKES)) {
    if (value === sub1 && isHandshake(kind)) return kind;
  }
  return undefined;
}

function readSampleDumpExtension(reader: ByteReader, sub2: number): UniversalNonRealTimeMsg | undefined {
  switch (sub2) {
    case LOOP_POINT_TRANSMISSION:
      return { kind: "loopPoint", loop: readLoopPoint(reader) };
    case LOOP_POINTS_REQUEST:
      return { kind: "loopPointsRequest", request: readLoopPointsRequest(reader) };
    case SAMPLE_NAME_TRANSMISSION:
      return { kind: "sampleName", name: readSampleName(reader) };
    case SAMPLE_NAME_REQUEST:
      return { kind: "sampleNameRequest", sampleNum: reader.u14() };
    case EXTENDED_DUMP_HEADER:
      return { kind: "extendedSampleDumpHeader", header: readExtendedSampleDumpHeader(reader) };
    case EXTENDED_LOOP_POINT_TRANSMISSION:
      return { kind: "extendedLoopPoint", loop: readExtendedLoopPoint(reader) };
    case EXTENDED_LOOP_POINTS_REQUEST:
      return { kind: "extendedLoopPointsRequest", request: readLoopPointsRequest(reader) };
    default:
      return undefined;
  }
}

function readTuning(reader: ByteReader, sub2: number): UniversalNonRealTimeMsg | undefined {
  switch (sub2) {
    case TUNING_BULK_DUMP_REQUEST:
      return { kind: "tuningBulkDumpRequest", request: readTuningBulkDumpRequest(reader, false) };
    case TUNING_BULK_DUMP_REQUEST_BANK:
      return { kind: "tuningBulkDumpRequest", request: readTuningBulkDumpRequest(reader, true) };
    case KEY_BASED_TUNING_DUMP:
      return { kind: "keyBasedTuningDump", dump: readKeyBasedTuningDump(reader, false) };
    case KEY_BASED_TUNING_DUMP_BANK:
      return { kind: "keyBasedTuningDump", dump: readKeyBasedTuningDump(reader, true) };
    case SCALE_TUNING_DUMP_1_BYTE:
      return { kind: "scaleTuningDump1Byte", dump: readScaleTuningDump(reader, false) };
    case SCALE_TUNING_DUMP_2_BYTE:
      return { kind: "scaleTuningDump2Byte", dump: readScaleTuningDump(reader, true) };
    case TUNING_NOTE_CHANGE_BANK:
      return { kind: "tuningNoteChange", change: readTuningNoteChange(reader, true) };
    case SCALE_TUNING_1_BYTE:
      return { kind: "scaleTuning1Byte", tuning: readScaleTuning(reader, false) };
    case SCALE_TUNING_2_BYTE:
      return { kind: "scaleTuning2Byte", tuning: readScaleTuning(reader, true) };
    default:
      return undefined;
  }
}

/**
 * Reads a universal non-real-time body. `body[0]` is the 7E byte and `body[1]` the device;
 * checksummed messages are verified against every byte from 7E on.
 */
export function readUniversalNonRealTime(body: number[]): UniversalNonRealTimeMsg {
  if (body.length < 3) throw unexpectedEnd();
  const sub1 = body[2];
  let end = body.length;
  if (subIdsHaveChecksum(sub1, body[3])) {
    end -= 1;
    if (end <= 3) throw unexpectedEnd();
    if (checksum(body, 0, end) !== body[end]) throw invalid("Checksum mismatch");
  }
  const reader = new ByteReader(body, 3, end);
  switch (sub1) {
    case SUB_ID_SAMPLE_DUMP_HEADER:
      return { kind: "sampleDumpHeader", header: readSampleDumpHeader(reader) };
    case SUB_ID_SAMPLE_DATA_PACKET:
      return { kind: "sampleDumpPacket", packet: readSampleDumpPacket(reader) };
    case SUB_ID_SAMPLE_DUMP_REQUEST:
      return { kind: "sampleDumpRequest", sampleNum: reader.u14() };
    case SUB_ID_CUEING_SETUP:
      return { kind: "timeCodeCueingSetup", cue: readTimeCodeCueingSetup(reader) };
  }
  const sub2 = reader.u7();
  const handshake = readHandshake(sub1);
  if (handshake !== undefined) return { kind: handshake, packet: sub2 };
  let msg: UniversalNonRealTimeMsg | undefined;
  switch (sub1) {
    case SUB_ID_SAMPLE_DUMP_EXTENSIONS:
      msg = readSampleDumpExtension(reader, sub2);
      break;
    case SUB_ID_GENERAL_INFORMATION:
      if (sub2 === IDENTITY_REQUEST) msg = { kind: "identityRequest" };
      if (sub2 === IDENTITY_REPLY) msg = { kind: "identityReply", identity: readIdentityReply(reader) };
      break;
    case SUB_ID_FILE_DUMP:
      if (sub2 === FILE_DUMP_HEADER) msg = { kind: "fileDumpHeader", header: readFileDumpHeader(reader) };
      if (sub2 === FILE_DUMP_DATA_PACKET) msg = { kind: "fileDumpPacket", packet: readFileDumpPacket(reader) };
      if (sub2 === FILE_DUMP_REQUEST) msg = { kind: "fileDumpRequest", request: readFileDumpRequest(reader) };
      break;
    case SUB_ID_TUNING:
      msg = readTuning(reader, sub2);
      break;
    case SUB_ID_GENERAL_MIDI:
      msg = { kind: "generalMidi", mode: readGeneralMidiMode(sub2) };
      break;
    case SUB_ID_FILE_REFERENCE:
      msg = { kind: "fileReference", msg: readFileReference(reader, sub2) };
      break;
  }
  if (msg === undefined) {
    throw invalid(`Unknown universal non-real-time sub-id 0x${sub1.toString(16)} 0x${sub2.toString(16)}`);
  }
  return msg;
}
