import { ByteReader, clampInt, i14FromTwosComplement, i14FromU7s, iToU14, iToU7, pushI14, pushU14, toU7, u7ToI } from "../bytes";
import type { ReceiverContext } from "../context";
import { invalid, MidiParseError, unexpectedEnd } from "../errors";
import { readTimeCode, readUserBits, TimeCode, timeCodeBytes, UserBits, userBitsBytes } from "../time-code";
import {
  ControllerDestination,
  KeyBasedInstrumentControl,
  pushControllerDestination,
  pushKeyBasedInstrumentControl,
  readControllerDestination,
  readKeyBasedInstrumentControl,
  SUB_ID_CONTROLLER_DESTINATION,
  SUB_ID_KEY_BASED_INSTRUMENT_CONTROL,
} from "./controller";
import { pushTimeCodeCueing, readTimeCodeCueing, SUB_ID_CUEING, TimeCodeCueing } from "./cueing";
import {
  GLOBAL_PARAMETER_CONTROL,
  GlobalParameterControl,
  pushGlobalParameterControl,
  readGlobalParameterControl,
  SUB_ID_DEVICE_CONTROL,
} from "./global-parameter";
import {
  MachineControlCommand,
  pushMachineControlCommand,
  readMachineControlCommand,
  SUB_ID_MACHINE_CONTROL_COMMAND,
  SUB_ID_MACHINE_CONTROL_RESPONSE,
} from "./machine-control";
import {
  pushScaleTuning,
  pushTuningNoteChange,
  readScaleTuning,
  readTuningNoteChange,
  SCALE_TUNING_1_BYTE,
  SCALE_TUNING_2_BYTE,
  ScaleTuning,
  SUB_ID_TUNING,
  TUNING_NOTE_CHANGE,
  TUNING_NOTE_CHANGE_BANK,
  TuningNoteChange,
} from "./tuning";

export type BeatValue =
  | "whole"
  | "half"
  | "quarter"
  | "eighth"
  | "sixteenth"
  | "thirtySecond"
  | "sixtyFourth"
  | { other: number };

export interface Signature {
  beats: number;
  beatValue: BeatValue;
}

export interface TimeSignature {
  signature: Signature;
  midiClocksInMetronomeClick: number;
  thirtySecondNotesInMidiQuarterNote: number;
  /** Further signatures of a compound meter, at most 61. */
  compoundSignatures: Signature[];
}

export type BarMarker =
  | { kind: "notRunning" }
  /** Bars remaining in a count-in, 1 to 8191. */
  | { kind: "countIn"; bars: number }
  /** 0 to 8190. */
  | { kind: "number"; bar: number }
  | { kind: "runningUnknown" };

export type UniversalRealTimeMsg =
  | { kind: "timeCodeFull"; timeCode: TimeCode }
  | { kind: "timeCodeUserBits"; userBits: UserBits }
  | { kind: "showControl"; data: number[] }
  | { kind: "barMarker"; marker: BarMarker }
  | { kind: "timeSignature"; signature: TimeSignature }
  | { kind: "timeSignatureDelayed"; signature: TimeSignature }
  | { kind: "masterVolume"; volume: number }
  | { kind: "masterBalance"; balance: number }
  /** Signed 14-bit fraction of a semitone. */
  | { kind: "masterFineTuning"; tuning: number }
  /** Semitones, -64 to 63. */
  | { kind: "masterCoarseTuning"; semitones: number }
  | { kind: "globalParameterControl"; control: GlobalParameterControl }
  | { kind: "timeCodeCueing"; cue: TimeCodeCueing }
  | { kind: "machineControlCommand"; command: MachineControlCommand }
  | { kind: "machineControlResponse"; data: number[] }
  | { kind: "tuningNoteChange"; change: TuningNoteChange }
  | { kind: "scaleTuning1Byte"; tuning: ScaleTuning }
  | { kind: "scaleTuning2Byte"; tuning: ScaleTuning }
  | { kind: "controllerDestination"; destination: ControllerDestination }
  | { kind: "keyBasedInstrumentControl"; control: KeyBasedInstrumentControl };

const SUB_ID_TIME_CODE = 0x01;
const TIME_CODE_FULL = 0x01;
const TIME_CODE_USER_BITS = 0x02;
const SUB_ID_SHOW_CONTROL = 0x02;
const SUB_ID_NOTATION = 0x03;
const BAR_MARKER = 0x01;
const TIME_SIGNATURE_NOW = 0x02;
const TIME_SIGNATURE_DELAYED = 0x42;
const MASTER_VOLUME = 0x01;
const MASTER_BALANCE = 0x02;
const MASTER_FINE_TUNING = 0x03;
const MASTER_COARSE_TUNING = 0x04;

const BAR_NOT_RUNNING = -8192;
const BAR_RUNNING_UNKNOWN = 8191;
const MAX_COMPOUND_SIGNATURES = 61;

const BEAT_VALUES = ["whole", "half", "quarter", "eighth", "sixteenth", "thirtySecond", "sixtyFourth"] as const;

export function defaultTimeSignature(): TimeSignature {
  return {
    signature: { beats: 4, beatValue: "quarter" },
    midiClocksInMetronomeClick: 24,
    thirtySecondNotesInMidiQuarterNote: 8,
    compoundSignatures: [],
  };
}

function beatValueByte(value: BeatValue): number {
  return typeof value === "string" ? BEAT_VALUES.indexOf(value) : toU7(value.other);
}

function decodeBeatValue(byte: number): BeatValue {
  return BEAT_VALUES[byte] ?? { other: byte };
}

function pushSignature(signature: Signature, out: number[]): void {
  out.push(toU7(signature.beats), beatValueByte(signature.beatValue));
}

function readSignature(reader: ByteReader): Signature {
  const beats = reader.u7();
  return { beats, beatValue: decodeBeatValue(reader.u7()) };
}

function pushTimeSignature(signature: TimeSignature, out: number[]): void {
  const compound = signature.compoundSignatures.slice(0, MAX_COMPOUND_SIGNATURES);
  out.push(4 + compound.length * 2);
  pushSignature(signature.signature, out);
  out.push(toU7(signature.midiClocksInMetronomeClick), toU7(signature.thirtySecondNotesInMidiQuarterNote));
  compound.forEach(s => pushSignature(s, out));
}

function readTimeSignature(reader: ByteReader): TimeSignature {
  const length = reader.u7();
  if (length < 4 || length % 2 !== 0) throw invalid("Time signature length must be 4 plus 2 per compound signature");
  const signature = readSignature(reader);
  const midiClocksInMetronomeClick = reader.u7();
  const thirtySecondNotesInMidiQuarterNote = reader.u7();
  const compoundSignatures: Signature[] = [];
  for (let i = 0; i < (length - 4) / 2; i++) compoundSignatures.push(readSignature(reader));
  return { signature, midiClocksInMetronomeClick, thirtySecondNotesInMidiQuarterNote, compoundSignatures };
}

function barMarkerValue(marker: BarMarker): number {
  switch (marker.kind) {
    case "notRunning":
      return BAR_NOT_RUNNING;
    case "countIn":
      return -clampInt(marker.bars, 1, 8191);
    case "number":
      return clampInt(marker.bar, 0, BAR_RUNNING_UNKNOWN - 1);
    case "runningUnknown":
      return BAR_RUNNING_UNKNOWN;
  }
}

function decodeBarMarker(value: number): BarMarker {
  if (value === BAR_NOT_RUNNING) return { kind: "notRunning" };
  if (value === BAR_RUNNING_UNKNOWN) return { kind: "runningUnknown" };
  return value < 0 ? { kind: "countIn", bars: -value } : { kind: "number", bar: value };
}

export function pushUniversalRealTime(msg: UniversalRealTimeMsg, out: number[]): void {
  switch (msg.kind) {
    case "timeCodeFull":
      out.push(SUB_ID_TIME_CODE, TIME_CODE_FULL, ...timeCodeBytes(msg.timeCode));
      return;
    case "timeCodeUserBits":
      out.push(SUB_ID_TIME_CODE, TIME_CODE_USER_BITS, ...userBitsBytes(msg.userBits));
      return;
    case "showControl":
      out.push(SUB_ID_SHOW_CONTROL, ...msg.data.map(toU7));
      return;
    case "barMarker":
      out.push(SUB_ID_NOTATION, BAR_MARKER);
      pushI14(barMarkerValue(msg.marker), out);
      return;
    case "timeSignature":
      out.push(SUB_ID_NOTATION, TIME_SIGNATURE_NOW);
      pushTimeSignature(msg.signature, out);
      return;
    case "timeSignatureDelayed":
      out.push(SUB_ID_NOTATION, TIME_SIGNATURE_DELAYED);
      pushTimeSignature(msg.signature, out);
      return;
    case "masterVolume":
      out.push(SUB_ID_DEVICE_CONTROL, MASTER_VOLUME);
      pushU14(msg.volume, out);
      return;
    case "masterBalance":
      out.push(SUB_ID_DEVICE_CONTROL, MASTER_BALANCE);
      pushU14(msg.balance, out);
      return;
    case "masterFineTuning": {
      const [msb, lsb] = iToU14(msg.tuning);
      out.push(SUB_ID_DEVICE_CONTROL, MASTER_FINE_TUNING, lsb, msb);
      return;
    }
    case "masterCoarseTuning":
      out.push(SUB_ID_DEVICE_CONTROL, MASTER_COARSE_TUNING, 0x00, iToU7(msg.semitones));
      return;
    case "globalParameterControl":
      pushGlobalParameterControl(msg.control, out);
      return;
    case "timeCodeCueing":
      pushTimeCodeCueing(msg.cue, out);
      return;
    case "machineControlCommand":
      pushMachineControlCommand(msg.command, out);
      return;
    case "machineControlResponse":
      out.push(SUB_ID_MACHINE_CONTROL_RESPONSE, ...msg.data.map(toU7));
      return;
    case "tuningNoteChange":
      pushTuningNoteChange(msg.change, true, out);
      return;
    case "scaleTuning1Byte":
      pushScaleTuning(msg.tuning, false, out);
      return;
    case "scaleTuning2Byte":
      pushScaleTuning(msg.tuning, true, out);
      return;
    case "controllerDestination":
      pushControllerDestination(msg.destination, out);
      return;
    case "keyBasedInstrumentControl":
      pushKeyBasedInstrumentControl(msg.control, out);
      return;
  }
}

function unknownSubId(sub1: number, sub2: number): MidiParseError {
  return invalid(`Unknown universal real-time sub-id 0x${sub1.toString(16)} 0x${sub2.toString(16)}`);
}

/** Reads a body that starts at sub-id 1. A full time code also becomes the context's time code. */
export function readUniversalRealTime(reader: ByteReader, ctx: ReceiverContext): UniversalRealTimeMsg {
  if (reader.remaining < 1) throw unexpectedEnd();
  const sub1 = reader.u7();
  switch (sub1) {
    case SUB_ID_SHOW_CONTROL:
      return { kind: "showControl", data: reader.rest() };
    case SUB_ID_CUEING:
      return { kind: "timeCodeCueing", cue: readTimeCodeCueing(reader) };
    case SUB_ID_MACHINE_CONTROL_COMMAND:
      return { kind: "machineControlCommand", command: readMachineControlCommand(reader) };
    case SUB_ID_MACHINE_CONTROL_RESPONSE:
      return { kind: "machineControlResponse", data: reader.rest() };
  }
  const sub2 = reader.u7();
  switch (sub1) {
    case SUB_ID_TIME_CODE:
      if (sub2 === TIME_CODE_FULL) {
        const timeCode = readTimeCode(reader.take(4), 0);
        if (reader.remaining > 0) throw invalid("Extra bytes after a full time code message");
        ctx.timeCode = { ...timeCode };
        return { kind: "timeCodeFull", timeCode };
      }
      if (sub2 === TIME_CODE_USER_BITS) return { kind: "timeCodeUserBits", userBits: readUserBits(reader.take(9), 0) };
      break;
    case SUB_ID_NOTATION:
      if (sub2 === BAR_MARKER) {
        const lsb = reader.u7();
        return { kind: "barMarker", marker: decodeBarMarker(i14FromTwosComplement(reader.u7(), lsb)) };
      }
      if (sub2 === TIME_SIGNATURE_NOW) return { kind: "timeSignature", signature: readTimeSignature(reader) };
      if (sub2 === TIME_SIGNATURE_DELAYED) return { kind: "timeSignatureDelayed", signature: readTimeSignature(reader) };
      break;
    case SUB_ID_DEVICE_CONTROL:
      switch (sub2) {
        case MASTER_VOLUME:
          return { kind: "masterVolume", volume: reader.u14() };
        case MASTER_BALANCE:
          return { kind: "masterBalance", balance: reader.u14() };
        case MASTER_FINE_TUNING: {
          const lsb = reader.u7();
          return { kind: "masterFineTuning", tuning: i14FromU7s(reader.u7(), lsb) };
        }
        case MASTER_COARSE_TUNING:
          reader.u7();
          return { kind: "masterCoarseTuning", semitones: u7ToI(reader.u7()) };
        case GLOBAL_PARAMETER_CONTROL:
          return { kind: "globalParameterControl", control: readGlobalParameterControl(reader) };
      }
      break;
    case SUB_ID_TUNING:
      switch (sub2) {
        case TUNING_NOTE_CHANGE:
          return { kind: "tuningNoteChange", change: readTuningNoteChange(reader, false) };
        case TUNING_NOTE_CHANGE_BANK:
          return { kind: "tuningNoteChange", change: readTuningNoteChange(reader, true) };
        case SCALE_TUNING_1_BYTE:
          return { kind: "scaleTuning1Byte", tuning: readScaleTuning(reader, false) };
        case SCALE_TUNING_2_BYTE:
          return { kind: "scaleTuning2Byte", tuning: readScaleTuning(reader, true) };
      }
      break;
    case SUB_ID_CONTROLLER_DESTINATION:
      return { kind: "controllerDestination", destination: readControllerDestination(reader, sub2) };
    case SUB_ID_KEY_BASED_INSTRUMENT_CONTROL:
      if (sub2 === 0x01) return { kind: "keyBasedInstrumentControl", control: readKeyBasedInstrumentControl(reader) };
      break;
  }
  throw unknownSubId(sub1, sub2);
}
