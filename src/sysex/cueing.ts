import { ByteReader, pushU14 } from "../bytes";
import { invalid } from "../errors";
import { createTimeCode, HighResTimeCode, highResTimeCodeBytes, readHighResTimeCode } from "../time-code";

type PlainCue = "punchIn" | "punchOut";
type InfoCue = "eventStart" | "eventStop" | "cuePoint";
type DeleteCue = "deletePunchIn" | "deletePunchOut" | "deleteEventStart" | "deleteEventStop" | "deleteCuePoint";

/** Real-time cueing: acts at the moment it is received. */
export type TimeCodeCueing =
  | { kind: "systemStop" }
  | { kind: PlainCue; eventNumber: number }
  /** `additionalInfo` is a MIDI byte stream carried nibble by nibble. */
  | { kind: InfoCue; eventNumber: number; additionalInfo?: number[] }
  | { kind: "eventName"; eventNumber: number; name: string };

/** Cueing setup: schedules or edits events in a device's cue list at a time code. */
export type TimeCodeCueingSetup =
  | { kind: "timeCodeOffset"; timeCode: HighResTimeCode }
  | { kind: "enableEventList" }
  | { kind: "disableEventList" }
  | { kind: "clearEventList" }
  | { kind: "systemStop"; timeCode: HighResTimeCode }
  | { kind: "eventListRequest"; timeCode: HighResTimeCode }
  | { kind: PlainCue | DeleteCue; timeCode: HighResTimeCode; eventNumber: number }
  | { kind: InfoCue; timeCode: HighResTimeCode; eventNumber: number; additionalInfo?: number[] }
  | { kind: "eventName"; timeCode: HighResTimeCode; eventNumber: number; name: string };

export const SUB_ID_CUEING_SETUP = 0x04;
export const SUB_ID_CUEING = 0x05;

const SPECIAL = 0x00;
const SPECIAL_TIME_CODE_OFFSET = 0x00;
const SPECIAL_ENABLE_EVENT_LIST = 0x01;
const SPECIAL_DISABLE_EVENT_LIST = 0x02;
const SPECIAL_CLEAR_EVENT_LIST = 0x03;
const SPECIAL_SYSTEM_STOP = 0x04;
const SPECIAL_EVENT_LIST_REQUEST = 0x05;
const EVENT_NAME = 0x0e;

const CUE_CODES: Record<PlainCue | DeleteCue, number> = {
  punchIn: 0x01,
  punchOut: 0x02,
  deletePunchIn: 0x03,
  deletePunchOut: 0x04,
  deleteEventStart: 0x09,
  deleteEventStop: 0x0a,
  deleteCuePoint: 0x0d,
};

/** `[code without info, code with info]`. */
const INFO_CUE_CODES: Record<InfoCue, readonly [number, number]> = {
  eventStart: [0x05, 0x07],
  eventStop: [0x06, 0x08],
  cuePoint: [0x0b, 0x0c],
};

function zeroTimeCode(): HighResTimeCode {
  return { ...createTimeCode({ codeType: "fps24" }), fractionalFrames: 0 };
}

export function nibblize(bytes: number[], out: number[]): void {
  for (const b of bytes) out.push(b & 0x0f, (b >> 4) & 0x0f);
}

export function denibblize(nibbles: number[]): number[] {
  const out: number[] = [];
  for (let i = 0; i + 1 < nibbles.length; i += 2) out.push((nibbles[i] & 0x0f) | ((nibbles[i + 1] & 0x0f) << 4));
  return out;
}

function textBytes(text: string): number[] {
  return Array.from(text, ch => ch.charCodeAt(0) & 0xff);
}

function pushCue(code: number, eventNumber: number, info: number[] | undefined, out: number[]): void {
  out.push(code);
  pushU14(eventNumber, out);
  if (info !== undefined) nibblize(info, out);
}

function infoCode(kind: InfoCue, info: number[] | undefined): number {
  const [plain, withInfo] = INFO_CUE_CODES[kind];
  return info !== undefined && info.length > 0 ? withInfo : plain;
}

function isPlainOrDeleteCue(kind: string): kind is PlainCue | DeleteCue {
  return Object.prototype.hasOwnProperty.call(CUE_CODES, kind);
}

export function pushTimeCodeCueing(cue: TimeCodeCueing, out: number[]): void {
  out.push(SUB_ID_CUEING);
  switch (cue.kind) {
    case "systemStop":
      pushCue(SPECIAL, SPECIAL_SYSTEM_STOP, undefined, out);
      return;
    case "punchIn":
    case "punchOut":
      pushCue(CUE_CODES[cue.kind], cue.eventNumber, undefined, out);
      return;
    case "eventName":
      pushCue(EVENT_NAME, cue.eventNumber, textBytes(cue.name), out);
      return;
    default:
      pushCue(infoCode(cue.kind, cue.additionalInfo), cue.eventNumber, cue.additionalInfo, out);
  }
}

export function pushTimeCodeCueingSetup(cue: TimeCodeCueingSetup, out: number[]): void {
  out.push(SUB_ID_CUEING_SETUP);
  const special = (eventNumber: number, timeCode: HighResTimeCode): void => {
    out.push(SPECIAL, ...highResTimeCodeBytes(timeCode));
    pushU14(eventNumber, out);
  };
  switch (cue.kind) {
    case "timeCodeOffset":
      special(SPECIAL_TIME_CODE_OFFSET, cue.timeCode);
      return;
    case "enableEventList":
      special(SPECIAL_ENABLE_EVENT_LIST, zeroTimeCode());
      return;
    case "disableEventList":
      special(SPECIAL_DISABLE_EVENT_LIST, zeroTimeCode());
      return;
    case "clearEventList":
      special(SPECIAL_CLEAR_EVENT_LIST, zeroTimeCode());
      return;
    case "systemStop":
      special(SPECIAL_SYSTEM_STOP, cue.timeCode);
      return;
    case "eventListRequest":
      special(SPECIAL_EVENT_LIST_REQUEST, cue.timeCode);
      return;
    case "eventName":
      out.push(EVENT_NAME, ...highResTimeCodeBytes(cue.timeCode));
      pushU14(cue.eventNumber, out);
      nibblize(textBytes(cue.name), out);
      return;
    case "eventStart":
    case "eventStop":
    case "cuePoint":
      out.push(infoCode(cue.kind, cue.additionalInfo), ...highResTimeCodeBytes(cue.timeCode));
      pushU14(cue.eventNumber, out);
      if (cue.additionalInfo !== undefined) nibblize(cue.additionalInfo, out);
      return;
    default:
      out.push(CUE_CODES[cue.kind], ...highResTimeCodeBytes(cue.timeCode));
      pushU14(cue.eventNumber, out);
  }
}

function infoCueForCode(code: number): { kind: InfoCue; withInfo: boolean } | undefined {
  for (const [kind, [plain, withInfo]] of Object.entries(INFO_CUE_CODES)) {
    if (kind !== "eventStart" && kind !== "eventStop" && kind !== "cuePoint") continue;
    if (code === plain) return { kind, withInfo: false };
    if (code === withInfo) return { kind, withInfo: true };
  }
  return undefined;
}

function plainCueForCode(code: number): PlainCue | DeleteCue | undefined {
  for (const [kind, value] of Object.entries(CUE_CODES)) {
    if (value === code && isPlainOrDeleteCue(kind)) return kind;
  }
  return undefined;
}

function readInfo(reader: ByteReader): number[] {
  return denibblize(reader.rest());
}

function readName(reader: ByteReader): string {
  return String.fromCharCode(...readInfo(reader));
}

export function readTimeCodeCueing(reader: ByteReader): TimeCodeCueing {
  const code = reader.u7();
  const eventNumber = reader.u14();
  if (code === SPECIAL) {
    if (eventNumber === SPECIAL_SYSTEM_STOP) return { kind: "systemStop" };
    throw invalid(`Unknown real-time cueing special 0x${eventNumber.toString(16)}`);
  }
  if (code === EVENT_NAME) return { kind: "eventName", eventNumber, name: readName(reader) };
  const info = infoCueForCode(code);
  if (info !== undefined) {
    return info.withInfo
      ? { kind: info.kind, eventNumber, additionalInfo: readInfo(reader) }
      : { kind: info.kind, eventNumber };
  }
  if (code === CUE_CODES.punchIn) return { kind: "punchIn", eventNumber };
  if (code === CUE_CODES.punchOut) return { kind: "punchOut", eventNumber };
  throw invalid(`Unknown real-time cueing type 0x${code.toString(16)}`);
}

export function readTimeCodeCueingSetup(reader: ByteReader): TimeCodeCueingSetup {
  const code = reader.u7();
  const timeCode = readHighResTimeCode(reader.take(5), 0);
  const eventNumber = reader.u14();
  if (code === SPECIAL) {
    switch (eventNumber) {
      case SPECIAL_TIME_CODE_OFFSET:
        return { kind: "timeCodeOffset", timeCode };
      case SPECIAL_ENABLE_EVENT_LIST:
        return { kind: "enableEventList" };
      case SPECIAL_DISABLE_EVENT_LIST:
        return { kind: "disableEventList" };
      case SPECIAL_CLEAR_EVENT_LIST:
        return { kind: "clearEventList" };
      case SPECIAL_SYSTEM_STOP:
        return { kind: "systemStop", timeCode };
      case SPECIAL_EVENT_LIST_REQUEST:
        return { kind: "eventListRequest", timeCode };
      default:
        throw invalid(`Unknown cueing setup special 0x${eventNumber.toString(16)}`);
    }
  }
  if (code === EVENT_NAME) return { kind: "eventName", timeCode, eventNumber, name: readName(reader) };
  const info = infoCueForCode(code);
  if (info !== undefined) {
    return info.withInfo
      ? { kind: info.kind, timeCode, eventNumber, additionalInfo: readInfo(reader) }
      : { kind: info.kind, timeCode, eventNumber };
  }
  const kind = plainCueForCode(code);
  if (kind === undefined) throw invalid(`Unknown cueing setup type 0x${code.toString(16)}`);
  return { kind, timeCode, eventNumber };
}
