import { pushU14, readU7, toU7, u14FromU7s } from "./bytes";
import { ReceiverContext } from "./context";
import { undefinedSystemCommonMessage, unexpectedEndOfSystemExclusiveFlag } from "./errors";
import { applyQuarterFrame, quarterFrameByte, TimeCode } from "./time-code";

export type SystemCommonMsg =
  /** One of the eight pieces (0 to 7) of `timeCode`. */
  | { kind: "timeCodeQuarterFrame"; piece: number; timeCode: TimeCode }
  | { kind: "songPosition"; position: number }
  | { kind: "songSelect"; song: number }
  | { kind: "tuneRequest" };

const STATUS_QUARTER_FRAME = 0xf1;
const STATUS_SONG_POSITION = 0xf2;
const STATUS_SONG_SELECT = 0xf3;
const STATUS_TUNE_REQUEST = 0xf6;
const STATUS_END_OF_EXCLUSIVE = 0xf7;

export function systemCommonLength(status: number): number {
  switch (status) {
    case STATUS_QUARTER_FRAME: // MTC Quarter Frame
      return 1;
    case STATUS_SONG_POSITION: // Song Position Pointer
      return 2;
    case STATUS_SONG_SELECT:
      return 1;
    case STATUS_TUNE_REQUEST:
      return 0;
    default:
      return -1;
  }
}

export function pushSystemCommon(msg: SystemCommonMsg, out: number[]): void {
  switch (msg.kind) {
    case "timeCodeQuarterFrame":
      out.push(STATUS_QUARTER_FRAME, quarterFrameByte(msg.timeCode, msg.piece));
      return;
    case "songPosition":
      out.push(STATUS_SONG_POSITION);
      pushU14(msg.position, out);
      return;
    case "songSelect":
      out.push(STATUS_SONG_SELECT, toU7(msg.song));
      return;
    case "tuneRequest":
      out.push(STATUS_TUNE_REQUEST);
      return;
  }
}

/**
 * Decodes the system common message at the head of `bytes`. Quarter frames are folded into
 * `ctx.timeCode` and report the time code as rebuilt so far.
 */
export function decodeSystemCommon(bytes: ArrayLike<number>, ctx: ReceiverContext): { msg: SystemCommonMsg; consumed: number } {
  const status = bytes[0];
  switch (status) {
    case STATUS_QUARTER_FRAME: {
      const data = readU7(bytes, 1);
      ctx.timeCode = applyQuarterFrame(ctx.timeCode, data);
      return { msg: { kind: "timeCodeQuarterFrame", piece: data >> 4, timeCode: { ...ctx.timeCode } }, consumed: 2 };
    }
    case STATUS_SONG_POSITION: {
      const lsb = readU7(bytes, 1);
      const msb = readU7(bytes, 2);
      return { msg: { kind: "songPosition", position: u14FromU7s(msb, lsb) }, consumed: 3 };
    }
    case STATUS_SONG_SELECT:
      return { msg: { kind: "songSelect", song: readU7(bytes, 1) }, consumed: 2 };
    case STATUS_TUNE_REQUEST:
      return { msg: { kind: "tuneRequest" }, consumed: 1 };
    case STATUS_END_OF_EXCLUSIVE:
      throw unexpectedEndOfSystemExclusiveFlag();
    default:
      throw undefinedSystemCommonMessage(status);
  }
}
