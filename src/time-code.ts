import { clampInt, readU7 } from "./bytes";
import { invalid } from "./errors";

export type TimeCodeType = "fps24" | "fps25" | "df30" | "ndf30";

const TIME_CODE_TYPES: readonly TimeCodeType[] = ["fps24", "fps25", "df30", "ndf30"];

export interface TimeCode {
  frames: number;
  seconds: number;
  minutes: number;
  hours: number;
  codeType: TimeCodeType;
}

/** Time code with hundredths of a frame, as carried by SMF offsets and cueing setup. */
export interface HighResTimeCode extends TimeCode {
  fractionalFrames: number;
}

export interface TimeCodeStatus {
  estimatedCode: boolean;
  invalidCode: boolean;
  videoFieldOne: boolean;
  noTimeCode: boolean;
}

/** Machine control time code; the last byte holds either subframes or status flags. */
export interface StandardTimeCode extends TimeCode {
  subframes: number;
  negative: boolean;
  status?: TimeCodeStatus;
}

export interface UserBits {
  bytes: [number, number, number, number];
  flag1: boolean;
  flag2: boolean;
}

export function createTimeCode(partial?: Partial<TimeCode>): TimeCode {
  return { frames: 0, seconds: 0, minutes: 0, hours: 0, codeType: "ndf30", ...partial };
}

export function timeCodeTypeValue(type: TimeCodeType): number {
  return TIME_CODE_TYPES.indexOf(type);
}

export function timeCodeTypeFromValue(value: number): TimeCodeType {
  return TIME_CODE_TYPES[value & 0x3];
}

function hourByte(tc: TimeCode): number {
  return clampInt(tc.hours, 0, 23) | (timeCodeTypeValue(tc.codeType) << 5);
}

/** `[frames, seconds, minutes, hours | type << 5]`, each field clamped. */
export function timeCodeBytes(tc: TimeCode): number[] {
  return [clampInt(tc.frames, 0, 29), clampInt(tc.seconds, 0, 59), clampInt(tc.minutes, 0, 59), hourByte(tc)];
}

export function readTimeCode(bytes: ArrayLike<number>, offset: number): TimeCode {
  const frames = readU7(bytes, offset) & 0x1f;
  const seconds = readU7(bytes, offset + 1) & 0x3f;
  const minutes = readU7(bytes, offset + 2) & 0x3f;
  const codeHour = readU7(bytes, offset + 3);
  return { frames, seconds, minutes, hours: codeHour & 0x1f, codeType: timeCodeTypeFromValue(codeHour >> 5) };
}

export function quarterFrameNibble(tc: TimeCode, piece: number): number {
  const [frames, seconds, minutes, codeHour] = timeCodeBytes(tc);
  switch (clampInt(piece, 0, 7)) {
    case 0:
      return frames & 0xf;
    case 1:
      return frames >> 4;
    case 2:
      return seconds & 0xf;
    case 3:
      return seconds >> 4;
    case 4:
      return minutes & 0xf;
    case 5:
      return minutes >> 4;
    case 6:
      return codeHour & 0xf;
    default:
      return codeHour >> 4;
  }
}

export function quarterFrameByte(tc: TimeCode, piece: number): number {
  return (clampInt(piece, 0, 7) << 4) | quarterFrameNibble(tc, piece);
}

export function timeCodeToQuarterFrames(tc: TimeCode): number[] {
  return [0, 1, 2, 3, 4, 5, 6, 7].map(piece => quarterFrameByte(tc, piece));
}

/** Folds one quarter-frame data byte into a rolling time code. */
export function applyQuarterFrame(tc: TimeCode, data: number): TimeCode {
  const piece = (data >> 4) & 0x7;
  const nibble = data & 0xf;
  const next = { ...tc };
  switch (piece) {
    case 0:
      next.frames = (tc.frames & 0x10) | nibble;
      break;
    case 1:
      next.frames = (tc.frames & 0x0f) | ((nibble & 0x1) << 4);
      break;
    case 2:
      next.seconds = (tc.seconds & 0x30) | nibble;
      break;
    case 3:
      next.seconds = (tc.seconds & 0x0f) | ((nibble & 0x3) << 4);
      break;
    case 4:
      next.minutes = (tc.minutes & 0x30) | nibble;
      break;
    case 5:
      next.minutes = (tc.minutes & 0x0f) | ((nibble & 0x3) << 4);
      break;
    case 6:
      next.hours = (tc.hours & 0x10) | nibble;
      break;
    default:
      next.hours = (tc.hours & 0x0f) | ((nibble & 0x1) << 4);
      next.codeType = timeCodeTypeFromValue(nibble >> 1);
  }
  return next;
}

/** `[hours | type << 5, minutes, seconds, frames, fractional frames]`. */
export function highResTimeCodeBytes(tc: HighResTimeCode): number[] {
  return [
    hourByte(tc),
    clampInt(tc.minutes, 0, 59),
    clampInt(tc.seconds, 0, 59),
    clampInt(tc.frames, 0, 29),
    clampInt(tc.fractionalFrames, 0, 99),
  ];
}

export function readHighResTimeCode(bytes: ArrayLike<number>, offset: number): HighResTimeCode {
  const codeHour = readU7(bytes, offset);
  const fractionalFrames = readU7(bytes, offset + 4);
  if (fractionalFrames > 99) throw invalid("Fractional frames must be at most 99");
  return {
    hours: codeHour & 0x1f,
    codeType: timeCodeTypeFromValue(codeHour >> 5),
    minutes: readU7(bytes, offset + 1) & 0x3f,
    seconds: readU7(bytes, offset + 2) & 0x3f,
    frames: readU7(bytes, offset + 3) & 0x1f,
    fractionalFrames,
  };
}

const STATUS_ESTIMATED = 0x40;
const STATUS_INVALID = 0x20;
const STATUS_VIDEO_FIELD_ONE = 0x10;
const STATUS_NO_TIME_CODE = 0x08;
const FRAME_NEGATIVE = 0x40;
const FRAME_CARRIES_STATUS = 0x20;

export function standardTimeCodeBytes(tc: StandardTimeCode): number[] {
  let frameByte = clampInt(tc.frames, 0, 29);
  if (tc.negative) frameByte |= FRAME_NEGATIVE;
  let last = clampInt(tc.subframes, 0, 99);
  if (tc.status) {
    frameByte |= FRAME_CARRIES_STATUS;
    last =
      (tc.status.estimatedCode ? STATUS_ESTIMATED : 0) |
      (tc.status.invalidCode ? STATUS_INVALID : 0) |
      (tc.status.videoFieldOne ? STATUS_VIDEO_FIELD_ONE : 0) |
      (tc.status.noTimeCode ? STATUS_NO_TIME_CODE : 0);
  }
  return [hourByte(tc), clampInt(tc.minutes, 0, 59), clampInt(tc.seconds, 0, 59), frameByte, last];
}

export function readStandardTimeCode(bytes: ArrayLike<number>, offset: number): StandardTimeCode {
  const codeHour = readU7(bytes, offset);
  const frameByte = readU7(bytes, offset + 3);
  const last = readU7(bytes, offset + 4);
  const tc: StandardTimeCode = {
    hours: codeHour & 0x1f,
    codeType: timeCodeTypeFromValue(codeHour >> 5),
    minutes: readU7(bytes, offset + 1) & 0x3f,
    seconds: readU7(bytes, offset + 2) & 0x3f,
    frames: frameByte & 0x1f,
    negative: (frameByte & FRAME_NEGATIVE) !== 0,
    subframes: 0,
  };
  if (frameByte & FRAME_CARRIES_STATUS) {
    tc.status = {
      estimatedCode: (last & STATUS_ESTIMATED) !== 0,
      invalidCode: (last & STATUS_INVALID) !== 0,
      videoFieldOne: (last & STATUS_VIDEO_FIELD_ONE) !== 0,
      noTimeCode: (last & STATUS_NO_TIME_CODE) !== 0,
    };
  } else {
    tc.subframes = last;
  }
  return tc;
}

/** Nine bytes: each user-bits byte as high then low nibble, then the two flags. */
export function userBitsBytes(bits: UserBits): number[] {
  const out: number[] = [];
  for (const b of bits.bytes) {
    const v = clampInt(b, 0, 0xff);
    out.push(v >> 4, v & 0xf);
  }
  out.push((bits.flag2 ? 0x2 : 0) | (bits.flag1 ? 0x1 : 0));
  return out;
}

export function readUserBits(bytes: ArrayLike<number>, offset: number): UserBits {
  const nibble = (i: number): number => readU7(bytes, offset + i) & 0xf;
  const flags = readU7(bytes, offset + 8);
  return {
    bytes: [
      (nibble(0) << 4) | nibble(1),
      (nibble(2) << 4) | nibble(3),
      (nibble(4) << 4) | nibble(5),
      (nibble(6) << 4) | nibble(7),
    ],
    flag1: (flags & 0x1) !== 0,
    flag2: (flags & 0x2) !== 0,
  };
}
