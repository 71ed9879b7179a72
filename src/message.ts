import { readU7 } from "./bytes";
import {
  channelDataLength,
  channelIndex,
  channelVoiceStatus,
  ChannelVoiceMsg,
  decodeChannelVoiceData,
  pushChannelVoice,
  STATUS_CONTROL_CHANGE,
  STATUS_NOTE_OFF,
  STATUS_NOTE_ON,
  statusByte,
} from "./channel-voice";
import { ChannelModeMsg, decodeChannelMode, FIRST_CHANNEL_MODE_CONTROLLER, pushChannelMode } from "./channel-mode";
import { cloneReceiverContext, createReceiverContext, ReceiverContext } from "./context";
import {
  assembleControlChange,
  ControlChange,
  decodeControlChange,
  isHighResVelocity,
  mergeControlChange,
} from "./control-change";
import { contextlessRunningStatus, unexpectedEnd } from "./errors";
import { decodeMeta, META_PREFIX, Meta, pushMeta } from "./meta";
import { decodeSystemCommon, pushSystemCommon, systemCommonLength, SystemCommonMsg } from "./system-common";
import { decodeSystemRealTime, isRealTimeStatus, systemRealTimeByte, SystemRealTimeMsg } from "./system-real-time";
import { decodeSystemExclusive, pushSystemExclusive, SYSEX_END, SYSEX_START, SystemExclusiveMsg } from "./sysex/system-exclusive";

/**
 * Any MIDI 1.0 message. The running variants encode without their status byte;
 * decoding always yields the explicit variants.
 */
export type MidiMsg =
  | { kind: "channelVoice"; channel: number; msg: ChannelVoiceMsg }
  | { kind: "runningChannelVoice"; channel: number; msg: ChannelVoiceMsg }
  | { kind: "channelMode"; channel: number; msg: ChannelModeMsg }
  | { kind: "runningChannelMode"; channel: number; msg: ChannelModeMsg }
  | { kind: "systemCommon"; msg: SystemCommonMsg }
  | { kind: "systemRealTime"; msg: SystemRealTimeMsg }
  | { kind: "systemExclusive"; msg: SystemExclusiveMsg }
  /** Only inside SMF tracks. */
  | { kind: "meta"; msg: Meta };

export interface DecodedMessage {
  message: MidiMsg;
  /** Bytes of the input taken by this message. */
  consumed: number;
}

const CC_HIGH_RES_VELOCITY = 0x58;

export function isChannelVoice(msg: MidiMsg): msg is Extract<MidiMsg, { kind: "channelVoice" | "runningChannelVoice" }> {
  return msg.kind === "channelVoice" || msg.kind === "runningChannelVoice";
}

export function isChannelMode(msg: MidiMsg): msg is Extract<MidiMsg, { kind: "channelMode" | "runningChannelMode" }> {
  return msg.kind === "channelMode" || msg.kind === "runningChannelMode";
}

export function isSystemCommon(msg: MidiMsg): msg is Extract<MidiMsg, { kind: "systemCommon" }> {
  return msg.kind === "systemCommon";
}

export function isSystemRealTime(msg: MidiMsg): msg is Extract<MidiMsg, { kind: "systemRealTime" }> {
  return msg.kind === "systemRealTime";
}

export function isSystemExclusive(msg: MidiMsg): msg is Extract<MidiMsg, { kind: "systemExclusive" }> {
  return msg.kind === "systemExclusive";
}

export function isMeta(msg: MidiMsg): msg is Extract<MidiMsg, { kind: "meta" }> {
  return msg.kind === "meta";
}

/** The channel (1 to 16) of a channel message, otherwise undefined. */
export function messageChannel(msg: MidiMsg): number | undefined {
  return isChannelVoice(msg) || isChannelMode(msg) ? channelIndex(msg.channel) + 1 : undefined;
}

function pushMessage(msg: MidiMsg, running: boolean, out: number[]): void {
  switch (msg.kind) {
    case "channelVoice":
    case "runningChannelVoice":
      pushChannelVoice(msg.msg, msg.channel, running || msg.kind === "runningChannelVoice", out);
      return;
    case "channelMode":
    case "runningChannelMode":
      if (!running && msg.kind === "channelMode") out.push(statusByte(STATUS_CONTROL_CHANGE, msg.channel));
      pushChannelMode(msg.msg, out);
      return;
    case "systemCommon":
      pushSystemCommon(msg.msg, out);
      return;
    case "systemRealTime":
      out.push(systemRealTimeByte(msg.msg));
      return;
    case "systemExclusive":
      pushSystemExclusive(msg.msg, out);
      return;
    case "meta":
      pushMeta(msg.msg, out);
      return;
  }
}

export function encode(msg: MidiMsg): number[] {
  const out: number[] = [];
  pushMessage(msg, false, out);
  return out;
}

export function encodeMany(msgs: readonly MidiMsg[]): number[] {
  const out: number[] = [];
  for (const msg of msgs) pushMessage(msg, false, out);
  return out;
}

/**
 * Encodes as a transmitter holding `ctx` would: a channel message that repeats the previous
 * status and channel goes out under running status. Updates `ctx` the way a receiver would.
 */
export function encodeWithContext(msg: MidiMsg, ctx: ReceiverContext): number[] {
  const out: number[] = [];
  if (isChannelVoice(msg) || isChannelMode(msg)) {
    const status = isChannelVoice(msg) ? channelVoiceStatus(msg.msg) : STATUS_CONTROL_CHANGE;
    const channel = channelIndex(msg.channel) + 1;
    const prev = ctx.previousChannelStatus;
    const running = prev !== null && prev.status === status && prev.channel === channel;
    pushMessage(msg, running, out);
    const highRes = isChannelVoice(msg) && (msg.msg.kind === "highResNoteOn" || msg.msg.kind === "highResNoteOff");
    ctx.previousChannelStatus = { status: highRes ? STATUS_CONTROL_CHANGE : status, channel };
    return out;
  }
  pushMessage(msg, false, out);
  if (msg.kind === "systemCommon" || msg.kind === "systemExclusive") {
    ctx.previousChannelStatus = null;
    ctx.previousControl = null;
  }
  return out;
}

/**
 * Decodes the first message of `bytes` with no prior state. Running status is rejected.
 * A message cut short by a real-time byte is dropped: only the real-time message comes back.
 */
export function decode(bytes: ArrayLike<number>): DecodedMessage {
  return decodeWithContext(bytes, createReceiverContext());
}

/**
 * Decodes the first message of `bytes`, reading and updating `ctx`. The context is only
 * updated when decoding succeeds.
 *
 * A real-time byte inside another message is returned first; the bytes before it are held in
 * `ctx.interrupted` and completed by the next call.
 */
export function decodeWithContext(bytes: ArrayLike<number>, ctx: ReceiverContext): DecodedMessage {
  const held = ctx.interrupted;
  const input: ArrayLike<number> = held.length > 0 ? [...held, ...Array.from(bytes)] : bytes;
  if (input.length === 0) throw unexpectedEnd();
  const draft = cloneReceiverContext(ctx);
  draft.interrupted = [];
  const decoded = decodeInput(input, draft);
  Object.assign(ctx, draft);
  return { message: decoded.message, consumed: decoded.consumed - held.length };
}

/** Decodes every message in `bytes`. */
export function decodeAll(bytes: ArrayLike<number>, ctx: ReceiverContext = createReceiverContext()): MidiMsg[] {
  const view = bytes instanceof Uint8Array ? bytes : Uint8Array.from(bytes);
  const out: MidiMsg[] = [];
  let offset = 0;
  while (offset < view.length) {
    const { message, consumed } = decodeWithContext(view.subarray(offset), ctx);
    out.push(message);
    offset += consumed;
  }
  return out;
}

function decodeInput(input: ArrayLike<number>, ctx: ReceiverContext): DecodedMessage {
  if (!ctx.parsingSmf) {
    const at = findInterleavedRealTime(input, ctx);
    if (at !== undefined) {
      ctx.interrupted = Array.from(input).slice(0, at);
      return { message: { kind: "systemRealTime", msg: decodeSystemRealTime(input[at]) }, consumed: at + 1 };
    }
  }
  const first = input[0];
  if (ctx.isSmfSysex || first === SYSEX_START) {
    const { msg, consumed } = decodeSystemExclusive(input, ctx);
    clearChannelState(ctx);
    return { message: { kind: "systemExclusive", msg }, consumed };
  }
  if (first >= 0xf8) {
    if (ctx.parsingSmf && first === META_PREFIX) {
      const { meta, consumed } = decodeMeta(input, 0);
      return { message: { kind: "meta", msg: meta }, consumed };
    }
    return { message: { kind: "systemRealTime", msg: decodeSystemRealTime(first) }, consumed: 1 };
  }
  if (first >= 0xf0) {
    const { msg, consumed } = decodeSystemCommon(input, ctx);
    clearChannelState(ctx);
    return { message: { kind: "systemCommon", msg }, consumed };
  }
  return decodeChannel(input, ctx);
}

function clearChannelState(ctx: ReceiverContext): void {
  ctx.previousChannelStatus = null;
  ctx.previousControl = null;
}

/** Index of the first real-time status byte inside the message at the head of `input`. */
function findInterleavedRealTime(input: ArrayLike<number>, ctx: ReceiverContext): number | undefined {
  const first = input[0];
  let end: number;
  if (first < 0x80) {
    if (ctx.previousChannelStatus === null) return undefined;
    end = channelDataLength(ctx.previousChannelStatus.status);
  } else if (first < 0xf0) {
    end = 1 + channelDataLength(first >> 4);
  } else if (first === SYSEX_START) {
    end = input.length;
  } else if (first < SYSEX_END) {
    end = 1 + Math.max(0, systemCommonLength(first));
  } else {
    return undefined;
  }
  for (let i = 1; i < Math.min(end, input.length); i++) {
    const b = input[i];
    if (first === SYSEX_START && b === SYSEX_END) return undefined;
    if (isRealTimeStatus(b)) return i;
  }
  return undefined;
}

interface PeekedControl {
  control: number;
  value: number;
  length: number;
}

/**
 * Reads a voice control change at `at` on `channel`, either with its own status byte or as
 * running data when the running status is a control change.
 */
function peekControlChange(input: ArrayLike<number>, at: number, channel: number, runningStatus: number): PeekedControl | undefined {
  if (at >= input.length) return undefined;
  const first = input[at];
  let start: number;
  if (first === statusByte(STATUS_CONTROL_CHANGE, channel)) start = at + 1;
  else if (first < 0x80 && runningStatus === STATUS_CONTROL_CHANGE) start = at;
  else return undefined;
  if (start + 1 >= input.length) return undefined;
  const control = input[start];
  const value = input[start + 1];
  if (control >= FIRST_CHANNEL_MODE_CONTROLLER || value > 0x7f) return undefined;
  return { control, value, length: start + 2 - at };
}

function clearPendingVelocity(ctx: ReceiverContext, channel: number): void {
  if (ctx.pendingHighResVelocity?.channel === channel) ctx.pendingHighResVelocity = null;
}

function voice(channel: number, msg: ChannelVoiceMsg): MidiMsg {
  return { kind: "channelVoice", channel, msg };
}

function decodeChannel(input: ArrayLike<number>, ctx: ReceiverContext): DecodedMessage {
  const first = input[0];
  let status: number;
  let channel: number;
  let dataStart: number;
  if (first < 0x80) {
    if (ctx.previousChannelStatus === null) throw contextlessRunningStatus();
    ({ status, channel } = ctx.previousChannelStatus);
    dataStart = 0;
  } else {
    status = first >> 4;
    channel = (first & 0x0f) + 1;
    dataStart = 1;
  }
  const length = channelDataLength(status);
  const data1 = readU7(input, dataStart);
  const data2 = length === 2 ? readU7(input, dataStart + 1) : 0;
  const consumed = dataStart + length;
  ctx.previousChannelStatus = { status, channel };

  if (status === STATUS_CONTROL_CHANGE) return decodeControl(input, consumed, channel, data1, data2, ctx);

  ctx.previousControl = null;
  const isNote = status === STATUS_NOTE_ON || status === STATUS_NOTE_OFF;
  if (isNote && ctx.complexCc) {
    const kind = status === STATUS_NOTE_ON ? "highResNoteOn" : "highResNoteOff";
    // Inside a track the velocity CC is an event of its own and arrives through the pending LSB.
    const next = ctx.parsingSmf ? undefined : peekControlChange(input, consumed, channel, status);
    if (next !== undefined && next.control === CC_HIGH_RES_VELOCITY) {
      clearPendingVelocity(ctx, channel);
      ctx.previousChannelStatus = { status: STATUS_CONTROL_CHANGE, channel };
      return {
        message: voice(channel, { kind, note: data1, velocity: (data2 << 7) | next.value }),
        consumed: consumed + next.length,
      };
    }
    const pending = ctx.pendingHighResVelocity;
    if (pending !== null && pending.channel === channel) {
      ctx.pendingHighResVelocity = null;
      return { message: voice(channel, { kind, note: data1, velocity: (data2 << 7) | pending.lsb }), consumed };
    }
  }
  clearPendingVelocity(ctx, channel);
  return { message: voice(channel, decodeChannelVoiceData(status, data1, data2)), consumed };
}

function decodeControl(
  input: ArrayLike<number>,
  consumed: number,
  channel: number,
  control: number,
  value: number,
  ctx: ReceiverContext,
): DecodedMessage {
  if (control >= FIRST_CHANNEL_MODE_CONTROLLER) {
    ctx.previousControl = null;
    clearPendingVelocity(ctx, channel);
    return { message: { kind: "channelMode", channel, msg: decodeChannelMode(control, value) }, consumed };
  }
  if (!ctx.complexCc) {
    return { message: voice(channel, { kind: "controlChange", control: { kind: "undefined", control, value } }), consumed };
  }

  let cc: ControlChange = decodeControlChange(control, value);
  let bytes = [control, value];
  const prev = ctx.previousControl;
  if (prev !== null && prev.channel === channel) {
    const assembled = assembleControlChange(prev.bytes);
    const merged = assembled === undefined ? undefined : mergeControlChange(assembled, cc);
    if (merged !== undefined) {
      cc = merged;
      bytes = [...prev.bytes, control, value];
    }
  }
  // Inside a track the next bytes are a delta time, so only wire streams look ahead.
  if (!ctx.parsingSmf) {
    for (;;) {
      const next = peekControlChange(input, consumed, channel, STATUS_CONTROL_CHANGE);
      if (next === undefined) break;
      const merged = mergeControlChange(cc, decodeControlChange(next.control, next.value));
      if (merged === undefined) break;
      cc = merged;
      consumed += next.length;
      bytes.push(next.control, next.value);
    }
  }
  ctx.previousControl = { channel, bytes };
  if (isHighResVelocity(cc)) ctx.pendingHighResVelocity = { channel, lsb: cc.value };
  else clearPendingVelocity(ctx, channel);
  return { message: voice(channel, { kind: "controlChange", control: cc }), consumed };
}
