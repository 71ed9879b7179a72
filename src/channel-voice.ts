import { clampInt, pushU14, toU14, toU7, u14FromU7s } from "./bytes";
import { ControlChange, pushControlChange } from "./control-change";

export type ChannelVoiceMsg =
  | { kind: "noteOff"; note: number; velocity: number }
  | { kind: "noteOn"; note: number; velocity: number }
  /** Note off with a 14-bit velocity; the LSB travels in a trailing CC 0x58. */
  | { kind: "highResNoteOff"; note: number; velocity: number }
  | { kind: "highResNoteOn"; note: number; velocity: number }
  | { kind: "polyPressure"; note: number; pressure: number }
  | { kind: "controlChange"; control: ControlChange }
  | { kind: "programChange"; program: number }
  | { kind: "channelPressure"; pressure: number }
  | { kind: "pitchBend"; bend: number };

export const STATUS_NOTE_OFF = 0x8;
export const STATUS_NOTE_ON = 0x9;
export const STATUS_POLY_PRESSURE = 0xa;
export const STATUS_CONTROL_CHANGE = 0xb;
export const STATUS_PROGRAM_CHANGE = 0xc;
export const STATUS_CHANNEL_PRESSURE = 0xd;
export const STATUS_PITCH_BEND = 0xe;

const CC_HIGH_RES_VELOCITY = 0x58;

/** Channels are 1..16 in values and 0..15 on the wire. */
export function channelIndex(channel: number): number {
  return clampInt(channel, 1, 16) - 1;
}

export function statusByte(status: number, channel: number): number {
  return (status << 4) | channelIndex(channel);
}

export function channelVoiceStatus(msg: ChannelVoiceMsg): number {
  switch (msg.kind) {
    case "noteOff":
    case "highResNoteOff":
      return STATUS_NOTE_OFF;
    case "noteOn":
    case "highResNoteOn":
      return STATUS_NOTE_ON;
    case "polyPressure":
      return STATUS_POLY_PRESSURE;
    case "controlChange":
      return STATUS_CONTROL_CHANGE;
    case "programChange":
      return STATUS_PROGRAM_CHANGE;
    case "channelPressure":
      return STATUS_CHANNEL_PRESSURE;
    case "pitchBend":
      return STATUS_PITCH_BEND;
  }
}

export function channelDataLength(status: number): number {
  return status === STATUS_PROGRAM_CHANGE || status === STATUS_CHANNEL_PRESSURE ? 1 : 2;
}

/**
 * Appends a channel voice message. With `running` the leading status byte is left out;
 * the CC that carries a high-resolution velocity LSB always gets its own status byte.
 */
export function pushChannelVoice(msg: ChannelVoiceMsg, channel: number, running: boolean, out: number[]): void {
  const status = channelVoiceStatus(msg);
  if (!running) out.push(statusByte(status, channel));
  switch (msg.kind) {
    case "noteOff":
    case "noteOn":
      out.push(toU7(msg.note), toU7(msg.velocity));
      return;
    case "highResNoteOff":
    case "highResNoteOn": {
      const [msb, lsb] = toU14(msg.velocity);
      out.push(toU7(msg.note), msb, statusByte(STATUS_CONTROL_CHANGE, channel), CC_HIGH_RES_VELOCITY, lsb);
      return;
    }
    case "polyPressure":
      out.push(toU7(msg.note), toU7(msg.pressure));
      return;
    case "controlChange":
      // Multi-pair controls continue under running status.
      pushControlChange(msg.control, out);
      return;
    case "programChange":
      out.push(toU7(msg.program));
      return;
    case "channelPressure":
      out.push(toU7(msg.pressure));
      return;
    case "pitchBend":
      pushU14(msg.bend, out);
      return;
  }
}

/** Decodes the data bytes of every channel voice message except control change. */
export function decodeChannelVoiceData(status: number, data1: number, data2: number): ChannelVoiceMsg {
  switch (status) {
    case STATUS_NOTE_OFF:
      return { kind: "noteOff", note: data1, velocity: data2 };
    case STATUS_NOTE_ON:
      return { kind: "noteOn", note: data1, velocity: data2 };
    case STATUS_POLY_PRESSURE:
      return { kind: "polyPressure", note: data1, pressure: data2 };
    case STATUS_PROGRAM_CHANGE:
      return { kind: "programChange", program: data1 };
    case STATUS_CHANNEL_PRESSURE:
      return { kind: "channelPressure", pressure: data1 };
    default:
      return { kind: "pitchBend", bend: u14FromU7s(data2, data1) };
  }
}
