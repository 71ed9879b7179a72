import { boolFromU7, boolToU7, clampInt } from "./bytes";

export type PolyMode = { kind: "mono"; channels: number } | { kind: "poly" };

export type ChannelModeMsg =
  | { kind: "allSoundOff" }
  | { kind: "resetAllControllers" }
  | { kind: "localControl"; on: boolean }
  | { kind: "allNotesOff" }
  | { kind: "omniMode"; on: boolean }
  | { kind: "polyMode"; mode: PolyMode };

const CC_ALL_SOUND_OFF = 120;
const CC_RESET_ALL_CONTROLLERS = 121;
const CC_LOCAL_CONTROL = 122;
const CC_ALL_NOTES_OFF = 123;
const CC_OMNI_OFF = 124;
const CC_OMNI_ON = 125;
const CC_MONO_ON = 126;
const CC_POLY_ON = 127;

export const FIRST_CHANNEL_MODE_CONTROLLER = CC_ALL_SOUND_OFF;

/** Appends the controller/value pair of a channel mode message. */
export function pushChannelMode(msg: ChannelModeMsg, out: number[]): void {
  switch (msg.kind) {
    case "allSoundOff":
      out.push(CC_ALL_SOUND_OFF, 0);
      return;
    case "resetAllControllers":
      out.push(CC_RESET_ALL_CONTROLLERS, 0);
      return;
    case "localControl":
      out.push(CC_LOCAL_CONTROL, boolToU7(msg.on));
      return;
    case "allNotesOff":
      out.push(CC_ALL_NOTES_OFF, 0);
      return;
    case "omniMode":
      out.push(msg.on ? CC_OMNI_ON : CC_OMNI_OFF, 0);
      return;
    case "polyMode":
      if (msg.mode.kind === "mono") out.push(CC_MONO_ON, clampInt(msg.mode.channels, 0, 16));
      else out.push(CC_POLY_ON, 0);
      return;
  }
}

export function decodeChannelMode(control: number, value: number): ChannelModeMsg {
  switch (control) {
    case CC_ALL_SOUND_OFF:
      return { kind: "allSoundOff" };
    case CC_RESET_ALL_CONTROLLERS:
      return { kind: "resetAllControllers" };
    case CC_LOCAL_CONTROL:
      return { kind: "localControl", on: boolFromU7(value) };
    case CC_ALL_NOTES_OFF:
      return { kind: "allNotesOff" };
    case CC_OMNI_OFF:
      return { kind: "omniMode", on: false };
    case CC_OMNI_ON:
      return { kind: "omniMode", on: true };
    case CC_MONO_ON:
      return { kind: "polyMode", mode: { kind: "mono", channels: Math.min(value, 16) } };
    default:
      return { kind: "polyMode", mode: { kind: "poly" } };
  }
}
