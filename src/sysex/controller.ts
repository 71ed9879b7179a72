import { ByteReader, clampInt, toU7 } from "../bytes";
import { channelIndex } from "../channel-voice";
import { invalid } from "../errors";

export type ControlledParameter =
  | "pitch"
  | "filterCutoff"
  | "amplitude"
  | "lfoPitchDepth"
  | "lfoFilterDepth"
  | "lfoAmplitudeDepth";

export interface ControllerRange {
  parameter: ControlledParameter;
  range: number;
}

export type ControllerSource = { kind: "channelPressure" } | { kind: "polyPressure" } | { kind: "controlChange"; control: number };

/** Routes a controller on one channel to synthesis parameters. */
export interface ControllerDestination {
  source: ControllerSource;
  channel: number;
  ranges: ControllerRange[];
}

export interface KeyControl {
  control: number;
  value: number;
}

/** Per-key controller values. */
export interface KeyBasedInstrumentControl {
  channel: number;
  key: number;
  controls: KeyControl[];
}

export const SUB_ID_CONTROLLER_DESTINATION = 0x09;
export const SUB_ID_KEY_BASED_INSTRUMENT_CONTROL = 0x0a;
const SOURCE_CHANNEL_PRESSURE = 0x01;
const SOURCE_POLY_PRESSURE = 0x02;
const SOURCE_CONTROL_CHANGE = 0x03;
const KEY_BASED_CONTROLLER = 0x01;

const CONTROLLED_PARAMETERS: readonly ControlledParameter[] = [
  "pitch",
  "filterCutoff",
  "amplitude",
  "lfoPitchDepth",
  "lfoFilterDepth",
  "lfoAmplitudeDepth",
];

/** Only 0x01-0x1F and 0x40-0x5F may be routed. */
function destinationControl(control: number): number {
  return control < 0x40 ? clampInt(control, 0x01, 0x1f) : clampInt(control, 0x40, 0x5f);
}

/** Controllers that cannot be set per key fall back to modulation (0x01). */
function keyBasedControl(control: number): number {
  const c = toU7(control);
  if (c === 0x06 || c === 0x26 || (c >= 0x60 && c <= 0x65) || c >= 0x78) return 0x01;
  return c;
}

export function pushControllerDestination(destination: ControllerDestination, out: number[]): void {
  out.push(SUB_ID_CONTROLLER_DESTINATION);
  switch (destination.source.kind) {
    case "channelPressure":
      out.push(SOURCE_CHANNEL_PRESSURE, channelIndex(destination.channel));
      break;
    case "polyPressure":
      out.push(SOURCE_POLY_PRESSURE, channelIndex(destination.channel));
      break;
    case "controlChange":
      out.push(SOURCE_CONTROL_CHANGE, channelIndex(destination.channel), destinationControl(destination.source.control));
      break;
  }
  for (const { parameter, range } of destination.ranges) {
    out.push(CONTROLLED_PARAMETERS.indexOf(parameter), toU7(range));
  }
}

export function readControllerDestination(reader: ByteReader, subId: number): ControllerDestination {
  const channel = reader.u7() + 1;
  let source: ControllerSource;
  switch (subId) {
    case SOURCE_CHANNEL_PRESSURE:
      source = { kind: "channelPressure" };
      break;
    case SOURCE_POLY_PRESSURE:
      source = { kind: "polyPressure" };
      break;
    case SOURCE_CONTROL_CHANGE:
      source = { kind: "controlChange", control: reader.u7() };
      break;
    default:
      throw invalid(`Unknown controller destination source 0x${subId.toString(16)}`);
  }
  if (channel > 16) throw invalid("Controller destination channel out of range");
  const ranges: ControllerRange[] = [];
  while (reader.remaining >= 2) {
    const parameter = CONTROLLED_PARAMETERS[reader.u7()];
    if (parameter === undefined) throw invalid("Unknown controlled parameter");
    ranges.push({ parameter, range: reader.u7() });
  }
  return { source, channel, ranges };
}

export function pushKeyBasedInstrumentControl(control: KeyBasedInstrumentControl, out: number[]): void {
  out.push(SUB_ID_KEY_BASED_INSTRUMENT_CONTROL, KEY_BASED_CONTROLLER, channelIndex(control.channel), toU7(control.key));
  for (const { control: c, value } of control.controls) out.push(keyBasedControl(c), toU7(value));
}

export function readKeyBasedInstrumentControl(reader: ByteReader): KeyBasedInstrumentControl {
  const channel = reader.u7() + 1;
  if (channel > 16) throw invalid("Key-based instrument control channel out of range");
  const key = reader.u7();
  const controls: KeyControl[] = [];
  while (reader.remaining >= 2) {
    const control = reader.u7();
    controls.push({ control, value: reader.u7() });
  }
  return { channel, key, controls };
}
