import { boolFromU7, boolToU7, clampInt, replaceU14Lsb, toU14, toU7, u14FromU7s } from "./bytes";
import {
  entryMsb,
  entryParameter,
  PARAMETER_CONTROLLERS,
  Parameter,
  parameterEntry,
  pushParameter,
  registeredParameterFromNumbers,
} from "./parameter";

export type HighResController =
  | "bankSelect"
  | "modWheel"
  | "breath"
  | "foot"
  | "portamento"
  | "dataEntry"
  | "volume"
  | "balance"
  | "pan"
  | "expression"
  | "effect1"
  | "effect2"
  | "generalPurpose1"
  | "generalPurpose2"
  | "generalPurpose3"
  | "generalPurpose4";

export type ByteController =
  | "hold"
  | "sostenuto"
  | "softPedal"
  | "hold2"
  | "soundControl1"
  | "soundControl2"
  | "soundControl3"
  | "soundControl4"
  | "soundControl5"
  | "soundControl6"
  | "soundControl7"
  | "soundControl8"
  | "soundControl9"
  | "soundControl10"
  | "generalPurpose5"
  | "generalPurpose6"
  | "generalPurpose7"
  | "generalPurpose8"
  | "portamentoControl"
  | "highResVelocity"
  | "effects1Depth"
  | "effects2Depth"
  | "effects3Depth"
  | "effects4Depth"
  | "effects5Depth"
  | "dataIncrement"
  | "dataDecrement"
  // Default names of the sound and effect controllers. Decoding reports the numbered names.
  | "soundVariation"
  | "timbre"
  | "releaseTime"
  | "attackTime"
  | "brightness"
  | "decayTime"
  | "vibratoRate"
  | "vibratoDepth"
  | "vibratoDelay"
  | "reverbSendLevel"
  | "tremoloDepth"
  | "chorusSendLevel"
  | "celesteDepth"
  | "phaserDepth";

export type ControlChange =
  | { kind: "highRes"; controller: HighResController; value: number }
  | { kind: "byte"; controller: ByteController; value: number }
  | { kind: "togglePortamento"; on: boolean }
  | { kind: "toggleLegato"; on: boolean }
  | { kind: "undefined"; control: number; value: number }
  | { kind: "undefinedHighRes"; control1: number; control2: number; value: number }
  /** Same bytes as a `highRes` `dataEntry`, and decodes back as one. */
  | { kind: "dataEntry2"; msb: number; lsb: number }
  | { kind: "parameter"; parameter: Parameter };

const CC_TOGGLE_PORTAMENTO = 65;
const CC_TOGGLE_LEGATO = 68;
const CC_HIGH_RES_VELOCITY = 0x58;
const CC_LAST_VOICE_CONTROLLER = 119;
const LSB_OFFSET = 32;

const HIGH_RES_CONTROLLERS: Record<HighResController, number> = {
  bankSelect: 0,
  modWheel: 1,
  breath: 2,
  foot: 4,
  portamento: 5,
  dataEntry: 6,
  volume: 7,
  balance: 8,
  pan: 10,
  expression: 11,
  effect1: 12,
  effect2: 13,
  generalPurpose1: 16,
  generalPurpose2: 17,
  generalPurpose3: 18,
  generalPurpose4: 19,
};

/** MSB controllers 0x00..0x1F with no assigned function. */
const UNDEFINED_HIGH_RES = new Set([3, 9, 14, 15, 20, 21, 22, 23, 24, 25, 26, 27, 28, 29, 30, 31]);

const BYTE_CONTROLLERS: Record<ByteController, number> = {
  hold: 64,
  sostenuto: 66,
  softPedal: 67,
  hold2: 69,
  soundControl1: 70,
  soundControl2: 71,
  soundControl3: 72,
  soundControl4: 73,
  soundControl5: 74,
  soundControl6: 75,
  soundControl7: 76,
  soundControl8: 77,
  soundControl9: 78,
  soundControl10: 79,
  generalPurpose5: 80,
  generalPurpose6: 81,
  generalPurpose7: 82,
  generalPurpose8: 83,
  portamentoControl: 84,
  highResVelocity: CC_HIGH_RES_VELOCITY,
  effects1Depth: 91,
  effects2Depth: 92,
  effects3Depth: 93,
  effects4Depth: 94,
  effects5Depth: 95,
  dataIncrement: 96,
  dataDecrement: 97,
  soundVariation: 70,
  timbre: 71,
  releaseTime: 72,
  attackTime: 73,
  brightness: 74,
  decayTime: 75,
  vibratoRate: 76,
  vibratoDepth: 77,
  vibratoDelay: 78,
  reverbSendLevel: 91,
  tremoloDepth: 92,
  chorusSendLevel: 93,
  celesteDepth: 94,
  phaserDepth: 95,
};

const HIGH_RES_BY_NUMBER = new Map<number, HighResController>();
const BYTE_BY_NUMBER = new Map<number, ByteController>();
for (const name of Object.keys(HIGH_RES_CONTROLLERS)) {
  if (isHighResController(name)) HIGH_RES_BY_NUMBER.set(HIGH_RES_CONTROLLERS[name], name);
}
for (const name of Object.keys(BYTE_CONTROLLERS)) {
  // First name wins, so the numbered names stay canonical.
  if (isByteController(name) && !BYTE_BY_NUMBER.has(BYTE_CONTROLLERS[name])) {
    BYTE_BY_NUMBER.set(BYTE_CONTROLLERS[name], name);
  }
}

function isHighResController(name: string): name is HighResController {
  return Object.prototype.hasOwnProperty.call(HIGH_RES_CONTROLLERS, name);
}

function isByteController(name: string): name is ByteController {
  return Object.prototype.hasOwnProperty.call(BYTE_CONTROLLERS, name);
}

export function highResControllerNumber(controller: HighResController): number {
  return HIGH_RES_CONTROLLERS[controller];
}

export function byteControllerNumber(controller: ByteController): number {
  return BYTE_CONTROLLERS[controller];
}

function clampControl(control: number): number {
  return clampInt(control, 0, CC_LAST_VOICE_CONTROLLER);
}

/** Appends the controller/value pairs of a control change, without status bytes. */
export function pushControlChange(cc: ControlChange, out: number[]): void {
  switch (cc.kind) {
    case "highRes": {
      const control = HIGH_RES_CONTROLLERS[cc.controller];
      const [msb, lsb] = toU14(cc.value);
      out.push(control, msb, control + LSB_OFFSET, lsb);
      return;
    }
    case "byte":
      out.push(BYTE_CONTROLLERS[cc.controller], toU7(cc.value));
      return;
    case "togglePortamento":
      out.push(CC_TOGGLE_PORTAMENTO, boolToU7(cc.on));
      return;
    case "toggleLegato":
      out.push(CC_TOGGLE_LEGATO, boolToU7(cc.on));
      return;
    case "undefined":
      out.push(clampControl(cc.control), toU7(cc.value));
      return;
    case "undefinedHighRes": {
      const [msb, lsb] = toU14(cc.value);
      out.push(clampControl(cc.control1), msb, clampControl(cc.control2), lsb);
      return;
    }
    case "dataEntry2":
      out.push(PARAMETER_CONTROLLERS.dataEntry, toU7(cc.msb), PARAMETER_CONTROLLERS.dataEntryLsb, toU7(cc.lsb));
      return;
    case "parameter":
      pushParameter(cc.parameter, out);
      return;
  }
}

/** Interprets a single controller/value pair. Assembly with neighbours happens in `mergeControlChange`. */
export function decodeControlChange(control: number, value: number): ControlChange {
  const highRes = HIGH_RES_BY_NUMBER.get(control);
  if (highRes !== undefined) return { kind: "highRes", controller: highRes, value: value << 7 };
  if (UNDEFINED_HIGH_RES.has(control)) {
    return { kind: "undefinedHighRes", control1: control, control2: control + LSB_OFFSET, value: value << 7 };
  }
  if (control === CC_TOGGLE_PORTAMENTO) return { kind: "togglePortamento", on: boolFromU7(value) };
  if (control === CC_TOGGLE_LEGATO) return { kind: "toggleLegato", on: boolFromU7(value) };
  const byte = BYTE_BY_NUMBER.get(control);
  if (byte !== undefined) return { kind: "byte", controller: byte, value };
  return { kind: "undefined", control, value };
}

export function isMsb(cc: ControlChange): boolean {
  switch (cc.kind) {
    case "highRes":
    case "undefinedHighRes":
      return true;
    case "undefined":
      return cc.control < LSB_OFFSET || cc.control === PARAMETER_CONTROLLERS.nrpnMsb || cc.control === PARAMETER_CONTROLLERS.rpnMsb;
    default:
      return false;
  }
}

export function isLsb(cc: ControlChange): boolean {
  if (cc.kind !== "undefined") return false;
  return (
    (cc.control >= LSB_OFFSET && cc.control < 2 * LSB_OFFSET) ||
    cc.control === PARAMETER_CONTROLLERS.nrpnLsb ||
    cc.control === PARAMETER_CONTROLLERS.rpnLsb
  );
}

/** Whether a later control change may complete this one. */
export function isExtensible(cc: ControlChange): boolean {
  return cc.kind === "parameter" || isMsb(cc) || isLsb(cc);
}

/** Whether this control change may complete an earlier message. */
export function isExtension(cc: ControlChange): boolean {
  return isMsb(cc) || isLsb(cc) || isHighResVelocity(cc);
}

export function isHighResVelocity(cc: ControlChange): cc is { kind: "byte"; controller: ByteController; value: number } {
  return cc.kind === "byte" && BYTE_CONTROLLERS[cc.controller] === CC_HIGH_RES_VELOCITY;
}

function selection(msbControl: number, lsbControl: number, msb: number, lsb: number): Parameter | undefined {
  if (msbControl === PARAMETER_CONTROLLERS.nrpnMsb && lsbControl === PARAMETER_CONTROLLERS.nrpnLsb) {
    return { kind: "unregistered", number: u14FromU7s(msb, lsb) };
  }
  if (msbControl === PARAMETER_CONTROLLERS.rpnMsb && lsbControl === PARAMETER_CONTROLLERS.rpnLsb) {
    const parameter = registeredParameterFromNumbers(msb, lsb);
    return parameter === undefined ? undefined : { kind: "registered", parameter };
  }
  return undefined;
}

/**
 * Combines two adjacent control changes on one channel into the message they form together:
 * a 14-bit controller and its LSB, an RPN/NRPN number pair, or a parameter and its data entry.
 * Returns undefined when the pair does not combine.
 */
export function mergeControlChange(first: ControlChange, next: ControlChange): ControlChange | undefined {
  if (first.kind === "highRes" && next.kind === "undefined") {
    if (next.control === HIGH_RES_CONTROLLERS[first.controller] + LSB_OFFSET) {
      return { ...first, value: replaceU14Lsb(first.value, next.value) };
    }
    return undefined;
  }
  if (first.kind === "undefined" && next.kind === "highRes") {
    if (first.control === HIGH_RES_CONTROLLERS[next.controller] + LSB_OFFSET) {
      return { ...next, value: replaceU14Lsb(next.value, first.value) };
    }
    return undefined;
  }
  if (first.kind === "undefinedHighRes" && next.kind === "undefined" && next.control === first.control2) {
    return { ...first, value: replaceU14Lsb(first.value, next.value) };
  }
  if (first.kind === "undefined" && next.kind === "undefined") {
    const parameter = isMsb(first)
      ? selection(first.control, next.control, first.value, next.value)
      : selection(next.control, first.control, next.value, first.value);
    return parameter === undefined ? undefined : { kind: "parameter", parameter };
  }
  if (first.kind === "parameter") {
    const param = first.parameter;
    if (param.kind === "registered" && next.kind === "highRes" && next.controller === "dataEntry") {
      const entry = parameterEntry(param.parameter, next.value >> 7);
      return entry === undefined ? undefined : { kind: "parameter", parameter: entry };
    }
    const selected = entryParameter(param);
    const msb = entryMsb(param);
    if (selected !== undefined && msb !== undefined && next.kind === "undefined" && next.control === PARAMETER_CONTROLLERS.dataEntryLsb) {
      const entry = parameterEntry(selected, msb, next.value);
      return entry === undefined ? undefined : { kind: "parameter", parameter: entry };
    }
  }
  return undefined;
}

/** Folds a run of raw controller/value bytes into the control change they assemble to. */
export function assembleControlChange(bytes: readonly number[]): ControlChange | undefined {
  let cc: ControlChange | undefined;
  for (let i = 0; i + 1 < bytes.length; i += 2) {
    const next = decodeControlChange(bytes[i], bytes[i + 1]);
    if (cc === undefined) {
      cc = next;
      continue;
    }
    const merged = mergeControlChange(cc, next);
    if (merged === undefined) return undefined;
    cc = merged;
  }
  return cc;
}
