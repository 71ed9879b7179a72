import { ByteReader, clampInt, toU7 } from "../bytes";

export type SlotPath = { kind: "reverb" } | { kind: "chorus" } | { kind: "unregistered"; msb: number; lsb: number };

export interface GlobalParameter {
  /** Parameter id bytes, most significant first. */
  id: number[];
  /** Value bytes, least significant first. */
  value: number[];
}

export interface GlobalParameterControl {
  slotPaths: SlotPath[];
  paramIdWidth: number;
  valueWidth: number;
  params: GlobalParameter[];
}

export type ReverbType = "smallRoom" | "mediumRoom" | "largeRoom" | "mediumHall" | "largeHall" | "plate";

export type ChorusType = "chorus1" | "chorus2" | "chorus3" | "chorus4" | "feedbackChorus" | "flanger";

export interface ReverbSettings {
  type?: ReverbType;
  /** Reverb time in seconds. */
  time?: number;
}

export interface ChorusSettings {
  type?: ChorusType;
  /** Modulation rate in Hz. */
  modRate?: number;
  /** Modulation depth in ms. */
  modDepth?: number;
  /** Feedback in percent. */
  feedback?: number;
  /** Send to reverb in percent. */
  sendToReverb?: number;
}

export const SUB_ID_DEVICE_CONTROL = 0x04;
export const GLOBAL_PARAMETER_CONTROL = 0x05;

const REVERB_TYPES: Record<ReverbType, number> = {
  smallRoom: 0,
  mediumRoom: 1,
  largeRoom: 2,
  mediumHall: 3,
  largeHall: 4,
  plate: 8,
};

const CHORUS_TYPES: Record<ChorusType, number> = {
  chorus1: 0,
  chorus2: 1,
  chorus3: 2,
  chorus4: 3,
  feedbackChorus: 4,
  flanger: 5,
};

function pushSlotPath(path: SlotPath, out: number[]): void {
  switch (path.kind) {
    case "reverb":
      out.push(0x01, 0x01);
      return;
    case "chorus":
      out.push(0x01, 0x02);
      return;
    case "unregistered":
      out.push(toU7(path.msb), toU7(path.lsb));
      return;
  }
}

function readSlotPath(reader: ByteReader): SlotPath {
  const msb = reader.u7();
  const lsb = reader.u7();
  if (msb === 0x01 && lsb === 0x01) return { kind: "reverb" };
  if (msb === 0x01 && lsb === 0x02) return { kind: "chorus" };
  return { kind: "unregistered", msb, lsb };
}

export function pushGlobalParameterControl(control: GlobalParameterControl, out: number[]): void {
  const slotPaths = control.slotPaths.slice(0, 127);
  const idWidth = clampInt(control.paramIdWidth, 1, 127);
  const valueWidth = clampInt(control.valueWidth, 1, 127);
  out.push(SUB_ID_DEVICE_CONTROL, GLOBAL_PARAMETER_CONTROL, slotPaths.length, idWidth, valueWidth);
  slotPaths.forEach(path => pushSlotPath(path, out));
  for (const param of control.params) {
    for (let i = 0; i < idWidth; i++) out.push(toU7(param.id[i] ?? 0));
    for (let i = valueWidth - 1; i >= 0; i--) out.push(toU7(param.value[i] ?? 0));
  }
}

export function readGlobalParameterControl(reader: ByteReader): GlobalParameterControl {
  const slotCount = reader.u7();
  const paramIdWidth = reader.u7();
  const valueWidth = reader.u7();
  const slotPaths: SlotPath[] = [];
  for (let i = 0; i < slotCount; i++) slotPaths.push(readSlotPath(reader));
  const params: GlobalParameter[] = [];
  const paramLength = paramIdWidth + valueWidth;
  while (paramLength > 0 && reader.remaining >= paramLength) {
    const id = reader.take(paramIdWidth);
    const value = reader.take(valueWidth).reverse();
    params.push({ id, value });
  }
  return { slotPaths, paramIdWidth, valueWidth, params };
}

function saturate(value: number): number {
  return clampInt(value, 0, 0x7f);
}

/** GM2 reverb parameters: type (id 0) and time (id 1). */
export function reverbParameters(settings: ReverbSettings): GlobalParameterControl {
  const params: GlobalParameter[] = [];
  if (settings.type !== undefined) params.push({ id: [0], value: [REVERB_TYPES[settings.type]] });
  if (settings.time !== undefined) {
    params.push({ id: [1], value: [saturate(Math.log(settings.time) / 0.025 + 40)] });
  }
  return { slotPaths: [{ kind: "reverb" }], paramIdWidth: 1, valueWidth: 1, params };
}

/** GM2 chorus parameters: type, mod rate, mod depth, feedback and send to reverb (ids 0 to 4). */
export function chorusParameters(settings: ChorusSettings): GlobalParameterControl {
  const params: GlobalParameter[] = [];
  if (settings.type !== undefined) params.push({ id: [0], value: [CHORUS_TYPES[settings.type]] });
  if (settings.modRate !== undefined) params.push({ id: [1], value: [saturate(settings.modRate / 0.122)] });
  if (settings.modDepth !== undefined) params.push({ id: [2], value: [saturate(settings.modDepth * 3.2 - 1)] });
  if (settings.feedback !== undefined) params.push({ id: [3], value: [saturate(settings.feedback / 0.763)] });
  if (settings.sendToReverb !== undefined) {
    params.push({ id: [4], value: [saturate(settings.sendToReverb / 0.787)] });
  }
  return { slotPaths: [{ kind: "chorus" }], paramIdWidth: 1, valueWidth: 1, params };
}
