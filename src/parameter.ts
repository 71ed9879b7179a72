import { clampInt, i14FromU7s, iToU14, iToU7, toU14, toU7, u14FromU7s, u7ToI } from "./bytes";

const CC_DATA_ENTRY = 6;
const CC_DATA_ENTRY_LSB = 38;
const CC_NRPN_LSB = 98;
const CC_NRPN_MSB = 99;
const CC_RPN_LSB = 100;
const CC_RPN_MSB = 101;

/** Registered parameters whose entry value is a plain 14-bit number. */
export type HighResRegisteredParameter =
  | "modulationDepthRange"
  | "azimuthAngle"
  | "elevationAngle"
  | "gain"
  | "distanceRatio"
  | "maximumDistance"
  | "gainAtMaximumDistance"
  | "referenceDistanceRatio"
  | "panSpreadAngle"
  | "rollAngle";

export type RegisteredParameter =
  | "null"
  | "pitchBendSensitivity"
  | "fineTuning"
  | "coarseTuning"
  | "tuningProgramSelect"
  | "tuningBankSelect"
  | "polyphonicExpression"
  | HighResRegisteredParameter;

export type Parameter =
  | { kind: "registered"; parameter: RegisteredParameter }
  | { kind: "unregistered"; number: number }
  | { kind: "pitchBendSensitivityEntry"; semitones: number; cents: number }
  | { kind: "fineTuningEntry"; value: number }
  | { kind: "coarseTuningEntry"; value: number }
  | { kind: "tuningProgramSelectEntry"; program: number }
  | { kind: "tuningBankSelectEntry"; bank: number }
  | { kind: "polyphonicExpressionEntry"; channels: number }
  | { kind: "registeredEntry"; parameter: HighResRegisteredParameter; value: number };

/** `[msb, lsb]` carried by CC 101 / CC 100. */
const REGISTERED_NUMBERS: Record<RegisteredParameter, readonly [number, number]> = {
  null: [0x7f, 0x7f],
  pitchBendSensitivity: [0x00, 0x00],
  fineTuning: [0x00, 0x01],
  coarseTuning: [0x00, 0x02],
  tuningProgramSelect: [0x00, 0x03],
  tuningBankSelect: [0x00, 0x04],
  modulationDepthRange: [0x00, 0x05],
  polyphonicExpression: [0x00, 0x06],
  azimuthAngle: [0x3d, 0x00],
  elevationAngle: [0x3d, 0x01],
  gain: [0x3d, 0x02],
  distanceRatio: [0x3d, 0x03],
  maximumDistance: [0x3d, 0x04],
  gainAtMaximumDistance: [0x3d, 0x05],
  referenceDistanceRatio: [0x3d, 0x06],
  panSpreadAngle: [0x3d, 0x07],
  rollAngle: [0x3d, 0x08],
};

const REGISTERED_BY_NUMBER = new Map<number, RegisteredParameter>();
for (const [name, [msb, lsb]] of Object.entries(REGISTERED_NUMBERS)) {
  if (isRegisteredParameter(name)) REGISTERED_BY_NUMBER.set(u14FromU7s(msb, lsb), name);
}

function isRegisteredParameter(name: string): name is RegisteredParameter {
  return Object.prototype.hasOwnProperty.call(REGISTERED_NUMBERS, name);
}

export function registeredParameterFromNumbers(msb: number, lsb: number): RegisteredParameter | undefined {
  return REGISTERED_BY_NUMBER.get(u14FromU7s(msb, lsb));
}

/** The registered parameter an entry form writes to, or undefined for bare selections. */
export function entryParameter(param: Parameter): RegisteredParameter | undefined {
  switch (param.kind) {
    case "pitchBendSensitivityEntry":
      return "pitchBendSensitivity";
    case "fineTuningEntry":
      return "fineTuning";
    case "coarseTuningEntry":
      return "coarseTuning";
    case "tuningProgramSelectEntry":
      return "tuningProgramSelect";
    case "tuningBankSelectEntry":
      return "tuningBankSelect";
    case "polyphonicExpressionEntry":
      return "polyphonicExpression";
    case "registeredEntry":
      return param.parameter;
    default:
      return undefined;
  }
}

/** The data entry bytes `[msb, lsb]` an entry form carries; `lsb` is undefined when none is sent. */
function entryData(param: Parameter): [number, number | undefined] | undefined {
  switch (param.kind) {
    case "pitchBendSensitivityEntry":
      return [toU7(param.semitones), clampInt(param.cents, 0, 100)];
    case "fineTuningEntry":
      return iToU14(param.value);
    case "coarseTuningEntry":
      return [iToU7(param.value), 0];
    case "tuningProgramSelectEntry":
      return [toU7(param.program), undefined];
    case "tuningBankSelectEntry":
      return [toU7(param.bank), undefined];
    case "polyphonicExpressionEntry":
      return [clampInt(param.channels, 0, 16), undefined];
    case "registeredEntry":
      return toU14(param.value);
    default:
      return undefined;
  }
}

function selectRegistered(parameter: RegisteredParameter, out: number[]): void {
  const [msb, lsb] = REGISTERED_NUMBERS[parameter];
  out.push(CC_RPN_LSB, lsb, CC_RPN_MSB, msb);
}

/** Controller/value pairs for a parameter selection and, for entry forms, its data entry. */
export function pushParameter(param: Parameter, out: number[]): void {
  if (param.kind === "unregistered") {
    const [msb, lsb] = toU14(param.number);
    out.push(CC_NRPN_LSB, lsb, CC_NRPN_MSB, msb);
    return;
  }
  if (param.kind === "registered") {
    selectRegistered(param.parameter, out);
    return;
  }
  const parameter = entryParameter(param);
  const data = entryData(param);
  if (parameter === undefined || data === undefined) return;
  selectRegistered(parameter, out);
  const [msb, lsb] = data;
  out.push(CC_DATA_ENTRY, msb);
  if (lsb !== undefined) out.push(CC_DATA_ENTRY_LSB, lsb);
}

/** Builds the entry form for a selected parameter from data entry bytes. */
export function parameterEntry(parameter: RegisteredParameter, msb: number, lsb = 0): Parameter | undefined {
  switch (parameter) {
    case "null":
      return undefined;
    case "pitchBendSensitivity":
      return { kind: "pitchBendSensitivityEntry", semitones: msb, cents: Math.min(lsb, 100) };
    case "fineTuning":
      return { kind: "fineTuningEntry", value: i14FromU7s(msb, lsb) };
    case "coarseTuning":
      return { kind: "coarseTuningEntry", value: u7ToI(msb) };
    case "tuningProgramSelect":
      return { kind: "tuningProgramSelectEntry", program: msb };
    case "tuningBankSelect":
      return { kind: "tuningBankSelectEntry", bank: msb };
    case "polyphonicExpression":
      return { kind: "polyphonicExpressionEntry", channels: Math.min(msb, 16) };
    default:
      return { kind: "registeredEntry", parameter, value: u14FromU7s(msb, lsb) };
  }
}

/** The data entry MSB an entry form carries. */
export function entryMsb(param: Parameter): number | undefined {
  return entryData(param)?.[0];
}

export const PARAMETER_CONTROLLERS = {
  dataEntry: CC_DATA_ENTRY,
  dataEntryLsb: CC_DATA_ENTRY_LSB,
  nrpnLsb: CC_NRPN_LSB,
  nrpnMsb: CC_NRPN_MSB,
  rpnLsb: CC_RPN_LSB,
  rpnMsb: CC_RPN_MSB,
} as const;
