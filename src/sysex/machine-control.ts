import { ByteReader } from "../bytes";
import { invalid } from "../errors";
import { readStandardTimeCode, StandardTimeCode, standardTimeCodeBytes } from "../time-code";

export type SimpleMachineCommand =
  | "stop"
  | "play"
  | "deferredPlay"
  | "fastForward"
  | "rewind"
  | "recordStrobe"
  | "recordExit"
  | "recordPause"
  | "pause"
  | "eject"
  | "chase"
  | "commandErrorReset"
  | "mmcReset"
  | "wait"
  | "resume";

export type InformationField =
  | "selectedTimeCode"
  | "selectedMasterCode"
  | "requestedOffset"
  | "actualOffset"
  | "lockDeviation"
  | "generatorTimeCode"
  | "midiTimeCodeInput"
  | "generalPurpose0"
  | "generalPurpose1"
  | "generalPurpose2"
  | "generalPurpose3"
  | "generalPurpose4"
  | "generalPurpose5"
  | "generalPurpose6"
  | "generalPurpose7";

export type MachineControlCommand =
  | { kind: SimpleMachineCommand }
  | { kind: "locateInformationField"; field: InformationField }
  | { kind: "locateTarget"; target: StandardTimeCode }
  /** Any other command, carried as the bytes following the 06 sub-id. */
  | { kind: "unimplemented"; data: number[] };

export const SUB_ID_MACHINE_CONTROL_COMMAND = 0x06;
export const SUB_ID_MACHINE_CONTROL_RESPONSE = 0x07;
const LOCATE = 0x44;
const LOCATE_INFORMATION_FIELD = 0x00;
const LOCATE_TARGET = 0x01;

const SIMPLE_COMMANDS: Record<SimpleMachineCommand, number> = {
  stop: 0x01,
  play: 0x02,
  deferredPlay: 0x03,
  fastForward: 0x04,
  rewind: 0x05,
  recordStrobe: 0x06,
  recordExit: 0x07,
  recordPause: 0x08,
  pause: 0x09,
  eject: 0x0a,
  chase: 0x0b,
  commandErrorReset: 0x0c,
  mmcReset: 0x0d,
  wait: 0x7c,
  resume: 0x7f,
};

const INFORMATION_FIELDS: readonly InformationField[] = [
  "selectedTimeCode",
  "selectedMasterCode",
  "requestedOffset",
  "actualOffset",
  "lockDeviation",
  "generatorTimeCode",
  "midiTimeCodeInput",
  "generalPurpose0",
  "generalPurpose1",
  "generalPurpose2",
  "generalPurpose3",
  "generalPurpose4",
  "generalPurpose5",
  "generalPurpose6",
  "generalPurpose7",
];

function isSimpleCommand(name: string): name is SimpleMachineCommand {
  return Object.prototype.hasOwnProperty.call(SIMPLE_COMMANDS, name);
}

export function pushMachineControlCommand(command: MachineControlCommand, out: number[]): void {
  out.push(SUB_ID_MACHINE_CONTROL_COMMAND);
  switch (command.kind) {
    case "locateInformationField":
      out.push(LOCATE, 0x02, LOCATE_INFORMATION_FIELD, INFORMATION_FIELDS.indexOf(command.field) + 1);
      return;
    case "locateTarget":
      out.push(LOCATE, 0x06, LOCATE_TARGET, ...standardTimeCodeBytes(command.target));
      return;
    case "unimplemented":
      out.push(...command.data.map(b => b & 0x7f));
      return;
    default:
      out.push(SIMPLE_COMMANDS[command.kind]);
  }
}

export function readMachineControlCommand(reader: ByteReader): MachineControlCommand {
  const first = reader.peek();
  if (first === LOCATE) {
    reader.u7();
    const length = reader.u7();
    const form = reader.u7();
    if (form === LOCATE_INFORMATION_FIELD && length === 2) {
      const field = INFORMATION_FIELDS[reader.u7() - 1];
      if (field === undefined) throw invalid("Unknown locate information field");
      return { kind: "locateInformationField", field };
    }
    if (form === LOCATE_TARGET && length === 6) {
      const target = readStandardTimeCode(reader.take(5), 0);
      return { kind: "locateTarget", target };
    }
    throw invalid("Malformed machine control locate command");
  }
  if (first !== undefined && reader.remaining === 1) {
    for (const [name, value] of Object.entries(SIMPLE_COMMANDS)) {
      if (value === first && isSimpleCommand(name)) {
        reader.u7();
        return { kind: name };
      }
    }
  }
  return { kind: "unimplemented", data: reader.rest() };
}
