export type ParseErrorKind =
  | "unexpectedEnd"
  | "byteOverflow"
  | "contextlessRunningStatus"
  | "noEndOfSystemExclusiveFlag"
  | "unexpectedEndOfSystemExclusiveFlag"
  | "vlqOverflow"
  | "undefinedSystemCommonMessage"
  | "undefinedSystemRealTimeMessage"
  | "undefinedSystemExclusiveMessage"
  | "invalid"
  | "notImplemented";

const MESSAGE_PREFIX = "Error parsing MIDI input: ";

function hex(byte: number): string {
  return `0x${byte.toString(16).padStart(2, "0").toUpperCase()}`;
}

function describe(kind: ParseErrorKind, detail?: string | number): string {
  switch (kind) {
    case "unexpectedEnd":
      return "The input ended before a MIDI message could be fully formed";
    case "byteOverflow":
      return "A data byte exceeded 7 bits";
    case "contextlessRunningStatus":
      return "Received a non-status byte with no prior channel messages";
    case "noEndOfSystemExclusiveFlag":
      return "Tried to read a System Exclusive message, but the end flag (0xF7) was not found";
    case "unexpectedEndOfSystemExclusiveFlag":
      return "Received an end of System Exclusive flag (0xF7) outside of a System Exclusive message";
    case "vlqOverflow":
      return "A variable-length quantity exceeded four bytes";
    case "undefinedSystemCommonMessage":
      return `Encountered undefined System Common message ${typeof detail === "number" ? hex(detail) : ""}`.trimEnd();
    case "undefinedSystemRealTimeMessage":
      return `Encountered undefined System Real Time message ${typeof detail === "number" ? hex(detail) : ""}`.trimEnd();
    case "undefinedSystemExclusiveMessage":
      return `Encountered undefined System Exclusive message ${typeof detail === "number" ? hex(detail) : ""}`.trimEnd();
    case "invalid":
      return String(detail ?? "Invalid input");
    case "notImplemented":
      return `${String(detail ?? "This message")} is not yet implemented`;
  }
}

/**
 * The one error type thrown by every decoder. `kind` discriminates the failure;
 * `detail` carries the offending byte or a reason string where one applies.
 */
export class MidiParseError extends RangeError {
  readonly kind: ParseErrorKind;
  readonly detail?: string | number;

  constructor(kind: ParseErrorKind, detail?: string | number) {
    super(MESSAGE_PREFIX + describe(kind, detail));
    this.name = "MidiParseError";
    this.kind = kind;
    this.detail = detail;
  }
}

export const unexpectedEnd = (): MidiParseError => new MidiParseError("unexpectedEnd");
export const byteOverflow = (): MidiParseError => new MidiParseError("byteOverflow");
export const contextlessRunningStatus = (): MidiParseError => new MidiParseError("contextlessRunningStatus");
export const noEndOfSystemExclusiveFlag = (): MidiParseError => new MidiParseError("noEndOfSystemExclusiveFlag");
export const unexpectedEndOfSystemExclusiveFlag = (): MidiParseError =>
  new MidiParseError("unexpectedEndOfSystemExclusiveFlag");
export const vlqOverflow = (): MidiParseError => new MidiParseError("vlqOverflow");
export const undefinedSystemCommonMessage = (byte: number): MidiParseError =>
  new MidiParseError("undefinedSystemCommonMessage", byte);
export const undefinedSystemRealTimeMessage = (byte: number): MidiParseError =>
  new MidiParseError("undefinedSystemRealTimeMessage", byte);
export const undefinedSystemExclusiveMessage = (byte?: number): MidiParseError =>
  new MidiParseError("undefinedSystemExclusiveMessage", byte);
export const invalid = (reason: string): MidiParseError => new MidiParseError("invalid", reason);
export const notImplemented = (feature: string): MidiParseError => new MidiParseError("notImplemented", feature);
