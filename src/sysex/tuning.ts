import {
  ByteReader,
  centsToU14,
  freqToMidiNoteCents,
  i14FromU7s,
  iToU14,
  iToU7,
  pushAscii,
  toU14,
  toU7,
  u14FromU7s,
  u7ToI,
} from "../bytes";
import { channelIndex } from "../channel-voice";

/** A note's pitch: a semitone plus a 14-bit fraction of the way to the next one. */
export interface Tuning {
  semitone: number;
  fraction: number;
}

export interface NoteTuning {
  note: number;
  /** null leaves the note unchanged. */
  tuning: Tuning | null;
}

export interface TuningNoteChange {
  tuningProgramNum: number;
  tuningBankNum?: number;
  tunings: NoteTuning[];
}

export interface KeyBasedTuningDump {
  tuningProgramNum: number;
  tuningBankNum?: number;
  name: string;
  /** Indexed by note. Missing notes are sent at their equal-tempered pitch. */
  tunings: (Tuning | null)[];
}

export interface ScaleTuningDump {
  tuningProgramNum: number;
  tuningBankNum: number;
  name: string;
  /** Offsets from equal temperament for C through B. */
  tuning: number[];
}

export interface ScaleTuning {
  channels: number[];
  tuning: number[];
}

export interface TuningBulkDumpRequest {
  tuningProgramNum: number;
  tuningBankNum?: number;
}

export const SUB_ID_TUNING = 0x08;
export const TUNING_BULK_DUMP_REQUEST = 0x00;
export const KEY_BASED_TUNING_DUMP = 0x01;
export const TUNING_NOTE_CHANGE = 0x02;
export const TUNING_BULK_DUMP_REQUEST_BANK = 0x03;
export const KEY_BASED_TUNING_DUMP_BANK = 0x04;
export const SCALE_TUNING_DUMP_1_BYTE = 0x05;
export const SCALE_TUNING_DUMP_2_BYTE = 0x06;
export const TUNING_NOTE_CHANGE_BANK = 0x07;
export const SCALE_TUNING_1_BYTE = 0x08;
export const SCALE_TUNING_2_BYTE = 0x09;

const NAME_LENGTH = 16;
const NOTE_COUNT = 128;
const SCALE_LENGTH = 12;
const NO_CHANGE = 0x7f;
const LOWEST_FREQ = 8.17358;
const HIGHEST_FREQ = 13289.73;

/** The nearest representable tuning for a frequency in Hz, clamped to the MIDI note range. */
export function tuningFromFreq(freq: number): Tuning {
  if (freq < LOWEST_FREQ) return { semitone: 0, fraction: 0 };
  if (freq > HIGHEST_FREQ) return { semitone: 127, fraction: 0x3fff };
  const { note, cents } = freqToMidiNoteCents(freq);
  return { semitone: note, fraction: Math.min(centsToU14(cents), 0x3ffe) };
}

/** Semitone, fraction MSB, fraction LSB. */
export function pushTuning(tuning: Tuning | null, out: number[]): void {
  if (tuning === null) {
    out.push(NO_CHANGE, NO_CHANGE, NO_CHANGE);
    return;
  }
  const [msb, lsb] = toU14(tuning.fraction);
  out.push(toU7(tuning.semitone), msb, lsb);
}

export function readTuning(reader: ByteReader): Tuning | null {
  const semitone = reader.u7();
  const msb = reader.u7();
  const lsb = reader.u7();
  if (semitone === NO_CHANGE && msb === NO_CHANGE && lsb === NO_CHANGE) return null;
  return { semitone, fraction: u14FromU7s(msb, lsb) };
}

function pushName(name: string, out: number[]): void {
  pushAscii(name, NAME_LENGTH, out);
}

function readName(reader: ByteReader): string {
  return reader.ascii(NAME_LENGTH).trimEnd();
}

/**
 * Real-time changes without a bank use the short 08 02 form; non-real-time changes always
 * carry a bank (0 when absent).
 */
export function pushTuningNoteChange(change: TuningNoteChange, realTime: boolean, out: number[]): void {
  const tunings = change.tunings.slice(0, 127);
  if (realTime && change.tuningBankNum === undefined) {
    out.push(SUB_ID_TUNING, TUNING_NOTE_CHANGE);
  } else {
    out.push(SUB_ID_TUNING, TUNING_NOTE_CHANGE_BANK, toU7(change.tuningBankNum ?? 0));
  }
  out.push(toU7(change.tuningProgramNum), tunings.length);
  for (const { note, tuning } of tunings) {
    out.push(toU7(note));
    pushTuning(tuning, out);
  }
}

export function readTuningNoteChange(reader: ByteReader, withBank: boolean): TuningNoteChange {
  const tuningBankNum = withBank ? reader.u7() : undefined;
  const tuningProgramNum = reader.u7();
  const count = reader.u7();
  const tunings: NoteTuning[] = [];
  for (let i = 0; i < count; i++) {
    const note = reader.u7();
    tunings.push({ note, tuning: readTuning(reader) });
  }
  return withBank ? { tuningProgramNum, tuningBankNum, tunings } : { tuningProgramNum, tunings };
}

/** Ends with a checksum placeholder. */
export function pushKeyBasedTuningDump(dump: KeyBasedTuningDump, out: number[]): void {
  if (dump.tuningBankNum === undefined) {
    out.push(SUB_ID_TUNING, KEY_BASED_TUNING_DUMP);
  } else {
    out.push(SUB_ID_TUNING, KEY_BASED_TUNING_DUMP_BANK, toU7(dump.tuningBankNum));
  }
  out.push(toU7(dump.tuningProgramNum));
  pushName(dump.name, out);
  for (let note = 0; note < NOTE_COUNT; note++) {
    const tuning = dump.tunings[note];
    pushTuning(tuning === undefined ? { semitone: note, fraction: 0 } : tuning, out);
  }
  out.push(0);
}

export function readKeyBasedTuningDump(reader: ByteReader, withBank: boolean): KeyBasedTuningDump {
  const tuningBankNum = withBank ? reader.u7() : undefined;
  const tuningProgramNum = reader.u7();
  const name = readName(reader);
  const tunings: (Tuning | null)[] = [];
  for (let note = 0; note < NOTE_COUNT; note++) tunings.push(readTuning(reader));
  return withBank ? { tuningProgramNum, tuningBankNum, name, tunings } : { tuningProgramNum, name, tunings };
}

function scaleValues(tuning: number[]): number[] {
  return Array.from({ length: SCALE_LENGTH }, (_, i) => tuning[i] ?? 0);
}

function pushScaleValues(tuning: number[], twoByte: boolean, out: number[]): void {
  for (const value of scaleValues(tuning)) {
    if (twoByte) {
      const [msb, lsb] = iToU14(value);
      out.push(lsb, msb);
    } else {
      out.push(iToU7(value));
    }
  }
}

function readScaleValues(reader: ByteReader, twoByte: boolean): number[] {
  const values: number[] = [];
  for (let i = 0; i < SCALE_LENGTH; i++) {
    if (twoByte) {
      const lsb = reader.u7();
      values.push(i14FromU7s(reader.u7(), lsb));
    } else {
      values.push(u7ToI(reader.u7()));
    }
  }
  return values;
}

/** Ends with a checksum placeholder. */
export function pushScaleTuningDump(dump: ScaleTuningDump, twoByte: boolean, out: number[]): void {
  out.push(SUB_ID_TUNING, twoByte ? SCALE_TUNING_DUMP_2_BYTE : SCALE_TUNING_DUMP_1_BYTE);
  out.push(toU7(dump.tuningBankNum), toU7(dump.tuningProgramNum));
  pushName(dump.name, out);
  pushScaleValues(dump.tuning, twoByte, out);
  out.push(0);
}

export function readScaleTuningDump(reader: ByteReader, twoByte: boolean): ScaleTuningDump {
  const tuningBankNum = reader.u7();
  const tuningProgramNum = reader.u7();
  const name = readName(reader);
  return { tuningProgramNum, tuningBankNum, name, tuning: readScaleValues(reader, twoByte) };
}

/** Three bytes: channels 16-15, 14-8, 7-1, lowest channel in bit 0. */
export function pushChannelBitmap(channels: number[], out: number[]): void {
  const bitmap = [0, 0, 0];
  for (const channel of channels) {
    const index = channelIndex(channel);
    bitmap[2 - Math.floor(index / 7)] |= 1 << index % 7;
  }
  out.push(...bitmap);
}

export function readChannelBitmap(reader: ByteReader): number[] {
  const bitmap = reader.take(3);
  const channels: number[] = [];
  for (let index = 0; index < 16; index++) {
    if (bitmap[2 - Math.floor(index / 7)] & (1 << index % 7)) channels.push(index + 1);
  }
  return channels;
}

export function pushScaleTuning(tuning: ScaleTuning, twoByte: boolean, out: number[]): void {
  out.push(SUB_ID_TUNING, twoByte ? SCALE_TUNING_2_BYTE : SCALE_TUNING_1_BYTE);
  pushChannelBitmap(tuning.channels, out);
  pushScaleValues(tuning.tuning, twoByte, out);
}

export function readScaleTuning(reader: ByteReader, twoByte: boolean): ScaleTuning {
  const channels = readChannelBitmap(reader);
  return { channels, tuning: readScaleValues(reader, twoByte) };
}

export function pushTuningBulkDumpRequest(request: TuningBulkDumpRequest, out: number[]): void {
  if (request.tuningBankNum === undefined) {
    out.push(SUB_ID_TUNING, TUNING_BULK_DUMP_REQUEST, toU7(request.tuningProgramNum));
  } else {
    out.push(SUB_ID_TUNING, TUNING_BULK_DUMP_REQUEST_BANK, toU7(request.tuningBankNum), toU7(request.tuningProgramNum));
  }
}

export function readTuningBulkDumpRequest(reader: ByteReader, withBank: boolean): TuningBulkDumpRequest {
  if (!withBank) return { tuningProgramNum: reader.u7() };
  const tuningBankNum = reader.u7();
  return { tuningProgramNum: reader.u7(), tuningBankNum };
}
