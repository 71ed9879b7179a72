import { clampInt, pushU16, pushU32, pushVlq, readAscii, readU16, readU32, readVlq, sliceBytes } from "./bytes";
import { createReceiverContext, ReceiverContext } from "./context";
import { isHighResVelocity } from "./control-change";
import { invalid, MidiParseError, notImplemented, unexpectedEnd } from "./errors";
import { encode, decodeWithContext, MidiMsg } from "./message";
import { decodeMeta, META_PREFIX } from "./meta";
import { decodeSystemExclusive, SYSEX_END, SYSEX_START } from "./sysex/system-exclusive";
import { TimeCodeType } from "./time-code";

export type SmfFormat = "singleTrack" | "multiTrack" | "multiSong";

export type Division =
  | { kind: "ticksPerQuarterNote"; ticks: number }
  | { kind: "timeCode"; fps: TimeCodeType; ticksPerFrame: number };

export interface SmfHeader {
  format: SmfFormat;
  numTracks: number;
  division: Division;
}

export interface TrackEvent {
  deltaTime: number;
  event: MidiMsg;
  /** Position from the start of the track, in beats or frames depending on the division. */
  beatOrFrame: number;
}

/** A chunk whose tag is not `MTrk` is kept whole, tag and length included. */
export type Track = { kind: "midi"; events: TrackEvent[] } | { kind: "alienChunk"; data: number[] };

export interface MidiFile {
  header: SmfHeader;
  tracks: Track[];
}

export interface MidiFileDecodeOptions {
  /** Assemble control changes inside tracks. */
  complexCc?: boolean;
}

const HEADER_TAG = "MThd";
const TRACK_TAG = "MTrk";
const HEADER_LENGTH = 6;
const NEXT_BYTES_SHOWN = 20;
const SMF_FORMATS: readonly SmfFormat[] = ["singleTrack", "multiTrack", "multiSong"];
const SMPTE_FPS: Record<TimeCodeType, number> = { fps24: 24, fps25: 25, df30: 29, ndf30: 30 };

/**
 * Thrown by `decodeMidiFile`. Carries the file as far as it was read and where reading stopped.
 */
export class MidiFileParseError extends Error {
  readonly error: MidiParseError;
  readonly file: MidiFile;
  readonly offset: number;
  /** "header", "track N" or "track N event I". */
  readonly parsing: string;
  readonly remainingBytes: number;
  readonly nextBytes: number[];

  constructor(error: MidiParseError, file: MidiFile, offset: number, parsing: string, input: ArrayLike<number>) {
    super(`Error parsing MIDI file at position ${offset}: ${error.message}`);
    this.name = "MidiFileParseError";
    this.error = error;
    this.file = file;
    this.offset = offset;
    this.parsing = parsing;
    this.remainingBytes = Math.max(0, input.length - offset);
    this.nextBytes = sliceBytes(input, offset, offset + NEXT_BYTES_SHOWN);
  }
}

export function defaultDivision(): Division {
  return { kind: "ticksPerQuarterNote", ticks: 96 };
}

export function createMidiFile(format: SmfFormat = "multiTrack", division: Division = defaultDivision()): MidiFile {
  return { header: { format, numTracks: 0, division }, tracks: [] };
}

export function beatOrFrameToTick(division: Division, beatOrFrame: number): number {
  const unit = division.kind === "ticksPerQuarterNote" ? division.ticks : division.ticksPerFrame;
  return Math.max(0, Math.trunc(beatOrFrame * unit));
}

export function ticksToBeatsOrFrames(division: Division, ticks: number): number {
  const unit = division.kind === "ticksPerQuarterNote" ? division.ticks : division.ticksPerFrame;
  return unit === 0 ? 0 : ticks / unit;
}

export function addTrack(file: MidiFile, track: Track = { kind: "midi", events: [] }): void {
  file.tracks.push(track);
  file.header.numTracks += 1;
}

export function removeTrack(file: MidiFile, index: number): Track {
  if (index < 0 || index >= file.tracks.length) throw new RangeError(`No track at index ${index}`);
  const [removed] = file.tracks.splice(index, 1);
  file.header.numTracks -= 1;
  return removed;
}

/** Appends `event` at the absolute position `beatOrFrame`, deriving its delta time from the previous event. */
export function extendTrack(file: MidiFile, index: number, event: MidiMsg, beatOrFrame: number): TrackEvent {
  const track = file.tracks[index];
  if (track === undefined) throw new RangeError(`No track at index ${index}`);
  if (track.kind === "alienChunk") throw new RangeError("Cannot add events to an alien chunk");
  const division = file.header.division;
  const last = track.events.length > 0 ? track.events[track.events.length - 1].beatOrFrame : 0;
  const deltaTime = Math.max(0, beatOrFrameToTick(division, beatOrFrame) - beatOrFrameToTick(division, last));
  const trackEvent: TrackEvent = { deltaTime, event, beatOrFrame };
  track.events.push(trackEvent);
  return trackEvent;
}

function pushDivision(division: Division, out: number[]): void {
  if (division.kind === "ticksPerQuarterNote") {
    pushU16(clampInt(division.ticks, 1, 0x7fff), out);
    return;
  }
  out.push((0x100 - SMPTE_FPS[division.fps]) & 0xff, clampInt(division.ticksPerFrame, 0, 0xff));
}

function readDivision(msb: number, lsb: number): Division {
  if ((msb & 0x80) === 0) return { kind: "ticksPerQuarterNote", ticks: (msb << 8) | lsb };
  const fps = 0x100 - msb;
  for (const [type, value] of Object.entries(SMPTE_FPS)) {
    if (value === fps && isTimeCodeType(type)) return { kind: "timeCode", fps: type, ticksPerFrame: lsb };
  }
  throw invalid(`Invalid SMPTE format ${-fps}`);
}

function isTimeCodeType(name: string): name is TimeCodeType {
  return Object.prototype.hasOwnProperty.call(SMPTE_FPS, name);
}

function pushTrackEvent(event: TrackEvent, out: number[]): void {
  const msg = event.event;
  if (msg.kind === "systemRealTime" && msg.msg === "systemReset") {
    console.warn("midi1: skipping System Reset event in SMF track");
    return;
  }
  if (msg.kind === "channelVoice") {
    pushChannelVoiceEvents(event.deltaTime, msg, out);
    return;
  }
  pushVlq(event.deltaTime, out);
  const bytes = encode(msg);
  if (msg.kind === "systemExclusive" || msg.kind === "systemCommon" || msg.kind === "systemRealTime") {
    out.push(SYSEX_END);
    pushVlq(bytes.length, out);
  }
  out.push(...bytes);
}

/**
 * Writes one event per controller/value pair, the later ones at delta 0. A high-resolution
 * note goes out as its velocity CC followed by the note, so the decoder can fold the pair back.
 */
function pushChannelVoiceEvents(deltaTime: number, msg: Extract<MidiMsg, { kind: "channelVoice" }>, out: number[]): void {
  const bytes = encode(msg);
  const events: number[][] = [];
  if (msg.msg.kind === "highResNoteOn" || msg.msg.kind === "highResNoteOff") {
    // 9n note msb Bn 58 lsb
    events.push(bytes.slice(3), bytes.slice(0, 3));
  } else if (msg.msg.kind === "controlChange") {
    for (let i = 1; i + 1 < bytes.length; i += 2) events.push([bytes[0], bytes[i], bytes[i + 1]]);
  }
  if (events.length === 0) events.push(bytes);
  events.forEach((eventBytes, i) => {
    pushVlq(i === 0 ? deltaTime : 0, out);
    out.push(...eventBytes);
  });
}

function pushTrack(track: Track, out: number[]): void {
  if (track.kind === "alienChunk") {
    out.push(...track.data);
    return;
  }
  for (let i = 0; i < TRACK_TAG.length; i++) out.push(TRACK_TAG.charCodeAt(i));
  const lengthAt = out.length;
  pushU32(0, out);
  for (const event of track.events) pushTrackEvent(event, out);
  const length: number[] = [];
  pushU32(out.length - lengthAt - 4, length);
  out.splice(lengthAt, 4, ...length);
}

export function encodeMidiFile(file: MidiFile): Uint8Array {
  const out: number[] = [];
  for (let i = 0; i < HEADER_TAG.length; i++) out.push(HEADER_TAG.charCodeAt(i));
  pushU32(HEADER_LENGTH, out);
  pushU16(SMF_FORMATS.indexOf(file.header.format), out);
  pushU16(file.header.numTracks, out);
  pushDivision(file.header.division, out);
  for (const track of file.tracks) pushTrack(track, out);
  return Uint8Array.from(out);
}

/** Tracks where parsing stands, for the error report. */
interface FileCursor {
  input: Uint8Array;
  offset: number;
  parsing: string;
  file: MidiFile;
}

function readHeader(cursor: FileCursor): void {
  const { input } = cursor;
  if (input.length < 8 + HEADER_LENGTH) throw unexpectedEnd();
  if (readAscii(input, 0, 4) !== HEADER_TAG) throw invalid("Invalid header");
  if (readU32(input, 4) !== HEADER_LENGTH) throw invalid("Invalid header length");
  cursor.offset = 8;
  const format = SMF_FORMATS[input[9]];
  if (input[8] !== 0 || format === undefined) throw invalid("Invalid SMF format");
  cursor.file.header = {
    format,
    numTracks: readU16(input, 10),
    division: readDivision(input[12], input[13]),
  };
  cursor.offset = 8 + HEADER_LENGTH;
}

function readTrack(cursor: FileCursor, trackNumber: number, options: MidiFileDecodeOptions): void {
  const { input } = cursor;
  cursor.parsing = `track ${trackNumber}`;
  if (input.length - cursor.offset < 8) throw unexpectedEnd();
  const length = readU32(input, cursor.offset + 4);
  const chunkEnd = cursor.offset + 8 + length;
  if (chunkEnd > input.length) throw unexpectedEnd();
  if (readAscii(input, cursor.offset, 4) !== TRACK_TAG) {
    cursor.file.tracks.push({ kind: "alienChunk", data: sliceBytes(input, cursor.offset, chunkEnd) });
    cursor.offset = chunkEnd;
    return;
  }
  const events: TrackEvent[] = [];
  cursor.file.tracks.push({ kind: "midi", events });
  cursor.offset += 8;
  const ctx = createReceiverContext({ parsingSmf: true, complexCc: options.complexCc });
  let beatOrFrame = 0;
  for (let i = 0; cursor.offset < chunkEnd; i++) {
    cursor.parsing = `track ${trackNumber} event ${i}`;
    const { event, consumed } = readTrackEvent(input, cursor.offset, ctx, cursor.file.header.division, beatOrFrame);
    const last = events[events.length - 1];
    if (last !== undefined && completesEvent(last, event, ctx)) events[events.length - 1] = { ...last, event: event.event };
    else events.push(event);
    beatOrFrame = event.beatOrFrame;
    cursor.offset += consumed;
    if (cursor.offset > chunkEnd) throw invalid("Track length exceeded the provided length");
    if (event.event.kind === "meta" && event.event.msg.kind === "endOfTrack") cursor.offset = chunkEnd;
  }
}

/**
 * Whether `next` is the rest of `last` as `pushChannelVoiceEvents` splits it: a later pair of
 * an assembled control change, or a note that took its velocity LSB from `last`.
 */
function completesEvent(last: TrackEvent, next: TrackEvent, ctx: ReceiverContext): boolean {
  const prev = last.event;
  const msg = next.event;
  if (next.deltaTime !== 0 || prev.kind !== "channelVoice" || msg.kind !== "channelVoice") return false;
  if (prev.channel !== msg.channel || prev.msg.kind !== "controlChange") return false;
  if (msg.msg.kind === "highResNoteOn" || msg.msg.kind === "highResNoteOff") return isHighResVelocity(prev.msg.control);
  return msg.msg.kind === "controlChange" && ctx.previousControl !== null && ctx.previousControl.bytes.length > 2;
}

function readTrackEvent(
  input: Uint8Array,
  offset: number,
  ctx: ReceiverContext,
  division: Division,
  lastBeatOrFrame: number,
): { event: TrackEvent; consumed: number } {
  const delta = readVlq(input, offset);
  const at = offset + delta.length;
  if (at >= input.length) throw unexpectedEnd();
  const beatOrFrame = lastBeatOrFrame + ticksToBeatsOrFrames(division, delta.value);
  const done = (event: MidiMsg, end: number): { event: TrackEvent; consumed: number } => ({
    event: { deltaTime: delta.value, event, beatOrFrame },
    consumed: end - offset,
  });

  const first = input[at];
  if (first === META_PREFIX) {
    const { meta, consumed } = decodeMeta(input, at);
    return done({ kind: "meta", msg: meta }, at + consumed);
  }
  if (first === SYSEX_START || first === SYSEX_END) {
    const length = readVlq(input, at + 1);
    const start = at + 1 + length.length;
    const end = start + length.value;
    if (end > input.length) throw unexpectedEnd();
    const body = input.subarray(start, end);
    if (first === SYSEX_START) {
      if (body[body.length - 1] !== SYSEX_END) throw notImplemented("Split system exclusive messages");
      ctx.isSmfSysex = true;
      try {
        const { msg, consumed } = decodeSystemExclusive(body, ctx);
        if (consumed !== body.length) throw invalid("Invalid system exclusive message");
        ctx.previousChannelStatus = null;
        ctx.previousControl = null;
        return done({ kind: "systemExclusive", msg }, end);
      } finally {
        ctx.isSmfSysex = false;
      }
    }
    if (body.length === 0 || body[0] < 0x80) throw notImplemented("Split system exclusive messages");
    const { message, consumed } = decodeWithContext(body, ctx);
    if (consumed !== body.length) throw invalid("Invalid escaped event length");
    return done(message, end);
  }
  const { message, consumed } = decodeWithContext(input.subarray(at), ctx);
  return done(message, at + consumed);
}

/** Reads a whole Standard MIDI File. Throws `MidiFileParseError`. */
export function decodeMidiFile(bytes: ArrayLike<number>, options: MidiFileDecodeOptions = {}): MidiFile {
  const cursor: FileCursor = {
    input: bytes instanceof Uint8Array ? bytes : Uint8Array.from(bytes),
    offset: 0,
    parsing: "header",
    file: createMidiFile(),
  };
  try {
    readHeader(cursor);
    for (let i = 0; i < cursor.file.header.numTracks; i++) readTrack(cursor, i, options);
  } catch (err) {
    if (err instanceof MidiParseError) {
      throw new MidiFileParseError(err, cursor.file, cursor.offset, cursor.parsing, cursor.input);
    }
    throw err;
  }
  return cursor.file;
}
