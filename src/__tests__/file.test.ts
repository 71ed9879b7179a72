import { afterEach, describe, expect, it, vi } from "vitest";
import {
  addTrack,
  createMidiFile,
  decodeMidiFile,
  encodeMidiFile,
  extendTrack,
  MidiFile,
  MidiFileParseError,
  removeTrack,
  ticksToBeatsOrFrames,
} from "../file";
import type { MidiMsg } from "../message";

const HEADER = [0x4d, 0x54, 0x68, 0x64, 0x00, 0x00, 0x00, 0x06];
const TRACK = [0x4d, 0x54, 0x72, 0x6b];
const END_OF_TRACK = [0x00, 0xff, 0x2f, 0x00];

function smf(numTracks: number, chunks: number[][], division: number[] = [0x00, 0x60]): number[] {
  return [...HEADER, 0x00, 0x01, 0x00, numTracks, ...division, ...chunks.flat()];
}

function track(events: number[]): number[] {
  return [...TRACK, 0x00, 0x00, 0x00, events.length, ...events];
}

function parseError(bytes: number[]): MidiFileParseError {
  try {
    decodeMidiFile(bytes);
  } catch (err) {
    if (err instanceof MidiFileParseError) return err;
    throw err;
  }
  throw new Error("file decoded without error");
}

const TIME_SIGNATURE_TRACK = [0x00, 0xff, 0x58, 0x04, 0x04, 0x02, 0x18, 0x08, ...END_OF_TRACK];

afterEach(() => {
  vi.restoreAllMocks();
});

describe("decodeMidiFile", () => {
  it("reads a time signature track", () => {
    const bytes = smf(1, [track(TIME_SIGNATURE_TRACK)]);
    const file = decodeMidiFile(bytes);
    expect(file).toEqual({
      header: { format: "multiTrack", numTracks: 1, division: { kind: "ticksPerQuarterNote", ticks: 96 } },
      tracks: [
        {
          kind: "midi",
          events: [
            {
              deltaTime: 0,
              event: {
                kind: "meta",
                msg: {
                  kind: "timeSignature",
                  signature: { numerator: 4, denominator: 4, clocksPerClick: 24, thirtySecondsPerQuarter: 8 },
                },
              },
              beatOrFrame: 0,
            },
            { deltaTime: 0, event: { kind: "meta", msg: { kind: "endOfTrack" } }, beatOrFrame: 0 },
          ],
        },
      ],
    });
    expect(Array.from(encodeMidiFile(file))).toEqual(bytes);
  });

  it("reports where a track overruns its length", () => {
    const bytes = smf(1, [[...TRACK, 0x00, 0x00, 0x00, 0x0b, ...TIME_SIGNATURE_TRACK]]);
    const err = parseError(bytes);
    expect(err.offset).toBe(34);
    expect(err.parsing).toBe("track 0 event 1");
    expect(err.message).toBe(
      "Error parsing MIDI file at position 34: Error parsing MIDI input: Track length exceeded the provided length",
    );
    expect(err.file.tracks).toHaveLength(1);
  });

  it("keeps chunks it does not know whole", () => {
    const alien = [0x58, 0x46, 0x49, 0x48, 0x00, 0x00, 0x00, 0x02, 0x01, 0x02];
    const bytes = smf(1, [alien]);
    const file = decodeMidiFile(bytes);
    expect(file.tracks).toEqual([{ kind: "alienChunk", data: alien }]);
    expect(Array.from(encodeMidiFile(file))).toEqual(bytes);
  });

  it("follows running status and delta times", () => {
    const file = decodeMidiFile(smf(1, [track([0x00, 0x90, 0x3c, 0x40, 0x60, 0x3c, 0x00, ...END_OF_TRACK])]));
    const [first] = file.tracks;
    if (first.kind !== "midi") throw new Error("expected a track");
    expect(first.events[1]).toEqual({
      deltaTime: 0x60,
      event: { kind: "channelVoice", channel: 1, msg: { kind: "noteOn", note: 0x3c, velocity: 0 } },
      beatOrFrame: 1,
    });
  });

  it("reads escaped real-time events", () => {
    const bytes = smf(1, [track([0x00, 0xf7, 0x01, 0xfa, ...END_OF_TRACK])]);
    const file = decodeMidiFile(bytes);
    const [first] = file.tracks;
    if (first.kind !== "midi") throw new Error("expected a track");
    expect(first.events[0].event).toEqual({ kind: "systemRealTime", msg: "start" });
    expect(Array.from(encodeMidiFile(file))).toEqual(bytes);
  });

  it("reads system exclusive events without their leading F0", () => {
    const file = decodeMidiFile(smf(1, [track([0x00, 0xf0, 0x05, 0x7e, 0x7f, 0x06, 0x01, 0xf7, ...END_OF_TRACK])]));
    const [first] = file.tracks;
    if (first.kind !== "midi") throw new Error("expected a track");
    expect(first.events[0].event).toEqual({
      kind: "systemExclusive",
      msg: { kind: "universalNonRealTime", device: "allCall", msg: { kind: "identityRequest" } },
    });
  });

  it("does not join split system exclusive events", () => {
    const err = parseError(smf(1, [track([0x00, 0xf0, 0x03, 0x7e, 0x7f, 0x06, ...END_OF_TRACK])]));
    expect(err.error.kind).toBe("notImplemented");
    expect(err.message).toContain("Split system exclusive messages is not yet implemented");
  });

  it("rejects a bad header", () => {
    const err = parseError([0x4d, 0x54, 0x68, 0x65, 0x00, 0x00, 0x00, 0x06, 0x00, 0x01, 0x00, 0x00, 0x00, 0x60]);
    expect(err.parsing).toBe("header");
    expect(err.offset).toBe(0);
    expect(err.message).toContain("Invalid header");
  });

  it("reads time code divisions", () => {
    const file = decodeMidiFile(smf(0, [], [0xe7, 0x28]));
    expect(file.header.division).toEqual({ kind: "timeCode", fps: "fps25", ticksPerFrame: 40 });
  });

  it("rejects unknown frame rates", () => {
    expect(() => decodeMidiFile(smf(0, [], [0xe6, 0x28]))).toThrow("Invalid SMPTE format -26");
  });

  it("assembles high resolution notes when asked", () => {
    const file = createMidiFile();
    addTrack(file);
    extendTrack(file, 0, { kind: "channelVoice", channel: 1, msg: { kind: "highResNoteOn", note: 60, velocity: 1000 } }, 0);
    extendTrack(file, 0, { kind: "meta", msg: { kind: "endOfTrack" } }, 0);
    const bytes = encodeMidiFile(file);
    expect(Array.from(bytes.subarray(22, 30))).toEqual([0x00, 0xb0, 0x58, 0x68, 0x00, 0x90, 0x3c, 0x07]);
    expect(decodeMidiFile(bytes, { complexCc: true })).toEqual(file);
  });
});

describe("encodeMidiFile", () => {
  it("writes time code divisions as negative frame rates", () => {
    const file = createMidiFile("singleTrack", { kind: "timeCode", fps: "fps25", ticksPerFrame: 40 });
    expect(Array.from(encodeMidiFile(file))).toEqual([...HEADER, 0x00, 0x00, 0x00, 0x00, 0xe7, 0x28]);
  });

  it("skips System Reset", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const file = createMidiFile();
    addTrack(file);
    extendTrack(file, 0, { kind: "systemRealTime", msg: "systemReset" }, 0);
    extendTrack(file, 0, { kind: "meta", msg: { kind: "endOfTrack" } }, 0);
    expect(Array.from(encodeMidiFile(file).subarray(14))).toEqual(track(END_OF_TRACK));
    expect(warn).toHaveBeenCalledWith("midi1: skipping System Reset event in SMF track");
  });

  it("escapes system exclusive messages", () => {
    const file = createMidiFile();
    addTrack(file);
    extendTrack(file, 0, { kind: "systemExclusive", msg: { kind: "nonCommercial", data: [1] } }, 0);
    expect(Array.from(encodeMidiFile(file).subarray(22))).toEqual([0x00, 0xf7, 0x04, 0xf0, 0x7d, 0x01, 0xf7]);
  });
});

describe("multi-pair channel events", () => {
  const volume: MidiMsg = {
    kind: "channelVoice",
    channel: 1,
    msg: { kind: "controlChange", control: { kind: "highRes", controller: "volume", value: 1000 } },
  };
  const bendRange: MidiMsg = {
    kind: "channelVoice",
    channel: 2,
    msg: {
      kind: "controlChange",
      control: { kind: "parameter", parameter: { kind: "pitchBendSensitivityEntry", semitones: 2, cents: 50 } },
    },
  };

  function fileOf(events: [MidiMsg, number][]): MidiFile {
    const file = createMidiFile();
    addTrack(file);
    for (const [event, beat] of events) extendTrack(file, 0, event, beat);
    extendTrack(file, 0, { kind: "meta", msg: { kind: "endOfTrack" } }, events[events.length - 1][1]);
    return file;
  }

  function cc(channel: number, control: number, value: number): MidiMsg {
    return { kind: "channelVoice", channel, msg: { kind: "controlChange", control: { kind: "undefined", control, value } } };
  }

  const file = fileOf([
    [volume, 0],
    [bendRange, 0],
    [{ kind: "channelVoice", channel: 1, msg: { kind: "noteOn", note: 60, velocity: 100 } }, 1],
  ]);

  it("writes one event per controller pair", () => {
    expect(Array.from(encodeMidiFile(file).subarray(14))).toEqual(
      track([
        ...[0x00, 0xb0, 0x07, 0x07, 0x00, 0xb0, 0x27, 0x68],
        ...[0x00, 0xb1, 0x64, 0x00, 0x00, 0xb1, 0x65, 0x00, 0x00, 0xb1, 0x06, 0x02, 0x00, 0xb1, 0x26, 0x32],
        ...[0x60, 0x90, 0x3c, 0x64],
        ...END_OF_TRACK,
      ]),
    );
  });

  it("folds the pairs back into one event", () => {
    expect(decodeMidiFile(encodeMidiFile(file), { complexCc: true })).toEqual(file);
  });

  it("keeps each pair as its own event without assembly", () => {
    const decoded = decodeMidiFile(encodeMidiFile(file));
    const [first] = decoded.tracks;
    if (first.kind !== "midi") throw new Error("expected a track");
    expect(first.events.map(({ deltaTime, event }) => [deltaTime, event])).toEqual([
      [0, cc(1, 7, 7)],
      [0, cc(1, 39, 104)],
      [0, cc(2, 100, 0)],
      [0, cc(2, 101, 0)],
      [0, cc(2, 6, 2)],
      [0, cc(2, 38, 50)],
      [96, { kind: "channelVoice", channel: 1, msg: { kind: "noteOn", note: 60, velocity: 100 } }],
      [0, { kind: "meta", msg: { kind: "endOfTrack" } }],
    ]);
  });

  it("survives a round trip with every channel message", () => {
    const voice = (msg: Extract<MidiMsg, { kind: "channelVoice" }>["msg"]): MidiMsg => ({ kind: "channelVoice", channel: 1, msg });
    const mixed = fileOf([
      [voice({ kind: "noteOn", note: 60, velocity: 100 }), 0],
      [voice({ kind: "highResNoteOn", note: 62, velocity: 1000 }), 1],
      [voice({ kind: "highResNoteOff", note: 62, velocity: 5 }), 2],
      [voice({ kind: "noteOff", note: 60, velocity: 0 }), 3],
      [voice({ kind: "polyPressure", note: 60, pressure: 20 }), 4],
      [voice({ kind: "controlChange", control: { kind: "undefinedHighRes", control1: 3, control2: 35, value: 300 } }), 5],
      [voice({ kind: "programChange", program: 5 }), 6],
      [voice({ kind: "controlChange", control: { kind: "parameter", parameter: { kind: "unregistered", number: 257 } } }), 7],
      [voice({ kind: "channelPressure", pressure: 30 }), 8],
      [voice({ kind: "pitchBend", bend: 8192 }), 9],
      [{ kind: "channelMode", channel: 1, msg: { kind: "allNotesOff" } }, 10],
    ]);
    expect(decodeMidiFile(encodeMidiFile(mixed), { complexCc: true })).toEqual(mixed);
  });
});

describe("track editing", () => {
  function fileWithTrack(): MidiFile {
    const file = createMidiFile();
    addTrack(file);
    return file;
  }

  it("derives delta times from positions", () => {
    const file = fileWithTrack();
    const note = { kind: "channelVoice" as const, channel: 1, msg: { kind: "noteOn" as const, note: 60, velocity: 100 } };
    expect(extendTrack(file, 0, note, 0).deltaTime).toBe(0);
    expect(extendTrack(file, 0, note, 1.5).deltaTime).toBe(144);
    expect(extendTrack(file, 0, note, 1.5).deltaTime).toBe(0);
  });

  it("cannot extend alien chunks", () => {
    const file = createMidiFile();
    addTrack(file, { kind: "alienChunk", data: [] });
    expect(() => extendTrack(file, 0, { kind: "meta", msg: { kind: "endOfTrack" } }, 0)).toThrow(
      "Cannot add events to an alien chunk",
    );
  });

  it("removes tracks by index", () => {
    const file = fileWithTrack();
    expect(() => removeTrack(file, 3)).toThrow("No track at index 3");
    expect(removeTrack(file, 0)).toEqual({ kind: "midi", events: [] });
    expect(file.header.numTracks).toBe(0);
  });

  it("converts ticks to frames", () => {
    expect(ticksToBeatsOrFrames({ kind: "timeCode", fps: "fps24", ticksPerFrame: 80 }, 40)).toBe(0.5);
  });
});
