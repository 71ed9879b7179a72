import { describe, expect, it } from "vitest";
import { createReceiverContext } from "../context";
import { decode, decodeWithContext, encode, MidiMsg } from "../message";
import { chorusParameters, reverbParameters } from "../sysex/global-parameter";
import { defaultTimeSignature, UniversalRealTimeMsg } from "../sysex/real-time";
import { tuningFromFreq } from "../sysex/tuning";
import { TimeCode } from "../time-code";

function realTime(msg: UniversalRealTimeMsg): MidiMsg {
  return { kind: "systemExclusive", msg: { kind: "universalRealTime", device: "allCall", msg } };
}

function roundTrip(msg: UniversalRealTimeMsg): MidiMsg {
  return decode(encode(realTime(msg))).message;
}

describe("notation", () => {
  it.each([
    [{ kind: "notRunning" } as const, [0x00, 0x40]],
    [{ kind: "countIn", bars: 1 } as const, [0x7f, 0x7f]],
    [{ kind: "number", bar: 1 } as const, [0x01, 0x00]],
    [{ kind: "runningUnknown" } as const, [0x7f, 0x3f]],
  ])("writes bar marker %o", (marker, value) => {
    const msg: UniversalRealTimeMsg = { kind: "barMarker", marker };
    expect(encode(realTime(msg))).toEqual([0xf0, 0x7f, 0x7f, 0x03, 0x01, ...value, 0xf7]);
    expect(roundTrip(msg)).toEqual(realTime(msg));
  });

  it("clamps bar numbers into range", () => {
    expect(encode(realTime({ kind: "barMarker", marker: { kind: "number", bar: 9000 } }))).toEqual([
      0xf0, 0x7f, 0x7f, 0x03, 0x01, 0x7e, 0x3f, 0xf7,
    ]);
  });

  it("writes compound time signatures", () => {
    const signature = { ...defaultTimeSignature(), compoundSignatures: [{ beats: 3, beatValue: "eighth" as const }] };
    const msg: UniversalRealTimeMsg = { kind: "timeSignature", signature };
    expect(encode(realTime(msg))).toEqual([0xf0, 0x7f, 0x7f, 0x03, 0x02, 0x06, 0x04, 0x02, 0x18, 0x08, 0x03, 0x03, 0xf7]);
    expect(roundTrip(msg)).toEqual(realTime(msg));
  });

  it("keeps unnamed beat values", () => {
    const message = decode([0xf0, 0x7f, 0x7f, 0x03, 0x42, 0x04, 0x03, 0x09, 0x18, 0x08, 0xf7]).message;
    expect(message).toEqual(
      realTime({
        kind: "timeSignatureDelayed",
        signature: {
          signature: { beats: 3, beatValue: { other: 9 } },
          midiClocksInMetronomeClick: 24,
          thirtySecondNotesInMidiQuarterNote: 8,
          compoundSignatures: [],
        },
      }),
    );
  });

  it("rejects odd time signature lengths", () => {
    expect(() => decode([0xf0, 0x7f, 0x7f, 0x03, 0x02, 0x05, 0x04, 0x02, 0x18, 0x08, 0x01, 0xf7])).toThrow(
      "Time signature length must be 4 plus 2 per compound signature",
    );
  });
});

describe("device control", () => {
  it("writes master fine tuning LSB first around its centre", () => {
    expect(encode(realTime({ kind: "masterFineTuning", tuning: 0 }))).toEqual([0xf0, 0x7f, 0x7f, 0x04, 0x03, 0x00, 0x40, 0xf7]);
    expect(roundTrip({ kind: "masterFineTuning", tuning: -8192 })).toEqual(realTime({ kind: "masterFineTuning", tuning: -8192 }));
  });

  it("writes master coarse tuning as a biased byte after a zero LSB", () => {
    expect(encode(realTime({ kind: "masterCoarseTuning", semitones: -12 }))).toEqual([
      0xf0, 0x7f, 0x7f, 0x04, 0x04, 0x00, 0x34, 0xf7,
    ]);
    expect(roundTrip({ kind: "masterCoarseTuning", semitones: -12 })).toEqual(realTime({ kind: "masterCoarseTuning", semitones: -12 }));
  });

  it("writes reverb settings as global parameters", () => {
    const msg: UniversalRealTimeMsg = {
      kind: "globalParameterControl",
      control: reverbParameters({ type: "largeHall", time: 1 }),
    };
    expect(encode(realTime(msg))).toEqual([
      0xf0, 0x7f, 0x7f, 0x04, 0x05, 0x01, 0x01, 0x01, 0x01, 0x01, 0x00, 0x04, 0x01, 0x28, 0xf7,
    ]);
    expect(roundTrip(msg)).toEqual(realTime(msg));
  });

  it("scales chorus settings", () => {
    expect(chorusParameters({ modDepth: 10, feedback: 1000 }).params).toEqual([
      { id: [2], value: [31] },
      { id: [3], value: [127] },
    ]);
  });
});

describe("machine control", () => {
  it("writes simple commands", () => {
    expect(encode(realTime({ kind: "machineControlCommand", command: { kind: "stop" } }))).toEqual([
      0xf0, 0x7f, 0x7f, 0x06, 0x01, 0xf7,
    ]);
    expect(roundTrip({ kind: "machineControlCommand", command: { kind: "resume" } })).toEqual(
      realTime({ kind: "machineControlCommand", command: { kind: "resume" } }),
    );
  });

  it("locates to an information field", () => {
    const msg: UniversalRealTimeMsg = {
      kind: "machineControlCommand",
      command: { kind: "locateInformationField", field: "actualOffset" },
    };
    expect(encode(realTime(msg))).toEqual([0xf0, 0x7f, 0x7f, 0x06, 0x44, 0x02, 0x00, 0x04, 0xf7]);
    expect(roundTrip(msg)).toEqual(realTime(msg));
  });

  it("locates to a target time code", () => {
    const msg: UniversalRealTimeMsg = {
      kind: "machineControlCommand",
      command: {
        kind: "locateTarget",
        target: { hours: 1, minutes: 0, seconds: 0, frames: 0, codeType: "fps24", negative: false, subframes: 0 },
      },
    };
    expect(encode(realTime(msg))).toEqual([0xf0, 0x7f, 0x7f, 0x06, 0x44, 0x06, 0x01, 0x01, 0x00, 0x00, 0x00, 0x00, 0xf7]);
    expect(roundTrip(msg)).toEqual(realTime(msg));
  });

  it("carries other commands as raw bytes", () => {
    expect(decode([0xf0, 0x7f, 0x7f, 0x06, 0x40, 0x01, 0xf7]).message).toEqual(
      realTime({ kind: "machineControlCommand", command: { kind: "unimplemented", data: [0x40, 0x01] } }),
    );
  });
});

describe("tuning", () => {
  it("finds the tuning of a frequency", () => {
    expect(tuningFromFreq(440)).toEqual({ semitone: 69, fraction: 0 });
    expect(tuningFromFreq(1)).toEqual({ semitone: 0, fraction: 0 });
    expect(tuningFromFreq(20000)).toEqual({ semitone: 127, fraction: 0x3fff });
  });

  it("writes a note change without a bank in the short form", () => {
    const msg: UniversalRealTimeMsg = {
      kind: "tuningNoteChange",
      change: { tuningProgramNum: 5, tunings: [{ note: 1, tuning: { semitone: 1, fraction: 255 } }] },
    };
    expect(encode(realTime(msg))).toEqual([0xf0, 0x7f, 0x7f, 0x08, 0x02, 0x05, 0x01, 0x01, 0x01, 0x01, 0x7f, 0xf7]);
    expect(roundTrip(msg)).toEqual(realTime(msg));
  });

  it("reads 7F 7F 7F as no change", () => {
    expect(decode([0xf0, 0x7f, 0x7f, 0x08, 0x07, 0x01, 0x02, 0x01, 0x3c, 0x7f, 0x7f, 0x7f, 0xf7]).message).toEqual(
      realTime({
        kind: "tuningNoteChange",
        change: { tuningBankNum: 1, tuningProgramNum: 2, tunings: [{ note: 0x3c, tuning: null }] },
      }),
    );
  });

  it("writes scale tunings with a channel bitmap", () => {
    const msg: UniversalRealTimeMsg = { kind: "scaleTuning1Byte", tuning: { channels: [1, 16], tuning: [-64, 0, 63] } };
    expect(encode(realTime(msg))).toEqual([
      0xf0, 0x7f, 0x7f, 0x08, 0x08, 0x02, 0x00, 0x01, 0x00, 0x40, 0x7f, ...Array<number>(9).fill(0x40), 0xf7,
    ]);
    expect(roundTrip(msg)).toEqual(
      realTime({ kind: "scaleTuning1Byte", tuning: { channels: [1, 16], tuning: [-64, 0, 63, 0, 0, 0, 0, 0, 0, 0, 0, 0] } }),
    );
  });
});

describe("controller routing", () => {
  it("routes a control change to synthesis parameters", () => {
    const msg: UniversalRealTimeMsg = {
      kind: "controllerDestination",
      destination: {
        source: { kind: "controlChange", control: 0x50 },
        channel: 2,
        ranges: [{ parameter: "filterCutoff", range: 0x40 }],
      },
    };
    expect(encode(realTime(msg))).toEqual([0xf0, 0x7f, 0x7f, 0x09, 0x03, 0x01, 0x50, 0x01, 0x40, 0xf7]);
    expect(roundTrip(msg)).toEqual(realTime(msg));
  });

  it("only routes assignable controllers", () => {
    const bytes = encode(
      realTime({
        kind: "controllerDestination",
        destination: { source: { kind: "controlChange", control: 0x30 }, channel: 1, ranges: [] },
      }),
    );
    expect(bytes).toEqual([0xf0, 0x7f, 0x7f, 0x09, 0x03, 0x00, 0x1f, 0xf7]);
  });

  it("replaces controllers that cannot be set per key", () => {
    const msg: UniversalRealTimeMsg = {
      kind: "keyBasedInstrumentControl",
      control: { channel: 1, key: 60, controls: [{ control: 7, value: 100 }, { control: 6, value: 1 }] },
    };
    expect(encode(realTime(msg))).toEqual([0xf0, 0x7f, 0x7f, 0x0a, 0x01, 0x00, 0x3c, 0x07, 0x64, 0x01, 0x01, 0xf7]);
  });
});

describe("time code", () => {
  it("sets the receiver time code from a full message", () => {
    const tc: TimeCode = { hours: 1, minutes: 2, seconds: 3, frames: 4, codeType: "fps25" };
    const ctx = createReceiverContext();
    const bytes = encode(realTime({ kind: "timeCodeFull", timeCode: tc }));
    expect(bytes).toEqual([0xf0, 0x7f, 0x7f, 0x01, 0x01, 0x04, 0x03, 0x02, 0x21, 0xf7]);
    decodeWithContext(bytes, ctx);
    expect(ctx.timeCode).toEqual(tc);
  });

  it("carries cueing information nibble by nibble", () => {
    const msg: UniversalRealTimeMsg = {
      kind: "timeCodeCueing",
      cue: { kind: "eventStart", eventNumber: 3, additionalInfo: [0x90, 0x3c] },
    };
    expect(encode(realTime(msg))).toEqual([0xf0, 0x7f, 0x7f, 0x05, 0x07, 0x03, 0x00, 0x00, 0x09, 0x0c, 0x03, 0xf7]);
    expect(roundTrip(msg)).toEqual(realTime(msg));
  });

  it("rejects unknown sub-ids", () => {
    expect(() => decode([0xf0, 0x7f, 0x7f, 0x0c, 0x01, 0xf7])).toThrow("Unknown universal real-time sub-id 0xc 0x1");
  });
});
