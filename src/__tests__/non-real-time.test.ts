import { describe, expect, it } from "vitest";
import { decode, encode, MidiMsg } from "../message";
import { decodeFileDumpData, encodeFileDumpData } from "../sysex/file-dump";
import { UniversalNonRealTimeMsg } from "../sysex/non-real-time";

function nonRealTime(msg: UniversalNonRealTimeMsg): MidiMsg {
  return { kind: "systemExclusive", msg: { kind: "universalNonRealTime", device: "allCall", msg } };
}

function roundTrip(msg: UniversalNonRealTimeMsg): MidiMsg {
  return decode(encode(nonRealTime(msg))).message;
}

describe("general information", () => {
  it("writes an identity request", () => {
    expect(encode(nonRealTime({ kind: "identityRequest" }))).toEqual([0xf0, 0x7e, 0x7f, 0x06, 0x01, 0xf7]);
  });

  it("reads back an identity reply", () => {
    const msg: UniversalNonRealTimeMsg = {
      kind: "identityReply",
      identity: { id: [0, 0x20, 0x33], family: 0x0102, familyMember: 3, softwareRevision: [1, 2, 3, 4] },
    };
    expect(encode(nonRealTime(msg))).toEqual([
      0xf0, 0x7e, 0x7f, 0x06, 0x02, 0x00, 0x20, 0x33, 0x02, 0x02, 0x03, 0x00, 0x01, 0x02, 0x03, 0x04, 0xf7,
    ]);
    expect(roundTrip(msg)).toEqual(nonRealTime(msg));
  });

  it("writes handshakes with their packet number", () => {
    expect(encode(nonRealTime({ kind: "endOfFile", packet: 0 }))).toEqual([0xf0, 0x7e, 0x7f, 0x7b, 0x00, 0xf7]);
    expect(roundTrip({ kind: "ack", packet: 5 })).toEqual(nonRealTime({ kind: "ack", packet: 5 }));
  });

  it("switches General MIDI modes", () => {
    expect(encode(nonRealTime({ kind: "generalMidi", mode: "gm2" }))).toEqual([0xf0, 0x7e, 0x7f, 0x09, 0x03, 0xf7]);
    expect(() => decode([0xf0, 0x7e, 0x7f, 0x09, 0x05, 0xf7])).toThrow("Unknown General MIDI mode 0x5");
  });
});

describe("tuning dumps", () => {
  it("always sends a bank with non-real-time note changes", () => {
    const bytes = encode(
      nonRealTime({
        kind: "tuningNoteChange",
        change: { tuningProgramNum: 5, tunings: [{ note: 60, tuning: { semitone: 60, fraction: 0 } }] },
      }),
    );
    expect(bytes).toEqual([0xf0, 0x7e, 0x7f, 0x08, 0x07, 0x00, 0x05, 0x01, 0x3c, 0x3c, 0x00, 0x00, 0xf7]);
    expect(decode(bytes).message).toEqual(
      nonRealTime({
        kind: "tuningNoteChange",
        change: { tuningBankNum: 0, tuningProgramNum: 5, tunings: [{ note: 60, tuning: { semitone: 60, fraction: 0 } }] },
      }),
    );
  });

  it("fills a key-based dump with equal temperament", () => {
    const bytes = encode(nonRealTime({ kind: "keyBasedTuningDump", dump: { tuningProgramNum: 2, name: "Just", tunings: [] } }));
    expect(bytes).toHaveLength(408);
    const message = decode(bytes).message;
    if (message.kind !== "systemExclusive" || message.msg.kind !== "universalNonRealTime") throw new Error("not a dump");
    const dump = message.msg.msg;
    if (dump.kind !== "keyBasedTuningDump") throw new Error("not a key-based dump");
    expect(dump.dump.name).toBe("Just");
    expect(dump.dump.tunings).toHaveLength(128);
    expect(dump.dump.tunings[60]).toEqual({ semitone: 60, fraction: 0 });
  });

  it("verifies the checksum", () => {
    const bytes = encode(nonRealTime({ kind: "keyBasedTuningDump", dump: { tuningProgramNum: 2, name: "Just", tunings: [] } }));
    bytes[406] ^= 0x01;
    expect(() => decode(bytes)).toThrow("Checksum mismatch");
  });

  it("reads scale tuning dumps with a two-byte resolution", () => {
    const msg: UniversalNonRealTimeMsg = {
      kind: "scaleTuningDump2Byte",
      dump: { tuningBankNum: 1, tuningProgramNum: 3, name: "Werckmeister", tuning: [-8192, 0, 8191, 0, 0, 0, 0, 0, 0, 0, 0, 0] },
    };
    expect(roundTrip(msg)).toEqual(nonRealTime(msg));
  });
});

describe("file dump", () => {
  it("packs eight-bit data behind a high-bit byte", () => {
    expect(encodeFileDumpData([0x80, 0x01])).toEqual([0x40, 0x00, 0x01]);
    expect(decodeFileDumpData([0x40, 0x00, 0x01])).toEqual([0x80, 0x01]);
  });

  it("writes a checksummed data packet", () => {
    const msg: UniversalNonRealTimeMsg = { kind: "fileDumpPacket", packet: { runningCount: 0, data: [0x80, 0x01] } };
    expect(encode(nonRealTime(msg))).toEqual([0xf0, 0x7e, 0x7f, 0x07, 0x02, 0x00, 0x02, 0x40, 0x00, 0x01, 0x47, 0xf7]);
    expect(roundTrip(msg)).toEqual(nonRealTime(msg));
  });

  it("reads back a header", () => {
    const msg: UniversalNonRealTimeMsg = {
      kind: "fileDumpHeader",
      header: { senderDevice: 2, fileType: "midi", length: 1024, name: "song.mid" },
    };
    expect(roundTrip(msg)).toEqual(nonRealTime(msg));
  });

  it("keeps unknown file types", () => {
    const msg: UniversalNonRealTimeMsg = {
      kind: "fileDumpRequest",
      request: { requesterDevice: 1, fileType: { custom: "WAVE" }, name: "kick" },
    };
    expect(roundTrip(msg)).toEqual(nonRealTime(msg));
  });
});

describe("sample dump", () => {
  it("writes a header", () => {
    const msg: UniversalNonRealTimeMsg = {
      kind: "sampleDumpHeader",
      header: { sampleNum: 1, format: 16, period: 22676, length: 1000, sustainLoopStart: 0, sustainLoopEnd: 999, loopType: "forward" },
    };
    expect(encode(nonRealTime(msg))).toEqual([
      0xf0, 0x7e, 0x7f, 0x01, 0x01, 0x00, 0x10, 0x14, 0x31, 0x01, 0x68, 0x07, 0x00, 0x00, 0x00, 0x00, 0x67, 0x07, 0x00,
      0x00, 0xf7,
    ]);
    expect(roundTrip(msg)).toEqual(nonRealTime(msg));
  });

  it("pads packets to 120 bytes", () => {
    const message = roundTrip({ kind: "sampleDumpPacket", packet: { runningCount: 3, data: [1, 2, 3] } });
    expect(message).toEqual(
      nonRealTime({ kind: "sampleDumpPacket", packet: { runningCount: 3, data: [1, 2, 3, ...Array<number>(117).fill(0)] } }),
    );
  });

  it("rejects short packets", () => {
    expect(() => decode([0xf0, 0x7e, 0x7f, 0x02, 0x00, 0x01, 0x02, 0x00, 0xf7])).toThrow(
      "Sample dump packets carry 120 data bytes",
    );
  });

  it("names samples", () => {
    const msg: UniversalNonRealTimeMsg = { kind: "sampleName", name: { sampleNum: 1, name: "Kick" } };
    expect(encode(nonRealTime(msg))).toEqual([0xf0, 0x7e, 0x7f, 0x05, 0x03, 0x01, 0x00, 0x00, 0x04, 0x4b, 0x69, 0x63, 0x6b, 0xf7]);
    expect(roundTrip(msg)).toEqual(nonRealTime(msg));
  });

  it("requests every loop", () => {
    const msg: UniversalNonRealTimeMsg = { kind: "loopPointsRequest", request: { sampleNum: 2, loopNum: "all" } };
    expect(encode(nonRealTime(msg))).toEqual([0xf0, 0x7e, 0x7f, 0x05, 0x02, 0x02, 0x00, 0x7f, 0x7f, 0xf7]);
    expect(roundTrip(msg)).toEqual(nonRealTime(msg));
  });

  it("carries fractional sample rates in extended headers", () => {
    const msg: UniversalNonRealTimeMsg = {
      kind: "extendedSampleDumpHeader",
      header: {
        sampleNum: 1,
        format: 24,
        sampleRate: 44100.5,
        length: 2 ** 30,
        sustainLoopStart: 0,
        sustainLoopEnd: 100,
        loopType: "backwardRelease",
        channels: 2,
      },
    };
    expect(roundTrip(msg)).toEqual(nonRealTime(msg));
  });
});

describe("cueing setup", () => {
  it("enables the event list", () => {
    expect(roundTrip({ kind: "timeCodeCueingSetup", cue: { kind: "enableEventList" } })).toEqual(
      nonRealTime({ kind: "timeCodeCueingSetup", cue: { kind: "enableEventList" } }),
    );
  });

  it("schedules a punch in", () => {
    const msg: UniversalNonRealTimeMsg = {
      kind: "timeCodeCueingSetup",
      cue: {
        kind: "punchIn",
        timeCode: { hours: 1, minutes: 2, seconds: 3, frames: 4, codeType: "fps25", fractionalFrames: 50 },
        eventNumber: 7,
      },
    };
    expect(encode(nonRealTime(msg))).toEqual([
      0xf0, 0x7e, 0x7f, 0x04, 0x01, 0x21, 0x02, 0x03, 0x04, 0x32, 0x07, 0x00, 0xf7,
    ]);
    expect(roundTrip(msg)).toEqual(nonRealTime(msg));
  });

  it("rejects unknown sub-ids", () => {
    expect(() => decode([0xf0, 0x7e, 0x7f, 0x0d, 0x01, 0xf7])).toThrow("Unknown universal non-real-time sub-id 0xd 0x1");
  });
});
