import { describe, expect, it } from "vitest";
import { decode, encode, MidiMsg } from "../message";
import { decodeSelectMap, encodeSelectMap, FileReferenceMsg, SelectMap, soundFileMap, wavMap } from "../sysex/file-reference";

function fileReference(msg: FileReferenceMsg): MidiMsg {
  return {
    kind: "systemExclusive",
    msg: { kind: "universalNonRealTime", device: "allCall", msg: { kind: "fileReference", msg } },
  };
}

describe("file reference", () => {
  it("opens a file by URL", () => {
    const msg: FileReferenceMsg = { kind: "open", ctx: 1, fileType: "dls", url: "a.dls" };
    expect(encode(fileReference(msg))).toEqual([
      0xf0, 0x7e, 0x7f, 0x0b, 0x01, 0x01, 0x00, 0x0a, 0x00, 0x44, 0x4c, 0x53, 0x20, 0x61, 0x2e, 0x64, 0x6c, 0x73, 0x00,
      0xf7,
    ]);
    expect(decode(encode(fileReference(msg))).message).toEqual(fileReference(msg));
  });

  it("closes a context", () => {
    expect(encode(fileReference({ kind: "close", ctx: 300 }))).toEqual([
      0xf0, 0x7e, 0x7f, 0x0b, 0x04, 0x2c, 0x02, 0x00, 0x00, 0xf7,
    ]);
  });

  it("opens and selects in one message", () => {
    const msg: FileReferenceMsg = {
      kind: "openSelectContents",
      ctx: 2,
      fileType: "sf2",
      url: "file:///piano.sf2",
      map: { kind: "soundFile", maps: [soundFileMap({ dstProg: 4, srcProg: 1, dstDrum: true })] },
    };
    expect(decode(encode(fileReference(msg))).message).toEqual(fileReference(msg));
  });

  it("rejects unknown file types", () => {
    expect(() =>
      decode([0xf0, 0x7e, 0x7f, 0x0b, 0x01, 0x01, 0x00, 0x05, 0x00, 0x4d, 0x50, 0x33, 0x20, 0x00, 0xf7]),
    ).toThrow('Unknown file reference type "MP3 "');
  });
});

describe("select maps", () => {
  it.each<[string, SelectMap]>([
    ["sound file maps", { kind: "soundFile", maps: [soundFileMap({ dstBank: 200, volume: 100 })] }],
    ["a wav map", { kind: "wav", map: wavMap({ dstProg: 9, baseKey: 48, fine: -100 }) }],
    ["a sound file bank offset", { kind: "soundFileBankOffset", bankOffset: 129, srcDrum: true, dstDrum: false }],
    ["a wav bank offset", { kind: "wavBankOffset", map: wavMap({ loKey: 36, hiKey: 48 }), bankOffset: 2, srcDrum: false, dstDrum: true }],
  ])("reads back %s", (_, map) => {
    expect(decodeSelectMap(encodeSelectMap(map))).toEqual(map);
  });

  it("writes the bank offset header", () => {
    expect(encodeSelectMap({ kind: "soundFileBankOffset", bankOffset: 129, srcDrum: true, dstDrum: true })).toEqual([
      0x00, 0x00, 0x01, 0x03, 0x01, 0x01, 0x03,
    ]);
  });

  it("rejects maps of no known length", () => {
    expect(() => decodeSelectMap([1, 2, 3])).toThrow("Unrecognised file reference select map");
  });
});
