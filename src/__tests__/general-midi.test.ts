import { describe, expect, it } from "vitest";
import { gmPercussionName, gmProgramName, gmProgramNumber } from "../general-midi";

describe("gmProgramName", () => {
  it("names the sound set", () => {
    expect(gmProgramName(0)).toBe("AcousticGrandPiano");
    expect(gmProgramName(40)).toBe("Violin");
    expect(gmProgramName(127)).toBe("Gunshot");
  });

  it("has no name outside 0 to 127", () => {
    expect(gmProgramName(128)).toBeUndefined();
    expect(gmProgramName(1.5)).toBeUndefined();
  });
});

describe("gmProgramNumber", () => {
  it("ignores case", () => {
    expect(gmProgramNumber("violin")).toBe(40);
  });

  it("returns undefined for unknown names", () => {
    expect(gmProgramNumber("Theremin")).toBeUndefined();
  });
});

describe("gmPercussionName", () => {
  it("covers notes 35 to 81", () => {
    expect(gmPercussionName(35)).toBe("AcousticBassDrum");
    expect(gmPercussionName(81)).toBe("OpenTriangle");
    expect(gmPercussionName(34)).toBeUndefined();
    expect(gmPercussionName(82)).toBeUndefined();
  });
});
