import { describe, expect, it } from "vitest";

import { ReferenceDetector } from "./referenceDetector.js";

describe("ReferenceDetector", () => {
  const detector = new ReferenceDetector();

  it("spots backward references in Korean and English", () => {
    expect(detector.detect("이전에 했던 얘기 기억나?")).toBe(true);
    expect(detector.detect("지난번에 말한 카페 아이디어")).toBe(true);
    expect(detector.detect("저번 프로젝트랑 비슷해")).toBe(true);
    expect(detector.detect("Last time we talked about pricing")).toBe(true);
    expect(detector.detect("As we discussed, the MVP is small")).toBe(true);
  });

  it("ignores messages without a cue", () => {
    expect(detector.detect("오늘 날씨 어때")).toBe(false);
    expect(detector.detect("카페 창업 아이디어를 정리해줘")).toBe(false);
    expect(detector.detect("")).toBe(false);
  });

  it("requires English cues to be whole words", () => {
    expect(detector.detect("the earliest launch date")).toBe(false);
    expect(detector.detect("we met earlier, right?")).toBe(true);
  });

  it("requires a word boundary before a cue", () => {
    expect(detector.match("이전에 했던 것")).toEqual({ cue: "이전에", index: 0 });
    expect(detector.detect("그전에 했던 것")).toBe(false);
  });

  it("prefers the longer cue at the same position", () => {
    const withShort = new ReferenceDetector({ extraCues: ["지난"] });
    expect(withShort.match("지난 프로젝트 얘기")).toEqual({ cue: "지난 프로젝트", index: 0 });
  });

  it("accepts extra cues", () => {
    const extended = new ReferenceDetector({ extraCues: ["前回"] });
    expect(extended.detect("前回の話の続き")).toBe(true);
    expect(detector.detect("前回の話の続き")).toBe(false);
  });

  it("strips cues from the search query", () => {
    expect(detector.queryFor("이전에 카페 얘기")).toBe("카페 얘기");
    expect(detector.queryFor("Previously   Pricing   model")).toBe("pricing model");
  });

  it("keeps the whole message when only the cue is searchable", () => {
    expect(detector.queryFor("이전에")).toBe("이전에");
    expect(detector.queryFor("  지난번  ")).toBe("지난번");
  });
});
