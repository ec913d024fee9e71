import { beforeAll, afterAll, describe, it, expect } from "vitest";
import { cleanCue, cleanLine, cleanLines, cleanTrack } from "./index.js";
import { DEFAULT_CLEANING_PROFILES } from "../config/cleaning.js";
import { configureLogger, resetLogger } from "../utils/logger.js";
import type { CleaningProfile, Track } from "../types.js";

beforeAll(() => configureLogger({ logToConsole: false }));
afterAll(() => resetLogger());

const BRACKETS = [
  { open: "[", close: "]" },
  { open: "(", close: ")" },
];

function profile(overrides: Partial<CleaningProfile> = {}): CleaningProfile {
  return {
    noiseCharacters: [],
    typoMap: {},
    bracketStyles: BRACKETS,
    metadataKeywords: [],
    ...overrides,
  };
}

const korean = DEFAULT_CLEANING_PROFILES.korean;
const english = DEFAULT_CLEANING_PROFILES.english;

describe("cleanLine", () => {
  it("removes bracketed annotations and configured noise", () => {
    const rules = profile({ noiseCharacters: ["!!"] });
    expect(cleanLine("안녕 [laughs] (music) 하세요!!", rules)).toBe("안녕 하세요");
  });

  it("corrects a configured typo", () => {
    const rules = profile({ typoMap: { "됬다": "됐다" } });
    expect(cleanLine("끝이 됬다", rules)).toBe("끝이 됐다");
  });

  it("prefers the longer typo when one contains another", () => {
    const rules = profile({ typoMap: { "됬": "됐", "안됬다": "안 됐다" } });
    expect(cleanLine("안됬다 됬어", rules)).toBe("안 됐다 됐어");
  });

  it("does not rewrite a correction a second time", () => {
    const rules = profile({ typoMap: { a: "b", b: "c" } });
    expect(cleanLine("ab", rules)).toBe("bc");
  });

  it("removes multi-character noise before its single characters", () => {
    const rules = profile({ noiseCharacters: ["!", "!!!"] });
    expect(cleanLine("wait!!! now!", rules)).toBe("wait now");
  });

  it("strips markup and music symbols with the default profile", () => {
    expect(cleanLine("♪ <i>Hello</i> ~world~ ♪", english)).toBe("Hello world");
  });

  it("removes an annotation inside a word without splitting it", () => {
    expect(cleanLine("그래(웃음)요", korean)).toBe("그래요");
    expect(cleanLine("a[x]b", profile())).toBe("ab");
  });

  it("removes noise that forms again once a match is taken out", () => {
    const rules = profile({ noiseCharacters: ["ab"] });
    expect(cleanLine("aabb", rules)).toBe("");
    expect(cleanLine("xaabby", rules)).toBe("xy");
  });

  it("keeps angle brackets that aren't markup", () => {
    expect(cleanLine("a < b and c > d", english)).toBe("a < b and c > d");
  });

  it("strips timestamp tags", () => {
    expect(cleanLine("<00:00:01.500>Hello <c.yellow>there</c>", english)).toBe(
      "Hello there"
    );
  });

  it("strips a tag exposed by removing noise", () => {
    expect(cleanLine("<#i>Hi</i#>", english)).toBe("Hi");
  });

  it("keeps ordinary sentence punctuation", () => {
    expect(cleanLine("- Really? Yes, it's fine.", english)).toBe(
      "- Really? Yes, it's fine."
    );
  });

  it("drops credit lines", () => {
    expect(cleanLine("Director: Kim", english)).toBe("");
    expect(cleanLine("배급: 무비컴퍼니", korean)).toBe("");
  });

  it("drops a credit line revealed by stripping symbols", () => {
    expect(cleanLine("Direc*tor: Kim", english)).toBe("");
  });

  it("returns the same text when run on its own output", () => {
    const samples = [
      "안녕 [laughs] (music) 하세요!!",
      "♪ 그럴 필요고   없지 ♪",
      "[intro music]",
      "<i>(sighs)</i> 「정말」 #괜찮아",
      "unclosed [bracket here",
      "   spaced    out   ",
    ];
    for (const sample of samples) {
      const once = cleanLine(sample, korean);
      expect(cleanLine(once, korean)).toBe(once);
    }
  });

  it("returns the same text on its own output with multi-character noise", () => {
    const rules = profile({ noiseCharacters: ["ab", "!!"] });
    const samples = ["aabb", "a!!b", "x(y)aabbz", "<#i>abab</i>"];
    for (const sample of samples) {
      const once = cleanLine(sample, rules);
      expect(cleanLine(once, rules)).toBe(once);
    }
  });
});

describe("cleanLines", () => {
  it("drops lines left empty", () => {
    expect(cleanLines(["(sighs)", "그래", "♪"], korean)).toEqual(["그래"]);
  });
});

describe("cleanCue", () => {
  it("keeps a cue whose whole text was an annotation", () => {
    const cue = { startTimeMs: 1000, endTimeMs: 2000, lines: ["[intro music]"] };

    expect(cleanCue(cue, english)).toEqual({
      startTimeMs: 1000,
      endTimeMs: 2000,
      lines: [],
    });
    expect(cue.lines).toEqual(["[intro music]"]);
  });
});

describe("cleanTrack", () => {
  it("counts emptied cues and corrected lines", () => {
    const track: Track = {
      language: "korean",
      cues: [
        { startTimeMs: 0, endTimeMs: 1000, lines: ["[음악]"] },
        { startTimeMs: 1000, endTimeMs: 2000, lines: ["그럴 필요고 없지"] },
        { startTimeMs: 2000, endTimeMs: 3000, lines: ["좋아"] },
        { startTimeMs: 3000, endTimeMs: 4000, lines: [] },
      ],
    };

    const result = cleanTrack(track, korean);

    expect(result.track.cues.map((cue) => cue.lines)).toEqual([
      [],
      ["그럴 필요도 없지"],
      ["좋아"],
      [],
    ]);
    expect(result.emptiedCues).toBe(1);
    expect(result.correctedLines).toBe(1);
    expect(result.track.language).toBe("korean");
    expect(track.cues[1]?.lines).toEqual(["그럴 필요고 없지"]);
  });
});
