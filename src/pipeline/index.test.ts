import { beforeAll, afterAll, describe, it, expect } from "vitest";
import { alignSubtitlePair } from "./index.js";
import { configureLogger, resetLogger } from "../utils/logger.js";

beforeAll(() => configureLogger({ logToConsole: false }));
afterAll(() => resetLogger());

const ENGLISH = `WEBVTT

1
00:00:01.000 --> 00:00:02.000
[door opens] Hello.

2
00:00:03.000 --> 00:00:04.500
(music)

3
00:00:05.000 --> 00:00:06.000
You don't need to.
`;

const KOREAN = `WEBVTT

1
00:00:01.200 --> 00:00:02.100
[문 열리는 소리] 안녕하세요.

2
00:00:03.100 --> 00:00:04.400
♪ 음악 ♪

3
00:00:05.300 --> 00:00:06.200
그럴 필요고 없지
`;

describe("alignSubtitlePair", () => {
  it("cleans both tracks and stamps Korean cues with English timings", () => {
    const result = alignSubtitlePair(ENGLISH, KOREAN);

    expect(result.status).toBe("aligned");
    if (result.status !== "aligned") return;
    expect(result.english).toBe(
      "WEBVTT\n\n" +
        "1\n00:00:01.000 --> 00:00:02.000\nHello.\n\n" +
        "2\n00:00:03.000 --> 00:00:04.500\n\n" +
        "3\n00:00:05.000 --> 00:00:06.000\nYou don't need to.\n\n"
    );
    expect(result.korean).toBe(
      "WEBVTT\n\n" +
        "1\n00:00:01.000 --> 00:00:02.000\n안녕하세요.\n\n" +
        "2\n00:00:03.000 --> 00:00:04.500\n음악\n\n" +
        "3\n00:00:05.000 --> 00:00:06.000\n그럴 필요도 없지\n\n"
    );
    expect(result.summary).toEqual({
      cueCount: 3,
      english: { parsedCues: 3, skippedBlocks: 0, emptiedCues: 1, correctedLines: 0 },
      korean: { parsedCues: 3, skippedBlocks: 0, emptiedCues: 0, correctedLines: 1 },
    });
    expect(result.issues).toEqual([]);
  });

  it("applies caller-supplied profiles", () => {
    const result = alignSubtitlePair(
      "WEBVTT\n\n00:00:01.000 --> 00:00:02.000\nHi!!\n",
      "WEBVTT\n\n00:00:01.500 --> 00:00:02.500\n끝이 됬다!!\n",
      {
        profiles: {
          english: { noiseCharacters: ["!!"], typoMap: {}, bracketStyles: [], metadataKeywords: [] },
          korean: {
            noiseCharacters: ["!!"],
            typoMap: { "됬다": "됐다" },
            bracketStyles: [],
            metadataKeywords: [],
          },
        },
      }
    );

    expect(result.status).toBe("aligned");
    if (result.status !== "aligned") return;
    expect(result.korean).toBe(
      "WEBVTT\n\n1\n00:00:01.000 --> 00:00:02.000\n끝이 됐다\n\n"
    );
  });

  it("fails with the longer file named when cue counts differ", () => {
    const shortKorean = KOREAN.split("\n3\n")[0] ?? "";

    const result = alignSubtitlePair(ENGLISH, shortKorean, {
      englishPath: "in/movie_en.vtt",
      koreanPath: "in/movie_kr.vtt",
    });

    expect(result.status).toBe("failed");
    expect(result.issues).toHaveLength(1);
    expect(result.issues[0]).toMatchObject({
      type: "CueCountMismatch",
      filePath: "in/movie_en.vtt",
      cueIndex: 2,
    });
  });

  it("passes parser warnings through with the file path", () => {
    const broken = KOREAN.replace("00:00:03.100 --> 00:00:04.400", "00:00:03.100 -> 00:00:04.400");

    const result = alignSubtitlePair(ENGLISH, broken, { koreanPath: "movie_kr.vtt" });

    expect(result.status).toBe("failed");
    expect(result.issues.map((issue) => issue.type)).toEqual([
      "MalformedBlock",
      "CueCountMismatch",
    ]);
    expect(result.issues[0]?.filePath).toBe("movie_kr.vtt");
  });

  it("does not pair cues past a broken first English cue", () => {
    const broken = ENGLISH.replace(
      "00:00:01.000 --> 00:00:02.000",
      "00:00:01.000 -> 00:00:02.000"
    );

    const result = alignSubtitlePair(broken, KOREAN, {
      englishPath: "in/movie_en.vtt",
      koreanPath: "in/movie_kr.vtt",
    });

    expect(result.status).toBe("failed");
    expect(result.issues.map((issue) => issue.type)).toEqual([
      "MalformedBlock",
      "CueCountMismatch",
    ]);
    expect(result.issues[0]).toMatchObject({
      filePath: "in/movie_en.vtt",
      blockNumber: 2,
    });
    expect(result.issues[1]).toMatchObject({
      filePath: "in/movie_kr.vtt",
      language: "korean",
      cueIndex: 2,
    });
  });
});
