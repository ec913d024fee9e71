import { z } from "zod";
import type {
  BracketStyle,
  CleaningProfile,
  CleaningProfiles,
  PairNaming,
} from "../types.js";

// Symbols that show up in subtitle rips but never in spoken dialogue
export const DEFAULT_NOISE_CHARACTERS: string[] = [
  "♪",
  "♫",
  "♬",
  "♩",
  "#",
  "*",
  "~",
  "＊",
  "～",
  "=",
  "_",
  "|",
  "^",
  "@",
  "&",
  "%",
  "$",
  "\\",
  "/",
  "{",
  "}",
  "`",
  '"',
  "「",
  "」",
  "『",
  "』",
  "《",
  "》",
  "【",
  "】",
];

export const DEFAULT_BRACKET_STYLES: BracketStyle[] = [
  { open: "[", close: "]" },
  { open: "(", close: ")" },
];

// Credit lines that are shown as cues but aren't dialogue
export const DEFAULT_METADATA_KEYWORDS: string[] = [
  "배급:",
  "제공:",
  "감독:",
  "제작:",
  "Presented by",
  "Director:",
  "Production:",
];

export const KOREAN_TYPO_MAP: Record<string, string> = {
  "필요고 없지": "필요도 없지",
};

export const DEFAULT_CLEANING_PROFILES: CleaningProfiles = {
  english: {
    noiseCharacters: DEFAULT_NOISE_CHARACTERS,
    typoMap: {},
    bracketStyles: DEFAULT_BRACKET_STYLES,
    metadataKeywords: DEFAULT_METADATA_KEYWORDS,
  },
  korean: {
    noiseCharacters: DEFAULT_NOISE_CHARACTERS,
    typoMap: KOREAN_TYPO_MAP,
    bracketStyles: DEFAULT_BRACKET_STYLES,
    metadataKeywords: DEFAULT_METADATA_KEYWORDS,
  },
};

export const DEFAULT_PAIR_NAMING: PairNaming = {
  englishSuffix: "_en",
  koreanSuffix: "_kr",
  outputSuffix: "_FINAL",
  extension: ".vtt",
};

const zBracketStyle = z.object({
  open: z.string().min(1),
  close: z.string().min(1),
});

/**
 * Whether text written by `correction` could, alone or together with the text
 * around it, spell `key`. Typos are corrected in one pass, so such a key would
 * only be matched the next time the line is cleaned.
 */
export function canFormTypoKey(correction: string, key: string): boolean {
  if (correction.includes(key) || key.includes(correction)) return true;
  const limit = Math.min(correction.length, key.length);
  for (let size = 1; size < limit; size++) {
    if (correction.endsWith(key.slice(0, size))) return true;
    if (correction.startsWith(key.slice(key.length - size))) return true;
  }
  return false;
}

const zTypoMap = z
  .record(z.string().min(1), z.string().min(1))
  .superRefine((typoMap, ctx) => {
    const keys = Object.keys(typoMap);
    for (const [typo, correction] of Object.entries(typoMap)) {
      const chained = keys.find((key) => canFormTypoKey(correction, key));
      if (chained !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [typo],
          message: `correction "${correction}" can run into typo "${chained}" and be corrected again`,
        });
      }
    }
  });

const zProfileOverride = z
  .object({
    noiseCharacters: z.array(z.string().min(1)).optional(),
    typoMap: zTypoMap.optional(),
    bracketStyles: z.array(zBracketStyle).optional(),
    metadataKeywords: z.array(z.string().min(1)).optional(),
  })
  .strict();

/**
 * Shape of a --config file. Each language section replaces the listed
 * fields of that language's default profile; omitted fields keep the default.
 */
export const zCleaningConfigFile = z
  .object({
    english: zProfileOverride.optional(),
    korean: zProfileOverride.optional(),
  })
  .strict();

type ProfileOverride = z.infer<typeof zProfileOverride>;

function applyOverride(
  base: CleaningProfile,
  override: ProfileOverride | undefined
): CleaningProfile {
  if (!override) return base;
  return {
    noiseCharacters: override.noiseCharacters ?? base.noiseCharacters,
    typoMap: override.typoMap ?? base.typoMap,
    bracketStyles: override.bracketStyles ?? base.bracketStyles,
    metadataKeywords: override.metadataKeywords ?? base.metadataKeywords,
  };
}

/**
 * Validates a parsed config file and merges it over the default profiles.
 */
export function resolveCleaningProfiles(
  raw: unknown,
  defaults: CleaningProfiles = DEFAULT_CLEANING_PROFILES
):
  | { ok: true; profiles: CleaningProfiles }
  | { ok: false; message: string } {
  const parsed = zCleaningConfigFile.safeParse(raw);
  if (!parsed.success) {
    const message = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    return { ok: false, message };
  }
  return {
    ok: true,
    profiles: {
      english: applyOverride(defaults.english, parsed.data.english),
      korean: applyOverride(defaults.korean, parsed.data.korean),
    },
  };
}
