import { readFileSync } from "node:fs";
import { z } from "zod";

const keywordTableSchema = z.record(z.array(z.string().min(1)));

export type MuscleGroupKeywords = z.infer<typeof keywordTableSchema>;

function loadKeywordTable(): MuscleGroupKeywords {
  const raw = readFileSync(new URL("./muscle-group-keywords.json", import.meta.url), "utf8");
  return keywordTableSchema.parse(JSON.parse(raw));
}

/** Groups are checked in file order; the first keyword hit wins. */
export const MUSCLE_GROUP_KEYWORDS: MuscleGroupKeywords = loadKeywordTable();

export const FALLBACK_MUSCLE_GROUP = "other";

export function inferMuscleGroup(
  exerciseName: string,
  table: MuscleGroupKeywords = MUSCLE_GROUP_KEYWORDS,
): string {
  const lower = exerciseName.toLowerCase();
  for (const [group, keywords] of Object.entries(table)) {
    if (keywords.some((keyword) => lower.includes(keyword))) return group;
  }
  return FALLBACK_MUSCLE_GROUP;
}
