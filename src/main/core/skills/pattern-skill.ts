import type { Skill, SkillContext, SkillMatch } from "../../../shared/contracts";

/**
 * Strips trailing sentence punctuation so patterns can anchor on `$`.
 */
export const stripTrailingPunctuation = (value: string): string => value.replace(/[\s?!.,]+$/, "");

interface PatternSkillDefinition {
  name: string;
  patterns: RegExp[];
  endsSession?: boolean;
  run: (match: SkillMatch, context: SkillContext) => Promise<void>;
}

/**
 * Skill whose predicate is an ordered list of patterns over the normalized command,
 * tried with trailing punctuation removed.
 * `args` is the first non-empty capture group of the winning pattern.
 */
export const patternSkill = (definition: PatternSkillDefinition): Skill => ({
  name: definition.name,
  endsSession: definition.endsSession,
  match(command: string): SkillMatch | null {
    const text = stripTrailingPunctuation(command);
    for (const pattern of definition.patterns) {
      const found = text.match(pattern);
      if (!found) {
        continue;
      }
      const groups = found.slice(1).map((group) => (group ?? "").trim());
      const args = groups.find(Boolean) ?? "";
      return { args, groups };
    }
    return null;
  },
  run: definition.run
});
