import type { ShortcutDefinition, Skill, SkillMatch } from "../../shared/contracts";
import { shortcutsFileSchema } from "../../shared/schemas";
import { JsonConfigFile } from "./json-config";
import { Logger } from "./logger";
import { normalize } from "./normalizer";

export interface ShortcutMatch {
  shortcut: ShortcutDefinition;
  args: string;
}

const normalizeSpaces = (value: string): string => value.trim().replace(/\s+/g, " ");

const escapeRegex = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Comparison form for triggers, names and commands: normalized, without trailing
 * sentence punctuation.
 */
const toKey = (value: string): string => normalize(value).replace(/[\s?!.,]+$/, "");

const isWebUrl = (value: string): boolean => /^https?:\/\//i.test(value);

/**
 * User-defined trigger phrases loaded once at startup. Each shortcut maps a
 * trigger to a URL or to another command that is routed again.
 *
 * @example
 * [{ "name": "Team Board", "trigger": "open the board", "action": "https://example.com/board" },
 *  { "name": "Lookup", "trigger": "define", "action": "search definition of {args}" }]
 */
export class ShortcutService {
  private readonly shortcuts: readonly ShortcutDefinition[];

  constructor(definitions: Array<Partial<ShortcutDefinition> & Pick<ShortcutDefinition, "name" | "trigger" | "action">>) {
    const seen = new Set<string>();
    const accepted: ShortcutDefinition[] = [];

    for (const item of definitions) {
      const shortcut: ShortcutDefinition = {
        name: normalizeSpaces(item.name),
        trigger: toKey(item.trigger),
        action: normalizeSpaces(item.action),
        passThroughArgs: Boolean(item.passThroughArgs),
        enabled: item.enabled !== false
      };
      const nameKey = toKey(shortcut.name);
      if (!shortcut.trigger || seen.has(shortcut.trigger) || seen.has(nameKey)) {
        continue;
      }
      seen.add(shortcut.trigger);
      seen.add(nameKey);
      accepted.push(shortcut);
    }

    this.shortcuts = Object.freeze(accepted.sort((a, b) => b.trigger.length - a.trigger.length));
  }

  static fromFile(filePath: string | undefined, logger: Logger): ShortcutService {
    if (!filePath) {
      return new ShortcutService([]);
    }
    return new ShortcutService(new JsonConfigFile(filePath, shortcutsFileSchema, logger).read([]));
  }

  list(): ShortcutDefinition[] {
    return this.shortcuts.map((item) => ({ ...item }));
  }

  /**
   * Longest enabled trigger wins; a trigger followed by more words passes them as args.
   */
  match(command: string): ShortcutMatch | undefined {
    const normalized = toKey(command);

    for (const item of this.shortcuts) {
      if (!item.enabled) {
        continue;
      }

      if (normalized === item.trigger || normalized === toKey(item.name)) {
        return { shortcut: { ...item }, args: "" };
      }

      const byTrigger = normalized.match(new RegExp(`^${escapeRegex(item.trigger)}\\s+(.+)$`, "u"));
      if (byTrigger) {
        return { shortcut: { ...item }, args: normalizeSpaces(byTrigger[1] ?? "") };
      }
    }

    return undefined;
  }

  buildTarget(shortcut: ShortcutDefinition, args: string): string {
    const action = shortcut.action.trim();
    if (!action) {
      return "";
    }

    if (action.includes("{args}")) {
      const value = isWebUrl(action) ? encodeURIComponent(args) : args;
      return normalizeSpaces(action.split("{args}").join(value));
    }

    if (shortcut.passThroughArgs && args) {
      return normalizeSpaces(`${action} ${args}`);
    }

    return action;
  }

  toSkill(): Skill {
    return {
      name: "shortcuts",
      match: (command: string): SkillMatch | null => {
        const found = this.match(command);
        if (!found) {
          return null;
        }
        return { args: found.args, groups: [found.shortcut.name, this.buildTarget(found.shortcut, found.args)] };
      },
      run: async (match, context) => {
        const [name = "", target = ""] = match.groups;

        if (!target) {
          await context.speak(`The shortcut ${name} has no action.`);
          return;
        }

        if (isWebUrl(target)) {
          const result = await context.openUrl(target);
          await context.speak(result.ok ? `Opening ${name}.` : `Sorry, I couldn't open ${name}.`);
          return;
        }

        if (this.match(target)?.shortcut.name === name) {
          await context.speak(`The shortcut ${name} points to itself.`);
          return;
        }

        const outcome = await context.dispatch(normalize(target));
        if (outcome.kind === "unclaimed") {
          await context.speak(`Sorry, the shortcut ${name} runs a command I don't understand.`);
        }
      }
    };
  }
}
