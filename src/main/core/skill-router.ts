import type { Skill, SkillContext, SkillOutcome, Speaker, UrlOpener } from "../../shared/contracts";
import { getErrorMessage, Logger } from "./logger";
import { TimeoutError } from "./timeout";

const MAX_DISPATCH_DEPTH = 4;

export const SKILL_FAILURE_APOLOGY = "Sorry, something went wrong with that.";

export type SkillContextFactory = (dispatch: SkillContext["dispatch"]) => SkillContext;

interface SkillContextCollaborators {
  speaker: Speaker;
  urlOpener: UrlOpener;
  now?: () => Date;
}

export const createSkillContextFactory = ({
  speaker,
  urlOpener,
  now = () => new Date()
}: SkillContextCollaborators): SkillContextFactory => (dispatch) => ({
  speak: (text) => speaker.speak(text),
  openUrl: (url) => urlOpener.open(url),
  now,
  dispatch
});

interface SkillRouterOptions {
  skills: Skill[];
  createContext: SkillContextFactory;
  actionTimeoutMs: number;
  logger: Logger;
}

/**
 * Ordered first-match-wins routing table. Registration order is priority order
 * and the table is frozen at construction.
 */
export class SkillRouter {
  private readonly skills: readonly Skill[];
  private readonly createContext: SkillContextFactory;
  private readonly actionTimeoutMs: number;
  private readonly logger: Logger;

  constructor(options: SkillRouterOptions) {
    const seen = new Set<string>();
    for (const skill of options.skills) {
      if (seen.has(skill.name)) {
        throw new Error(`Skill "${skill.name}" registered twice.`);
      }
      seen.add(skill.name);
    }

    this.skills = Object.freeze([...options.skills]);
    this.createContext = options.createContext;
    this.actionTimeoutMs = options.actionTimeoutMs;
    this.logger = options.logger;
  }

  listSkills(): string[] {
    return this.skills.map((skill) => skill.name);
  }

  async dispatch(command: string): Promise<SkillOutcome> {
    return this.dispatchAt(command, 0);
  }

  private async dispatchAt(command: string, depth: number): Promise<SkillOutcome> {
    const text = command.trim();
    if (!text) {
      return { kind: "handled", skill: "noop", failed: false };
    }

    if (depth > MAX_DISPATCH_DEPTH) {
      this.logger.warn("Command recursion blocked.", text);
      return { kind: "handled", skill: "recursion_guard", failed: true };
    }

    for (const skill of this.skills) {
      const match = this.safeMatch(skill, text);
      if (!match) {
        continue;
      }

      this.logger.info(`Skill "${skill.name}" claimed command.`, text);
      let nestedSessionEnd = false;
      const context = this.createContext(async (next) => {
        const nested = await this.dispatchAt(next, depth + 1);
        if (nested.kind === "session_end") {
          nestedSessionEnd = true;
        }
        return nested;
      });
      const failed = !(await this.runIsolated(skill, match, context));

      if (skill.endsSession || nestedSessionEnd) {
        return { kind: "session_end", skill: skill.name };
      }
      return { kind: "handled", skill: skill.name, failed };
    }

    return { kind: "unclaimed" };
  }

  private safeMatch(skill: Skill, command: string): ReturnType<Skill["match"]> {
    try {
      return skill.match(command);
    } catch (error) {
      this.logger.warn(`Skill "${skill.name}" predicate failed.`, getErrorMessage(error));
      return null;
    }
  }

  /**
   * Runs an action under the router's bound. Time spent speaking or in a nested
   * dispatch does not count against it, and lines an expired action tries to
   * speak afterwards are dropped.
   */
  private async runIsolated(
    skill: Skill,
    match: NonNullable<ReturnType<Skill["match"]>>,
    context: SkillContext
  ): Promise<boolean> {
    let settled = false;
    let timer: NodeJS.Timeout | undefined;
    let expire: (error: Error) => void = () => undefined;
    const expired = new Promise<never>((_, reject) => {
      expire = reject;
    });

    const arm = (): void => {
      clearTimeout(timer);
      if (!settled) {
        timer = setTimeout(() => expire(new TimeoutError(`Skill "${skill.name}"`, this.actionTimeoutMs)), this.actionTimeoutMs);
      }
    };
    const paused = async <T>(work: () => Promise<T>): Promise<T> => {
      clearTimeout(timer);
      try {
        return await work();
      } finally {
        arm();
      }
    };

    const bounded: SkillContext = {
      ...context,
      speak: async (text) => {
        if (settled) {
          this.logger.debug(`Dropped speech from expired skill "${skill.name}".`, text);
          return;
        }
        await paused(() => context.speak(text));
      },
      dispatch: (command) => paused(() => context.dispatch(command))
    };

    arm();
    try {
      await Promise.race([skill.run(match, bounded), expired]);
      return true;
    } catch (error) {
      this.logger.error(`Skill "${skill.name}" failed.`, getErrorMessage(error));
      try {
        await context.speak(SKILL_FAILURE_APOLOGY);
      } catch (speakError) {
        this.logger.error("Unable to deliver apology.", getErrorMessage(speakError));
      }
      return false;
    } finally {
      settled = true;
      clearTimeout(timer);
    }
  }
}
