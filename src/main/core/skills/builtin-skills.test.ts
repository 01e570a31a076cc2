import { describe, expect, it, vi } from "vitest";
import type { ActionResult, AppLauncher, SkillContext } from "../../../shared/contracts";
import { Logger } from "../logger";
import { normalize } from "../normalizer";
import { ShortcutService } from "../shortcut-service";
import { SkillRouter } from "../skill-router";
import { buildBuiltinSkills, type BuiltinSkillDependencies } from "./builtin-skills";

const ok = (message: string): ActionResult => ({ ok: true, message });

const makeHarness = (overrides: Partial<BuiltinSkillDependencies> = {}) => {
  const spoken: string[] = [];
  const opened: string[] = [];
  const apps: AppLauncher = {
    has: (name) => name === "calculator",
    names: () => ["calculator"],
    launch: vi.fn(async (name: string) => ok(`Opening ${name}.`))
  };
  const deps: BuiltinSkillDependencies = {
    assistantName: "nova",
    searchUrl: "https://search.example.com/?q=",
    shortcuts: new ShortcutService([{ name: "Standup", trigger: "standup", action: "https://example.com/meet" }]),
    apps,
    translator: { translate: vi.fn(async (text: string, language: string) => ok(`${language}: ${text}`)) },
    encyclopedia: { summarize: vi.fn(async (topic: string) => ok(`About ${topic}.`)) },
    weather: { describe: vi.fn(async (city: string) => ok(`Sunny in ${city}.`)) },
    ...overrides
  };
  const skills = buildBuiltinSkills(deps);
  const router = new SkillRouter({
    skills,
    actionTimeoutMs: 1000,
    logger: new Logger(),
    createContext: (dispatch): SkillContext => ({
      speak: async (text) => {
        spoken.push(text);
      },
      openUrl: async (url) => {
        opened.push(url);
        return ok(`Opening ${url}`);
      },
      now: () => new Date(2026, 9, 18, 21, 7),
      dispatch
    })
  });
  return { deps, router, skills, spoken, opened };
};

describe("buildBuiltinSkills", () => {
  it("registers skills in routing priority order", () => {
    const { skills } = makeHarness();

    expect(skills.map((skill) => skill.name)).toEqual([
      "exit",
      "shortcuts",
      "greeting",
      "identity",
      "time",
      "date",
      "open_site",
      "play_youtube",
      "web_search",
      "wikipedia",
      "weather",
      "translate",
      "open_app",
      "repeat"
    ]);
  });

  it("leaves weather out when no lookup is configured", () => {
    const { skills } = makeHarness({ weather: undefined });

    expect(skills.map((skill) => skill.name)).not.toContain("weather");
  });

  it("ends the session on exit phrases", async () => {
    const { router, spoken } = makeHarness();

    await expect(router.dispatch("goodbye nova")).resolves.toEqual({ kind: "session_end", skill: "exit" });
    await expect(router.dispatch("stop")).resolves.toEqual({ kind: "session_end", skill: "exit" });
    expect(spoken).toEqual(["Goodbye.", "Goodbye."]);
  });

  it("does not treat a longer sentence starting with stop as exit", async () => {
    const { router } = makeHarness();

    await expect(router.dispatch("stop the music please now")).resolves.toEqual({ kind: "unclaimed" });
  });

  it("speaks the time and date from the context clock", async () => {
    const { router, spoken } = makeHarness();

    await router.dispatch(normalize("What time is it?"));
    await router.dispatch("what's the date");

    expect(spoken).toEqual(["The time is 9:07 PM.", "Today is Sunday, October 18, 2026."]);
  });

  it("greets and introduces itself", async () => {
    const { router, spoken } = makeHarness();

    await router.dispatch("hello");
    await router.dispatch("what's your name");

    expect(spoken).toEqual(["Good evening! How can I help?", "I am Nova, your voice assistant."]);
  });

  it("opens named sites, YouTube searches and web searches", async () => {
    const { router, spoken, opened } = makeHarness();

    await router.dispatch("open stack overflow");
    await router.dispatch("play lo-fi beats on youtube");
    await router.dispatch("search for rust lifetimes");

    expect(opened).toEqual([
      "https://stackoverflow.com",
      "https://www.youtube.com/results?search_query=lo-fi%20beats",
      "https://search.example.com/?q=rust%20lifetimes"
    ]);
    expect(spoken).toEqual([
      "Opening Stack Overflow.",
      "Playing lo-fi beats on YouTube.",
      "Searching the web for rust lifetimes."
    ]);
  });

  it("routes lookups to their collaborators", async () => {
    const { router, spoken, deps } = makeHarness();

    await router.dispatch("tell me about alan turing from wikipedia");
    await router.dispatch("what's the weather in paris");
    await router.dispatch("translate good morning to french");

    expect(deps.encyclopedia.summarize).toHaveBeenCalledWith("alan turing");
    expect(deps.translator.translate).toHaveBeenCalledWith("good morning", "french");
    expect(spoken).toEqual(["About alan turing.", "Sunny in paris.", "french: good morning"]);
  });

  it("claims open commands only for configured applications", async () => {
    const { router, deps, spoken } = makeHarness();

    await expect(router.dispatch("open calculator")).resolves.toEqual({
      kind: "handled",
      skill: "open_app",
      failed: false
    });
    await expect(router.dispatch("open the pod bay doors")).resolves.toEqual({ kind: "unclaimed" });
    expect(deps.apps.launch).toHaveBeenCalledTimes(1);
    expect(spoken).toEqual(["Opening calculator."]);
  });

  it("gives shortcuts priority over built-in skills", async () => {
    const { router, opened } = makeHarness({
      shortcuts: new ShortcutService([{ name: "Music", trigger: "open youtube", action: "https://music.example.com" }])
    });

    await expect(router.dispatch("open youtube")).resolves.toEqual({
      kind: "handled",
      skill: "shortcuts",
      failed: false
    });
    expect(opened).toEqual(["https://music.example.com"]);
  });

  it("ends the session when a shortcut runs the exit command", async () => {
    const { router, spoken } = makeHarness({
      shortcuts: new ShortcutService([{ name: "Bedtime", trigger: "bedtime", action: "stop" }])
    });

    await expect(router.dispatch("bedtime")).resolves.toEqual({ kind: "session_end", skill: "shortcuts" });
    expect(spoken).toEqual(["Goodbye."]);
  });

  it("repeats text and lets command shortcuts reach it", async () => {
    const { router, spoken } = makeHarness({
      shortcuts: new ShortcutService([{ name: "Cheer", trigger: "cheer me up", action: "say you are doing great" }])
    });

    await router.dispatch("repeat after me hello world");
    await router.dispatch("cheer me up");

    expect(spoken).toEqual(["hello world", "you are doing great"]);
  });
});
