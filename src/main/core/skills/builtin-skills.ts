import type {
  AppLauncher,
  EncyclopediaLookup,
  Skill,
  SkillContext,
  SkillMatch,
  Translator,
  WeatherLookup
} from "../../../shared/contracts";
import { buildSearchUrl } from "../fallback-chain";
import type { ShortcutService } from "../shortcut-service";
import { currentGreeting, formatClockTime, formatSpokenDate } from "../time";
import { patternSkill, stripTrailingPunctuation } from "./pattern-skill";

export interface BuiltinSkillDependencies {
  assistantName: string;
  searchUrl: string;
  shortcuts: ShortcutService;
  apps: AppLauncher;
  translator: Translator;
  encyclopedia: EncyclopediaLookup;
  /** Weather is only registered when a lookup is configured. */
  weather?: WeatherLookup;
}

interface SiteEntry {
  label: string;
  url: string;
}

const SITES: Record<string, SiteEntry> = {
  youtube: { label: "YouTube", url: "https://www.youtube.com" },
  google: { label: "Google", url: "https://www.google.com" },
  github: { label: "GitHub", url: "https://github.com" },
  wikipedia: { label: "Wikipedia", url: "https://www.wikipedia.org" },
  gmail: { label: "Gmail", url: "https://mail.google.com" },
  "stack overflow": { label: "Stack Overflow", url: "https://stackoverflow.com" },
  maps: { label: "Google Maps", url: "https://maps.google.com" },
  news: { label: "Google News", url: "https://news.google.com" }
};

const YOUTUBE_SEARCH_URL = "https://www.youtube.com/results?search_query=";

const escapeRegex = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const capitalize = (value: string): string => value.charAt(0).toUpperCase() + value.slice(1);

const openAndAnnounce = async (context: SkillContext, url: string, announcement: string): Promise<void> => {
  const result = await context.openUrl(url);
  await context.speak(result.ok ? announcement : "Sorry, I couldn't open the browser.");
};

const exitSkill = (assistantName: string): Skill =>
  patternSkill({
    name: "exit",
    endsSession: true,
    patterns: [
      new RegExp(
        `^(?:stop|exit|quit|goodbye|good bye|bye|shut down|go to sleep)(?:\\s+(?:${escapeRegex(assistantName)}|please))?$`,
        "u"
      )
    ],
    run: async (_match, context) => {
      await context.speak("Goodbye.");
    }
  });

const openAppSkill = (apps: AppLauncher): Skill => ({
  name: "open_app",
  match(command: string): SkillMatch | null {
    const found = stripTrailingPunctuation(command).match(/^(?:open|launch|start)\s+(.+)$/u);
    const name = found?.[1]?.trim() ?? "";
    if (!name || !apps.has(name)) {
      return null;
    }
    return { args: name, groups: [name] };
  },
  run: async (match, context) => {
    const result = await apps.launch(match.args);
    await context.speak(result.message);
  }
});

/**
 * Built-in skills in routing priority order. The exit skill always comes first
 * and user shortcuts come before everything else.
 */
export const buildBuiltinSkills = (deps: BuiltinSkillDependencies): Skill[] => {
  const assistantName = deps.assistantName.trim().toLowerCase();
  const siteNames = Object.keys(SITES)
    .sort((a, b) => b.length - a.length)
    .map(escapeRegex)
    .join("|");

  const skills: Skill[] = [
    exitSkill(assistantName),
    deps.shortcuts.toSkill(),
    patternSkill({
      name: "greeting",
      patterns: [/^(?:hello|hi|hey|good morning|good afternoon|good evening)(?:\s+there)?$/u],
      run: async (_match, context) => {
        await context.speak(`${currentGreeting(context.now())}! How can I help?`);
      }
    }),
    patternSkill({
      name: "identity",
      patterns: [/^(?:who are you|what is your name|what's your name)$/u],
      run: async (_match, context) => {
        await context.speak(`I am ${capitalize(assistantName)}, your voice assistant.`);
      }
    }),
    patternSkill({
      name: "time",
      patterns: [/^(?:what time is it|what's the time|what is the time|tell me the time|time)$/u],
      run: async (_match, context) => {
        await context.speak(`The time is ${formatClockTime(context.now())}.`);
      }
    }),
    patternSkill({
      name: "date",
      patterns: [/^(?:what's the date|what is the date|what day is it|today's date|what is today's date)$/u],
      run: async (_match, context) => {
        await context.speak(`Today is ${formatSpokenDate(context.now())}.`);
      }
    }),
    patternSkill({
      name: "open_site",
      patterns: [new RegExp(`^open\\s+(${siteNames})$`, "u")],
      run: async (match, context) => {
        const site = SITES[match.args];
        if (!site) {
          await context.speak(`Sorry, I don't know the site ${match.args}.`);
          return;
        }
        await openAndAnnounce(context, site.url, `Opening ${site.label}.`);
      }
    }),
    patternSkill({
      name: "play_youtube",
      patterns: [/^play\s+(.+?)\s+on\s+youtube$/u],
      run: async (match, context) => {
        await openAndAnnounce(
          context,
          `${YOUTUBE_SEARCH_URL}${encodeURIComponent(match.args)}`,
          `Playing ${match.args} on YouTube.`
        );
      }
    }),
    patternSkill({
      name: "web_search",
      patterns: [/^search\s+(?:for\s+)?(.+)$/u, /^google\s+(.+)$/u, /^look\s+up\s+(.+)$/u],
      run: async (match, context) => {
        await openAndAnnounce(
          context,
          buildSearchUrl(deps.searchUrl, match.args),
          `Searching the web for ${match.args}.`
        );
      }
    }),
    patternSkill({
      name: "wikipedia",
      patterns: [/^wikipedia\s+(.+)$/u, /^tell me about\s+(.+?)\s+(?:from|on)\s+wikipedia$/u],
      run: async (match, context) => {
        const result = await deps.encyclopedia.summarize(match.args);
        await context.speak(result.message);
      }
    })
  ];

  const { weather } = deps;
  if (weather) {
    skills.push(
      patternSkill({
        name: "weather",
        patterns: [
          /^(?:what's the |what is the |how's the )?weather\s+(?:in|for|at)\s+(.+)$/u,
          /^how is the weather\s+(?:in|for|at)\s+(.+)$/u
        ],
        run: async (match, context) => {
          const result = await weather.describe(match.args);
          await context.speak(result.message);
        }
      })
    );
  }

  skills.push(
    patternSkill({
      name: "translate",
      patterns: [/^translate\s+(.+)\s+(?:to|into)\s+([\p{L} ]+)$/u],
      run: async (match, context) => {
        const [text = "", language = ""] = match.groups;
        const result = await deps.translator.translate(text, language);
        await context.speak(result.message);
      }
    }),
    openAppSkill(deps.apps),
    patternSkill({
      name: "repeat",
      patterns: [/^repeat after me\s+(.+)$/u, /^say\s+(.+)$/u],
      run: async (match, context) => {
        await context.speak(match.args);
      }
    })
  );

  return skills;
};
