import type { ActionResult, WeatherLookup } from "../../../shared/contracts";
import { weatherResponseSchema } from "../../../shared/schemas";
import { Logger } from "../logger";
import { fetchJson } from "./http-json";

const ENDPOINT = "https://api.openweathermap.org/data/2.5/weather";

const titleCase = (value: string): string =>
  value
    .split(" ")
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");

export class OpenWeatherService implements WeatherLookup {
  constructor(
    private readonly apiKey: string,
    private readonly timeoutMs: number,
    private readonly logger: Logger
  ) {}

  async describe(city: string): Promise<ActionResult> {
    const place = city.trim();
    if (!place) {
      return { ok: false, message: "Which city should I check the weather for?" };
    }

    const url = `${ENDPOINT}?q=${encodeURIComponent(place)}&appid=${encodeURIComponent(this.apiKey)}&units=metric`;
    const result = await fetchJson(url, weatherResponseSchema, this.timeoutMs);

    if (!result.ok) {
      this.logger.warn("Weather lookup failed.", { city: place, reason: result.reason });
      if (result.status === 404) {
        return { ok: false, message: `Sorry, I couldn't find the weather for ${titleCase(place)}.` };
      }
      return { ok: false, message: "Sorry, I couldn't reach the weather service right now." };
    }

    const { name, weather, main } = result.data;
    const description = weather[0]?.description ?? "unknown conditions";
    return {
      ok: true,
      message: `It is ${Math.round(main.temp)} degrees Celsius in ${name} with ${description}.`
    };
  }
}
