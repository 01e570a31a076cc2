import { z } from "zod";

export const appsFileSchema = z.record(z.string().trim().min(1).max(80), z.string().trim().min(1).max(320));

export const shortcutSchema = z.object({
  name: z.string().trim().min(2).max(80),
  trigger: z.string().trim().min(2).max(120),
  action: z.string().trim().min(1).max(220),
  passThroughArgs: z.boolean().optional(),
  enabled: z.boolean().optional()
});

export const shortcutsFileSchema = z.array(shortcutSchema).max(200);

export const weatherResponseSchema = z.object({
  name: z.string(),
  weather: z.array(z.object({ description: z.string() })).min(1),
  main: z.object({
    temp: z.number(),
    humidity: z.number().optional()
  })
});

export const translationResponseSchema = z.object({
  responseStatus: z.union([z.number(), z.string()]).optional(),
  responseData: z.object({
    translatedText: z.string()
  })
});

export const wikipediaSummarySchema = z.object({
  title: z.string(),
  extract: z.string()
});
