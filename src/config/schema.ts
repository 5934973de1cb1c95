import cron from "node-cron";
import { z } from "zod";

function isValidRegex(pattern: string): boolean {
  try {
    new RegExp(pattern, "i");
    return true;
  } catch {
    return false;
  }
}

const regexSchema = z
  .string()
  .min(1)
  .refine(isValidRegex, { message: "invalid regular expression" });

export const feedEntrySchema = z
  .object({
    name: z.string().min(1),
    category: z.string().min(1).optional(),
    filter: regexSchema.optional(),
    exclude: regexSchema.optional(),
  })
  .strict();

export const appConfigSchema = z.object({
  planet: z
    .object({
      name: z.string().min(1).default("Unconfigured Planet"),
      link: z.string().url().optional(),
      ownerName: z.string().min(1).default("Anonymous"),
      ownerEmail: z.string().email().optional(),
    })
    .default({}),
  cache: z
    .object({
      path: z.string().min(1).default("./data/feedmill.db"),
      windowSize: z.number().int().positive().max(1000).default(100),
    })
    .default({}),
  fetch: z
    .object({
      timeoutMs: z.number().int().positive().default(20000),
      runTimeoutMs: z.number().int().positive().default(300000),
      maxBytes: z
        .number()
        .int()
        .positive()
        .default(5 * 1024 * 1024),
      maxRedirects: z.number().int().nonnegative().default(5),
      concurrency: z.number().int().positive().default(8),
      userAgent: z.string().min(1).optional(),
      backoff: z
        .object({
          baseDelayMinutes: z.number().positive().default(30),
          maxDelayMinutes: z.number().positive().default(1440),
          maxRetries: z.number().int().positive().default(6),
        })
        .default({}),
    })
    .default({}),
  merge: z
    .object({
      maxEntries: z.number().int().positive().default(60),
      maxDays: z.number().int().nonnegative().default(0),
      newFeedItems: z.number().int().nonnegative().default(10),
      filter: regexSchema.optional(),
      exclude: regexSchema.optional(),
    })
    .default({}),
  output: z
    .object({
      path: z.string().min(1).default("./output/planet.json"),
    })
    .default({}),
  schedule: z
    .string()
    .refine((expression) => cron.validate(expression), {
      message: "invalid cron expression",
    })
    .optional(),
  feeds: z
    .record(z.string(), z.unknown())
    .refine((feeds) => Object.keys(feeds).length > 0, {
      message: "at least one feed is required",
    }),
});

export type AppConfig = z.infer<typeof appConfigSchema>;
export type FeedEntryConfig = z.infer<typeof feedEntrySchema>;
