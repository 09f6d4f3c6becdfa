import { z } from "zod";

export const DEFAULT_ON_CALENDAR = "*-*-* 14:00:00";

/** Shape of config.yaml; every key is optional and falls back to its default. */
export const ToolConfigSchema = z.object({
  schedule: z.object({
    on_calendar: z.string().min(1).default(DEFAULT_ON_CALENDAR),
    persistent: z.boolean().default(true),
  }).default({}),
  editor: z.object({
    fallbacks: z.array(z.string().min(1)).default(["nano", "vi"]),
  }).default({}),
  logs: z.object({
    since: z.string().min(1).default("today"),
  }).default({}),
}).strict();

export type ToolConfig = z.infer<typeof ToolConfigSchema>;

export const DEFAULT_CONFIG: ToolConfig = ToolConfigSchema.parse({});
