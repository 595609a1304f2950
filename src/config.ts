import { config as loadDotenv } from "dotenv";
import { z } from "zod";

loadDotenv();

const schema = z.object({
  DIFF_VERBOSE: z
    .string()
    .default("false")
    .transform((v) => v.toLowerCase() === "true"),
  REPORT_MAX_LINES: z
    .string()
    .default("50")
    .transform((v) => Math.max(1, parseInt(v, 10) || 50)),
});

export type AppConfig = z.infer<typeof schema>;

export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = schema.safeParse(env);
  if (!parsed.success) {
    const errs = parsed.error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join(", ");
    throw new Error(`Invalid configuration: ${errs}`);
  }
  return parsed.data;
}

export const appConfig = loadConfig(process.env);
