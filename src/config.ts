import { z } from "zod";
import { logger } from "./logger.js";

export const ConfigSchema = z.object({
	CITATION_STANDARD: z.enum(["VAK_RB", "GOST_2018"]).default("VAK_RB"),
	LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
	BATCH_CACHE_SIZE: z.coerce.number().int().positive().default(1000),
	NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
});

export type Config = z.infer<typeof ConfigSchema>;

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
	const result = ConfigSchema.safeParse(env);
	if (!result.success) {
		const message = `Invalid configuration: ${result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join(", ")}`;
		logger.error(message);
		throw new Error(message);
	}
	return result.data;
}
