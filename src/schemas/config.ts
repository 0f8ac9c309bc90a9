/**
 * Zod schema for the configuration file
 */

import { z } from "zod";
import { DEFAULT_MAX_QUEUED_EVENTS } from "../config/constants";

export const LogLevelNameSchema = z.enum(["DEBUG", "INFO", "WARN", "ERROR", "NONE"]);

export const ThemeNameSchema = z.enum(["zinc", "ocean", "mono"]);

export const AppConfigSchema = z
	.object({
		logLevel: LogLevelNameSchema.default("INFO"),
		theme: ThemeNameSchema.default("zinc"),
		alternateScreen: z.boolean().default(true),
		maxQueuedEvents: z
			.number()
			.int()
			.min(1)
			.max(65536)
			.default(DEFAULT_MAX_QUEUED_EVENTS),
	})
	.strict();

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type AppConfigInput = z.input<typeof AppConfigSchema>;

export const DEFAULT_APP_CONFIG: AppConfig = AppConfigSchema.parse({});

/**
 * Parse `data`, logging issues through `onInvalid` and returning null when invalid
 */
export function safeValidate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
	onInvalid: (issues: z.ZodIssue[]) => void,
): T | null {
	const result = schema.safeParse(data);

	if (!result.success) {
		onInvalid(result.error.issues);
		return null;
	}

	return result.data;
}

/**
 * One-line summary of validation issues ("theme: Invalid enum value ...; ...")
 */
export function formatIssues(issues: z.ZodIssue[]): string {
	return issues
		.map((issue) => {
			const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
			return `${path}: ${issue.message}`;
		})
		.join("; ");
}
