import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z
	.string()
	.optional()
	.transform((v) => (v && v.trim() ? v.trim() : undefined));

export const envSchema = z.object({
	PHONE_NUMBERS: z
		.string()
		.default('')
		.transform((v) => parsePhoneList(v)),
	PROMPT: optionalString,
	PROMPT_MODE: z.enum(['description', 'lyrics']).default('description'),

	AUTH_BASE_URL: z.string().url().default('https://clerk.suno.com'),
	API_BASE_URL: z.string().url().default('https://studio-api.suno.ai'),
	// Sent unchanged on every identity call; the identity service may reject a mismatch.
	CLIENT_VERSION: z.string().default('5.26.3'),
	MODEL_VERSION: z.string().default('chirp-v3-5'),
	MAKE_INSTRUMENTAL: z
		.enum(['true', 'false', '1', '0'])
		.default('false')
		.transform((v) => v === 'true' || v === '1'),

	FALLBACK_POLICY: z.enum(['stop-on-error', 'skip-on-error']).default('stop-on-error'),
	POLL_INTERVAL_MS: z.coerce.number().int().positive().default(5_000),
	POLL_MAX_ATTEMPTS: z.coerce.number().int().positive().default(120),

	OUTPUT_DIR: z.string().default('.'),
	FILE_PREFIX: z.string().default('clip'),

	OTP_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
	TWILIO_ACCOUNT_SID: optionalString,
	TWILIO_AUTH_TOKEN: optionalString,

	AXIOM_TOKEN: optionalString,
	AXIOM_DATASET: z.string().default('songrelay'),
});

export type Config = z.infer<typeof envSchema>;

/** Splits a comma-separated list, trims entries and drops blanks and repeats. */
export function parsePhoneList(raw: string): string[] {
	const seen = new Set<string>();
	for (const part of raw.split(',')) {
		const phone = part.trim();
		if (phone) seen.add(phone);
	}
	return [...seen];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
	return envSchema.parse(env);
}
