import { z } from 'zod';

// Identity service

export const firstFactorSchema = z
	.object({
		strategy: z.string().optional(),
		phone_number_id: z.string().optional(),
	})
	.passthrough();

export const signInAttemptSchema = z
	.object({
		id: z.string(),
		supported_first_factors: z.array(firstFactorSchema).nullish().transform((v) => v ?? []),
	})
	.passthrough();

export const signInResponseSchema = z.object({
	response: signInAttemptSchema,
});

export const attemptFirstFactorResponseSchema = z.object({
	response: z
		.object({
			created_session_id: z.string().nullish(),
		})
		.passthrough(),
});

export const tokenResponseSchema = z.object({
	jwt: z.string().min(1),
});

export type SignInAttempt = z.infer<typeof signInAttemptSchema>;

// Generation service

export const generateResponseSchema = z.object({
	clips: z.array(z.object({ id: z.string() }).passthrough()),
});

export const clipSchema = z
	.object({
		id: z.string(),
		status: z.string(),
		audio_url: z.string().nullish(),
		title: z.string().nullish(),
	})
	.passthrough();

export const feedResponseSchema = z.array(clipSchema);

export type Clip = z.infer<typeof clipSchema>;

const errorCodeSchema = z.object({ code: z.string() }).passthrough();

export const generationErrorSchema = z
	.object({
		code: z.string().optional(),
		detail: z.union([z.string(), errorCodeSchema]).optional(),
	})
	.passthrough();
