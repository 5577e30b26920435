import type { z } from 'zod';
import { TransportFailure } from './errors';

/** Anything shaped like the global `fetch`; tests hand in a fake. */
export type Transport = (url: string, init?: RequestInit) => Promise<Response>;

export const BROWSER_USER_AGENT =
	'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/129.0.0.0 Safari/537.36';

/**
 * Sends one request. Network errors become `TransportFailure`; HTTP status
 * handling is left to the caller. Nothing is retried.
 */
export async function send(transport: Transport, url: string, init?: RequestInit): Promise<Response> {
	try {
		return await transport(url, init);
	} catch (err) {
		const reason = err instanceof Error ? err.message : String(err);
		throw new TransportFailure(`${init?.method ?? 'GET'} ${url} failed: ${reason}`, undefined, { cause: err });
	}
}

/** Reads a JSON body, mapping an unreadable one to `TransportFailure`. */
export async function readJson(res: Response, url: string): Promise<unknown> {
	try {
		return await res.json();
	} catch (err) {
		throw new TransportFailure(`Invalid JSON from ${url}`, res.status, { cause: err });
	}
}

/** Reads and validates a JSON body against a wire schema. */
export async function decode<T extends z.ZodTypeAny>(res: Response, url: string, schema: T): Promise<z.output<T>> {
	const parsed = schema.safeParse(await readJson(res, url));
	if (!parsed.success) {
		throw new TransportFailure(`Unexpected response from ${url}: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`, res.status);
	}
	return parsed.data;
}

export function formBody(fields: Record<string, string>): URLSearchParams {
	return new URLSearchParams(fields);
}
