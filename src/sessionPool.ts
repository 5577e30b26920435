import { AuthSession, type OtpProvider } from './authSession';
import { AllSessionsExhausted, RelayError, type FallbackAttempt } from './errors';
import { GenerationClient, type PromptMode } from './generationClient';
import { logger } from './logger';
import type { Transport } from './transport';

export type FallbackPolicy = 'stop-on-error' | 'skip-on-error';

export type PoolEntry = {
	account: string;
	session: AuthSession;
	client: GenerationClient;
};

export type GenerationJob = {
	assetIds: readonly string[];
	owner: PoolEntry;
	prompt: string;
	mode: PromptMode;
};

export type SessionPoolOptions = {
	authBaseUrl: string;
	apiBaseUrl: string;
	clientVersion: string;
	modelVersion: string;
	makeInstrumental?: boolean;
	fallbackPolicy?: FallbackPolicy;
	transport?: Transport;
};

/**
 * One authenticated session per account, tried in insertion order until a
 * generation succeeds. Accounts that fail to authenticate or renew are
 * excluded for the rest of the run.
 */
export class SessionPool {
	private readonly entries: PoolEntry[] = [];
	private readonly excluded = new Map<string, string>();
	readonly fallbackPolicy: FallbackPolicy;

	constructor(fallbackPolicy: FallbackPolicy = 'stop-on-error') {
		this.fallbackPolicy = fallbackPolicy;
	}

	/** Authenticates every distinct account in turn; failures are logged and skipped. */
	static async create(accounts: string[], otp: OtpProvider, options: SessionPoolOptions): Promise<SessionPool> {
		const pool = new SessionPool(options.fallbackPolicy);
		const distinct = [...new Set(accounts.map((a) => a.trim()).filter(Boolean))];

		for (const account of distinct) {
			const session = new AuthSession(account, {
				authBaseUrl: options.authBaseUrl,
				clientVersion: options.clientVersion,
				transport: options.transport,
			});
			try {
				await session.authenticate(otp);
			} catch (err) {
				if (!(err instanceof RelayError)) throw err;
				pool.excluded.set(account, err.message);
				logger.error('Account excluded: authentication failed', { account, code: err.code, error: err.message });
				continue;
			}
			pool.add(
				session,
				new GenerationClient(session, {
					apiBaseUrl: options.apiBaseUrl,
					modelVersion: options.modelVersion,
					makeInstrumental: options.makeInstrumental,
					transport: options.transport,
				}),
			);
		}

		logger.info('Session pool ready', { usable: pool.usable().map((e) => e.account), excluded: [...pool.excluded.keys()] });
		return pool;
	}

	add(session: AuthSession, client: GenerationClient): PoolEntry {
		const entry: PoolEntry = { account: session.account, session, client };
		this.entries.push(entry);
		return entry;
	}

	exclude(entry: PoolEntry, reason: string): void {
		this.excluded.set(entry.account, reason);
		logger.warn('Account excluded', { account: entry.account, reason });
	}

	usable(): PoolEntry[] {
		return this.entries.filter((e) => !this.excluded.has(e.account) && e.session.isUsable);
	}

	exclusionReason(account: string): string | undefined {
		return this.excluded.get(account);
	}

	async generateWithFallback(prompt: string, mode: PromptMode): Promise<GenerationJob> {
		const attempts: FallbackAttempt[] = [];

		for (const entry of this.usable()) {
			const { account } = entry;
			logger.info('Attempting generation', { account });

			try {
				await entry.session.renew();
			} catch (err) {
				if (!(err instanceof RelayError)) throw err;
				this.exclude(entry, err.message);
				attempts.push({ account, outcome: 'renewal-failed', error: err });
				continue;
			}

			let failure: RelayError;
			try {
				const outcome = await entry.client.generate(prompt, mode);
				if (outcome.kind === 'ok') {
					logger.info('Generation succeeded', { account, assetIds: outcome.assetIds });
					return { assetIds: Object.freeze([...outcome.assetIds]), owner: entry, prompt, mode };
				}
				if (outcome.kind === 'quota-exhausted') {
					attempts.push({ account, outcome: 'quota-exhausted', error: outcome.error });
					logger.warn('Insufficient credits, trying next account', { account });
					continue;
				}
				if (outcome.kind === 'no-clips') {
					attempts.push({ account, outcome: 'no-clips', error: outcome.error });
					logger.warn('No clips returned, trying next account', { account });
					continue;
				}
				failure = outcome.error;
			} catch (err) {
				if (!(err instanceof RelayError)) throw err;
				failure = err;
			}

			attempts.push({ account, outcome: 'failed', error: failure });
			logger.error('Generation failed', { account, code: failure.code, error: failure.message });
			if (this.fallbackPolicy === 'stop-on-error') break;
		}

		throw new AllSessionsExhausted(attempts);
	}
}
