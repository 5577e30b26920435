import { PollTimeout } from './errors';
import { logger } from './logger';
import type { PoolEntry } from './sessionPool';

export type PollOptions = {
	intervalMs?: number;
	maxAttempts?: number;
	sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

/**
 * Waits until every entry reports the whole batch as streaming or complete.
 * Sleeps before each check, renews each entry's credential before asking,
 * and gives up with `PollTimeout` after `maxAttempts` checks.
 */
export async function waitForCompletion(
	assetIds: readonly string[],
	entries: readonly PoolEntry[],
	options: PollOptions = {},
): Promise<number> {
	const { intervalMs = 5_000, maxAttempts = 120, sleep = defaultSleep } = options;
	const ids = [...assetIds];

	for (let attempt = 1; attempt <= maxAttempts; attempt++) {
		await sleep(intervalMs);

		let allReady = true;
		for (const entry of entries) {
			await entry.session.renew();
			const { statuses, ready } = await entry.client.status(ids);
			logger.info('Asset status', { account: entry.account, attempt, statuses: Object.fromEntries(statuses) });
			if (!ready) allReady = false;
		}

		if (allReady) {
			logger.info('All assets ready', { assetIds: ids, attempts: attempt });
			return attempt;
		}
		logger.info('Some assets still not ready, checking again', { attempt });
	}

	throw new PollTimeout(ids, maxAttempts);
}
