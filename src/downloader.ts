import { createWriteStream } from 'node:fs';
import fs from 'fs/promises';
import path from 'path';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { DownloadFailed, RelayError } from './errors';
import { logger } from './logger';
import type { GenerationJob, PoolEntry } from './sessionPool';
import { send, type Transport } from './transport';

export type DownloaderOptions = {
	outputDir?: string;
	filePrefix?: string;
	transport?: Transport;
};

export type DownloadedAsset = {
	assetId: string;
	path: string;
	bytes: number;
	alreadyPresent: boolean;
};

export type DownloadReport = {
	downloaded: DownloadedAsset[];
	failed: Array<{ assetId: string; error: RelayError }>;
};

export class Downloader {
	private readonly outputDir: string;
	private readonly filePrefix: string;
	private readonly transport: Transport;

	constructor(options: DownloaderOptions = {}) {
		this.outputDir = options.outputDir ?? '.';
		this.filePrefix = options.filePrefix ?? 'clip';
		this.transport = options.transport ?? fetch;
	}

	fileNameFor(assetId: string): string {
		return `${this.filePrefix}-${assetId.replace(/[^A-Za-z0-9._-]/g, '_')}.mp3`;
	}

	/** Downloads each asset in order; one failing asset does not stop the rest. */
	async downloadAll(job: GenerationJob): Promise<DownloadReport> {
		const report: DownloadReport = { downloaded: [], failed: [] };
		for (const assetId of job.assetIds) {
			try {
				report.downloaded.push(await this.downloadAsset(job.owner, assetId));
			} catch (err) {
				if (!(err instanceof RelayError)) throw err;
				logger.error('Download failed', { assetId, code: err.code, error: err.message });
				report.failed.push({ assetId, error: err });
			}
		}
		return report;
	}

	async downloadAsset(owner: PoolEntry, assetId: string): Promise<DownloadedAsset> {
		const target = path.join(this.outputDir, this.fileNameFor(assetId));
		const existing = await fs.stat(target).catch((err: NodeJS.ErrnoException) => {
			if (err.code === 'ENOENT') return undefined;
			throw new DownloadFailed(assetId, err.message, { cause: err });
		});
		if (existing) {
			logger.info('Asset already downloaded', { assetId, path: target });
			return { assetId, path: target, bytes: existing.size, alreadyPresent: true };
		}

		// The credential may have expired while polling.
		await owner.session.renew();
		const { audioUrl } = await owner.client.fetchMetadata(assetId);

		const res = await send(this.transport, audioUrl);
		if (!res.ok || !res.body) {
			await res.body?.cancel();
			throw new DownloadFailed(assetId, `audio request answered ${res.status}`);
		}

		const partial = `${target}.part`;
		try {
			await pipeline(Readable.fromWeb(res.body), createWriteStream(partial));
		} catch (err) {
			await fs.rm(partial, { force: true });
			throw new DownloadFailed(assetId, err instanceof Error ? err.message : String(err), { cause: err });
		}

		const { size } = await fs.stat(partial);
		// fetch decodes compressed bodies, so content-length only counts identity-encoded bytes.
		const encoding = res.headers.get('content-encoding')?.trim().toLowerCase();
		const expected = Number(res.headers.get('content-length') ?? Number.NaN);
		if ((!encoding || encoding === 'identity') && Number.isFinite(expected) && expected !== size) {
			await fs.rm(partial, { force: true });
			throw new DownloadFailed(assetId, `received ${size} of ${expected} bytes`);
		}

		await fs.rename(partial, target);
		logger.info('Downloaded asset', { assetId, path: target, bytes: size });
		return { assetId, path: target, bytes: size, alreadyPresent: false };
	}
}
