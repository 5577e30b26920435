import type { AuthSession } from './authSession';
import { AssetNotReady, GenerationFailed, NoAudioUrl, QuotaExhausted, TransportFailure } from './errors';
import { logger } from './logger';
import { feedResponseSchema, generateResponseSchema, generationErrorSchema, type Clip } from './schemas';
import { decode, readJson, send, type Transport } from './transport';

export type PromptMode = 'description' | 'lyrics';

export type AssetStatus = 'pending' | 'streaming' | 'complete' | 'failed-unknown';

export type GenerateOutcome =
	| { kind: 'ok'; assetIds: string[] }
	| { kind: 'quota-exhausted'; error: QuotaExhausted }
	| { kind: 'no-clips'; error: GenerationFailed }
	| { kind: 'failed'; error: GenerationFailed };

export type BatchStatus = {
	statuses: Map<string, AssetStatus>;
	ready: boolean;
};

export type AssetMetadata = {
	id: string;
	status: AssetStatus;
	audioUrl: string;
	title?: string;
};

export type GenerationClientOptions = {
	apiBaseUrl: string;
	modelVersion: string;
	makeInstrumental?: boolean;
	transport?: Transport;
};

const QUOTA_ERROR_CODE = 'insufficient_credits';

export function toAssetStatus(remote: string | undefined): AssetStatus {
	switch (remote) {
		case 'streaming':
			return 'streaming';
		case 'complete':
			return 'complete';
		case undefined:
		case 'submitted':
		case 'queued':
		case 'pending':
			return 'pending';
		default:
			return 'failed-unknown';
	}
}

export function isReadyStatus(status: AssetStatus): boolean {
	return status === 'streaming' || status === 'complete';
}

/**
 * Generation-service calls made on behalf of one authenticated account.
 * Does not renew credentials itself; callers renew before each call.
 */
export class GenerationClient {
	private readonly apiBaseUrl: string;
	private readonly transport: Transport;

	constructor(
		readonly session: AuthSession,
		private readonly options: GenerationClientOptions,
	) {
		this.apiBaseUrl = options.apiBaseUrl.replace(/\/+$/, '');
		this.transport = options.transport ?? fetch;
	}

	async generate(prompt: string, mode: PromptMode): Promise<GenerateOutcome> {
		const account = this.session.account;
		const url = `${this.apiBaseUrl}/api/generate/v2/`;
		const payload = {
			make_instrumental: this.options.makeInstrumental ?? false,
			mv: this.options.modelVersion,
			prompt: mode === 'lyrics' ? prompt : '',
			gpt_description_prompt: mode === 'description' ? prompt : '',
		};

		const res = await send(this.transport, url, {
			method: 'POST',
			headers: { 'content-type': 'application/json', ...this.session.authorizationHeaders() },
			body: JSON.stringify(payload),
		});

		if (res.ok) {
			const { clips } = await decode(res, url, generateResponseSchema);
			const assetIds = clips.map((c) => c.id);
			if (assetIds.length === 0) {
				return { kind: 'no-clips', error: new GenerationFailed(account, res.status, 'no clips returned') };
			}
			logger.info('Generation accepted', { account, assetIds });
			return { kind: 'ok', assetIds };
		}

		const { code, detail } = await readErrorBody(res);
		if (res.status === 402 || code === QUOTA_ERROR_CODE) {
			return { kind: 'quota-exhausted', error: new QuotaExhausted(account, detail) };
		}
		return { kind: 'failed', error: new GenerationFailed(account, res.status, detail) };
	}

	/** One call for the whole batch; ids absent from the answer count as pending. */
	async status(assetIds: string[]): Promise<BatchStatus> {
		const clips = await this.feed(assetIds);
		const byId = new Map(clips.map((c) => [c.id, c]));
		const statuses = new Map<string, AssetStatus>();
		for (const id of assetIds) {
			statuses.set(id, toAssetStatus(byId.get(id)?.status));
		}
		const ready = assetIds.length > 0 && [...statuses.values()].every(isReadyStatus);
		return { statuses, ready };
	}

	async fetchMetadata(assetId: string): Promise<AssetMetadata> {
		const [clip] = await this.feed([assetId]);
		const status = toAssetStatus(clip?.id === assetId ? clip.status : undefined);
		if (!clip || !isReadyStatus(status)) {
			throw new AssetNotReady(assetId, status);
		}
		if (!clip.audio_url) {
			throw new NoAudioUrl(assetId);
		}
		return { id: assetId, status, audioUrl: clip.audio_url, title: clip.title ?? undefined };
	}

	private async feed(assetIds: string[]): Promise<Clip[]> {
		const url = `${this.apiBaseUrl}/api/feed/?ids=${assetIds.map(encodeURIComponent).join(',')}`;
		const res = await send(this.transport, url, { headers: this.session.authorizationHeaders() });
		if (!res.ok) {
			throw new TransportFailure(`Feed lookup for ${assetIds.join(',')} failed with status ${res.status}`, res.status);
		}
		return decode(res, url, feedResponseSchema);
	}
}

async function readErrorBody(res: Response): Promise<{ code?: string; detail?: string }> {
	const body = await readJson(res, res.url).catch(() => undefined);
	const parsed = generationErrorSchema.safeParse(body);
	if (!parsed.success) return {};
	const { code, detail } = parsed.data;
	if (typeof detail === 'object') {
		return { code: detail.code, detail: detail.code };
	}
	return { code, detail };
}
