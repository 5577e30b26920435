import type { Transport } from '../../transport';

export const AUTH_BASE = 'https://identity.test';
export const API_BASE = 'https://api.test';
export const CLIENT_VERSION = '9.9.9';

export type RecordedCall = {
	kind: 'sign-in' | 'prepare' | 'attempt' | 'renew' | 'generate' | 'feed' | 'audio' | 'unknown';
	account?: string;
	method: string;
	url: URL;
	headers: Headers;
	body: string;
};

export type ClipRecord = { id: string; status: string; audio_url?: string | null };

export type AccountScript = {
	signInStatus?: number;
	factors?: Array<{ strategy: string; phone_number_id?: string }>;
	prepareStatus?: number;
	attemptStatus?: number;
	/** `null` answers without a created session id. */
	sessionId?: string | null;
	/**
	 * Answer per renewal call, in order; renewals past the end answer 200.
	 * `'no-jwt'` answers 200 without a token, `'network'` drops the connection.
	 */
	renewStatuses?: Array<number | 'no-jwt' | 'network'>;
	generate?: { status: number; body: unknown };
};

export function json(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { 'content-type': 'application/json', ...headers },
	});
}

/**
 * In-process stand-in for the identity and generation services. Each account
 * follows its script; everything else answers the happy path.
 */
export class FakeRemote {
	readonly calls: RecordedCall[] = [];
	/** Feed answer per call, in order; the last one repeats. */
	feedScript: ClipRecord[][] = [];
	audio = new Map<string, Uint8Array>();
	private feedIndex = 0;
	private renewCounts = new Map<string, number>();

	constructor(private readonly accounts: Record<string, AccountScript> = {}) {}

	readonly transport: Transport = async (input, init) => {
		const url = new URL(input);
		const method = init?.method ?? 'GET';
		const headers = new Headers(init?.headers);
		const body = typeof init?.body === 'string' ? init.body : init?.body instanceof URLSearchParams ? init.body.toString() : '';
		const call: RecordedCall = { kind: 'unknown', method, url, headers, body };
		this.calls.push(call);
		return this.route(call);
	};

	count(kind: RecordedCall['kind'], account?: string): number {
		return this.calls.filter((c) => c.kind === kind && (account === undefined || c.account === account)).length;
	}

	private script(account: string): AccountScript {
		return this.accounts[account] ?? {};
	}

	private route(call: RecordedCall): Response {
		const { url } = call;
		const path = url.pathname;

		if (url.origin === AUTH_BASE) {
			if (path === '/v1/client/sign_ins') {
				const account = new URLSearchParams(call.body).get('identifier') ?? '';
				call.kind = 'sign-in';
				call.account = account;
				const script = this.script(account);
				if (script.signInStatus && script.signInStatus !== 200) return json({ errors: [] }, script.signInStatus);
				return json(
					{
						response: {
							id: `sia_${account}`,
							supported_first_factors: script.factors ?? [{ strategy: 'phone_code', phone_number_id: `idn_${account}` }],
						},
					},
					200,
					{ Authorization: `client_${account}` },
				);
			}

			const signIn = path.match(/^\/v1\/client\/sign_ins\/sia_(.+)\/(prepare|attempt)_first_factor$/);
			if (signIn) {
				const account = signIn[1];
				call.account = account;
				const script = this.script(account);
				if (signIn[2] === 'prepare') {
					call.kind = 'prepare';
					return json({ response: {} }, script.prepareStatus ?? 200);
				}
				call.kind = 'attempt';
				if (script.attemptStatus && script.attemptStatus !== 200) return json({ errors: [] }, script.attemptStatus);
				const sessionId = script.sessionId === undefined ? `sess_${account}` : script.sessionId;
				return json({ response: { created_session_id: sessionId } });
			}

			const renew = path.match(/^\/v1\/client\/sessions\/sess_(.+)\/tokens$/);
			if (renew) {
				const account = renew[1];
				call.kind = 'renew';
				call.account = account;
				const n = this.renewCounts.get(account) ?? 0;
				this.renewCounts.set(account, n + 1);
				const status = this.script(account).renewStatuses?.[n] ?? 200;
				if (status === 'network') throw new Error('socket hang up: ECONNRESET');
				if (status === 'no-jwt') return json({});
				return status === 200 ? json({ jwt: `jwt_${account}_${n + 1}` }) : json({ errors: [] }, status);
			}
		}

		if (url.origin === API_BASE) {
			const bearer = call.headers.get('authorization')?.match(/^Bearer jwt_(.+)_\d+$/);
			call.account = bearer?.[1];

			if (path === '/api/generate/v2/' && call.method === 'POST') {
				call.kind = 'generate';
				const answer = (call.account && this.script(call.account).generate) || {
					status: 200,
					body: { clips: [{ id: 'clip-1' }, { id: 'clip-2' }] },
				};
				return json(answer.body, answer.status);
			}

			if (path === '/api/feed/') {
				call.kind = 'feed';
				const ids = (url.searchParams.get('ids') ?? '').split(',');
				const script = this.feedScript[Math.min(this.feedIndex, this.feedScript.length - 1)] ?? [];
				this.feedIndex++;
				return json(script.filter((c) => ids.includes(c.id)));
			}
		}

		const bytes = this.audio.get(url.toString());
		if (bytes) {
			call.kind = 'audio';
			return new Response(bytes, { status: 200, headers: { 'content-length': String(bytes.byteLength) } });
		}

		return json({ detail: 'not found' }, 404);
	}
}
