import {
	ChallengePreparationFailed,
	ChallengeUnavailable,
	InvalidAuthTransition,
	NoActiveSession,
	OtpRejected,
	RelayError,
	RenewalFailed,
	SessionNotEstablished,
	SignInFailed,
} from './errors';
import { logger } from './logger';
import {
	attemptFirstFactorResponseSchema,
	signInResponseSchema,
	tokenResponseSchema,
	type SignInAttempt,
} from './schemas';
import { BROWSER_USER_AGENT, decode, formBody, send, type Transport } from './transport';

export type AuthSessionOptions = {
	authBaseUrl: string;
	clientVersion: string;
	transport?: Transport;
};

/** Outstanding phone-code challenge; resumed with the code the account received. */
export type FirstFactorChallenge = {
	account: string;
	attemptId: string;
	phoneNumberId: string;
};

export type AuthState =
	| { kind: 'unauthenticated' }
	| { kind: 'otpRequested'; challenge: FirstFactorChallenge }
	| { kind: 'authenticated'; sessionId: string }
	| { kind: 'renewing'; sessionId: string }
	| { kind: 'failed'; error: RelayError };

/** Supplies the one-time code delivered to an account's phone. */
export interface OtpProvider {
	requestCode(account: string): Promise<string>;
}

/**
 * Credential lifecycle of one account against the identity service:
 * sign-in, phone-code challenge, session establishment and bearer renewal.
 *
 * Renewal is pulled: callers invoke `renew()` before each privileged call
 * rather than relying on a timer.
 */
export class AuthSession {
	readonly account: string;
	private readonly authBaseUrl: string;
	private readonly clientVersion: string;
	private readonly transport: Transport;

	private _state: AuthState = { kind: 'unauthenticated' };
	private authorizationToken: string | undefined;
	private sessionId: string | undefined;
	private bearer: string | undefined;

	constructor(account: string, options: AuthSessionOptions) {
		this.account = account.trim();
		this.authBaseUrl = options.authBaseUrl.replace(/\/+$/, '');
		this.clientVersion = options.clientVersion;
		this.transport = options.transport ?? fetch;
	}

	get state(): AuthState {
		return this._state;
	}

	get isUsable(): boolean {
		return this._state.kind === 'authenticated';
	}

	/** Runs the whole handshake, asking `otp` for the code once the challenge is sent. */
	async authenticate(otp: OtpProvider): Promise<void> {
		const attempt = await this.signIn();
		const challenge = await this.requestFirstFactor(attempt);
		const code = await otp.requestCode(challenge.account);
		await this.resume(code);
	}

	async signIn(): Promise<SignInAttempt> {
		this.assertState('unauthenticated', 'sign in');
		const url = this.identityUrl('/v1/client/sign_ins');
		const res = await this.guard(() =>
			send(this.transport, url, {
				method: 'POST',
				headers: this.defaultHeaders(),
				body: formBody({ identifier: this.account }),
			}),
		);
		if (!res.ok) {
			throw this.fail(new SignInFailed(this.account, res.status));
		}
		const { response: attempt } = await this.guard(() => decode(res, url, signInResponseSchema));
		this.authorizationToken = res.headers.get('authorization') ?? undefined;
		logger.info('Sign-in attempt created', { account: this.account, attemptId: attempt.id });
		return attempt;
	}

	async requestFirstFactor(attempt: SignInAttempt): Promise<FirstFactorChallenge> {
		this.assertState('unauthenticated', 'request a one-time code');
		const phoneNumberId = attempt.supported_first_factors[0]?.phone_number_id;
		if (!phoneNumberId) {
			throw this.fail(new ChallengeUnavailable(this.account));
		}

		const url = this.identityUrl(`/v1/client/sign_ins/${attempt.id}/prepare_first_factor`);
		const res = await this.guard(() =>
			send(this.transport, url, {
				method: 'POST',
				headers: this.clientHeaders(),
				body: formBody({ phone_number_id: phoneNumberId, strategy: 'phone_code' }),
			}),
		);
		if (!res.ok) {
			throw this.fail(new ChallengePreparationFailed(this.account, res.status));
		}

		const challenge: FirstFactorChallenge = { account: this.account, attemptId: attempt.id, phoneNumberId };
		this._state = { kind: 'otpRequested', challenge };
		logger.info('One-time code sent', { account: this.account });
		return challenge;
	}

	/** Completes the pending challenge with `code`. */
	async resume(code: string): Promise<void> {
		if (this._state.kind !== 'otpRequested') {
			throw new InvalidAuthTransition(this.account, this._state.kind, 'submit a one-time code');
		}
		await this.submitFirstFactor(this._state.challenge.attemptId, code);
	}

	async submitFirstFactor(attemptId: string, code: string): Promise<void> {
		this.assertState('otpRequested', 'submit a one-time code');
		const url = this.identityUrl(`/v1/client/sign_ins/${attemptId}/attempt_first_factor`);
		const res = await this.guard(() =>
			send(this.transport, url, {
				method: 'POST',
				headers: this.clientHeaders(),
				body: formBody({ strategy: 'phone_code', code: code.trim() }),
			}),
		);
		if (!res.ok) {
			throw this.fail(new OtpRejected(this.account, res.status));
		}

		const body = await this.guard(() => decode(res, url, attemptFirstFactorResponseSchema));
		const sessionId = body.response.created_session_id;
		if (!sessionId) {
			throw this.fail(new SessionNotEstablished(this.account));
		}

		this.sessionId = sessionId;
		this._state = { kind: 'authenticated', sessionId };
		logger.info('Session established', { account: this.account });
		// A fresh session holds no bearer credential yet.
		await this.renew();
	}

	/** Replaces the bearer credential. Any failure leaves the session unusable. */
	async renew(): Promise<void> {
		const sessionId = this.sessionId;
		if (!sessionId) {
			throw new NoActiveSession(this.account);
		}
		if (this._state.kind === 'failed') {
			throw new RenewalFailed(this.account);
		}

		this._state = { kind: 'renewing', sessionId };
		const url = this.identityUrl(`/v1/client/sessions/${sessionId}/tokens`);
		let jwt: string;
		try {
			const res = await send(this.transport, url, { method: 'POST', headers: this.clientHeaders() });
			if (!res.ok) {
				throw new RenewalFailed(this.account, res.status);
			}
			({ jwt } = await decode(res, url, tokenResponseSchema));
		} catch (err) {
			if (err instanceof RenewalFailed) throw this.fail(err);
			if (!(err instanceof RelayError)) throw err;
			throw this.fail(new RenewalFailed(this.account, undefined, { cause: err }));
		}

		this.bearer = jwt;
		this._state = { kind: 'authenticated', sessionId };
		logger.debug('Token renewed', { account: this.account });
	}

	/** Headers for generation-service calls. */
	authorizationHeaders(): Record<string, string> {
		if (!this.bearer || this._state.kind !== 'authenticated') {
			throw new NoActiveSession(this.account);
		}
		return { Authorization: `Bearer ${this.bearer}` };
	}

	private identityUrl(path: string): string {
		const url = new URL(`${this.authBaseUrl}${path}`);
		url.searchParams.set('_clerk_js_version', this.clientVersion);
		return url.toString();
	}

	private defaultHeaders(): Record<string, string> {
		return {
			'content-type': 'application/x-www-form-urlencoded',
			'User-Agent': BROWSER_USER_AGENT,
			Origin: this.authBaseUrl,
			Referer: this.authBaseUrl,
		};
	}

	private clientHeaders(): Record<string, string> {
		const headers = this.defaultHeaders();
		if (this.authorizationToken) headers.Authorization = this.authorizationToken;
		return headers;
	}

	private assertState(expected: AuthState['kind'], action: string): void {
		if (this._state.kind !== expected) {
			throw new InvalidAuthTransition(this.account, this._state.kind, action);
		}
	}

	private fail(error: RelayError): RelayError {
		this.bearer = undefined;
		this._state = { kind: 'failed', error };
		logger.error(error.message, { account: this.account, code: error.code });
		return error;
	}

	/** Any relay error raised inside `step` moves the session to `failed`. */
	private async guard<T>(step: () => Promise<T>): Promise<T> {
		try {
			return await step();
		} catch (err) {
			if (err instanceof RelayError && this._state.kind !== 'failed') {
				throw this.fail(err);
			}
			throw err;
		}
	}
}
