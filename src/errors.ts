export type RelayErrorCode =
	| 'TRANSPORT_FAILURE'
	| 'SIGN_IN_FAILED'
	| 'CHALLENGE_UNAVAILABLE'
	| 'CHALLENGE_PREPARATION_FAILED'
	| 'OTP_REJECTED'
	| 'OTP_TIMEOUT'
	| 'SESSION_NOT_ESTABLISHED'
	| 'NO_ACTIVE_SESSION'
	| 'INVALID_AUTH_TRANSITION'
	| 'RENEWAL_FAILED'
	| 'QUOTA_EXHAUSTED'
	| 'GENERATION_FAILED'
	| 'ASSET_NOT_READY'
	| 'NO_AUDIO_URL'
	| 'DOWNLOAD_FAILED'
	| 'ALL_SESSIONS_EXHAUSTED'
	| 'POLL_TIMEOUT';

export class RelayError extends Error {
	readonly code: RelayErrorCode;

	constructor(code: RelayErrorCode, message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
		this.code = code;
	}
}

/** Network failure, or an HTTP answer the caller has no handling for. */
export class TransportFailure extends RelayError {
	readonly status?: number;

	constructor(message: string, status?: number, options?: { cause?: unknown }) {
		super('TRANSPORT_FAILURE', message, options);
		this.status = status;
	}
}

export class SignInFailed extends RelayError {
	constructor(readonly account: string, readonly status: number) {
		super('SIGN_IN_FAILED', `Sign-in for ${account} failed with status ${status}`);
	}
}

export class ChallengeUnavailable extends RelayError {
	constructor(readonly account: string) {
		super('CHALLENGE_UNAVAILABLE', `No supported first factor offered for ${account}`);
	}
}

export class ChallengePreparationFailed extends RelayError {
	constructor(readonly account: string, readonly status: number) {
		super('CHALLENGE_PREPARATION_FAILED', `Requesting a one-time code for ${account} failed with status ${status}`);
	}
}

export class OtpRejected extends RelayError {
	constructor(readonly account: string, readonly status: number) {
		super('OTP_REJECTED', `One-time code for ${account} was rejected with status ${status}`);
	}
}

export class OtpTimeout extends RelayError {
	constructor(readonly account: string, timeoutMs: number) {
		super('OTP_TIMEOUT', `No one-time code for ${account} arrived within ${timeoutMs}ms`);
	}
}

export class SessionNotEstablished extends RelayError {
	constructor(readonly account: string) {
		super('SESSION_NOT_ESTABLISHED', `Code accepted for ${account} but no session id was returned`);
	}
}

export class NoActiveSession extends RelayError {
	constructor(readonly account: string) {
		super('NO_ACTIVE_SESSION', `No active session for ${account}`);
	}
}

export class InvalidAuthTransition extends RelayError {
	constructor(readonly account: string, from: string, action: string) {
		super('INVALID_AUTH_TRANSITION', `Cannot ${action} for ${account} while ${from}`);
	}
}

export class RenewalFailed extends RelayError {
	constructor(readonly account: string, readonly status?: number, options?: { cause?: unknown }) {
		super('RENEWAL_FAILED', renewalMessage(account, status, options?.cause), options);
	}
}

function renewalMessage(account: string, status: number | undefined, cause: unknown): string {
	if (status !== undefined) return `Token renewal for ${account} failed with status ${status}`;
	if (cause instanceof Error) return `Token renewal for ${account} failed: ${cause.message}`;
	return `Session for ${account} is no longer usable`;
}

export class QuotaExhausted extends RelayError {
	constructor(readonly account: string, readonly detail?: string) {
		super('QUOTA_EXHAUSTED', `Account ${account} has no generation allowance left`);
	}
}

export class GenerationFailed extends RelayError {
	constructor(readonly account: string, readonly status: number, readonly detail?: string) {
		super('GENERATION_FAILED', `Generation for ${account} failed with status ${status}${detail ? `: ${detail}` : ''}`);
	}
}

export class AssetNotReady extends RelayError {
	constructor(readonly assetId: string, readonly status: string) {
		super('ASSET_NOT_READY', `Asset ${assetId} is not ready (${status})`);
	}
}

export class NoAudioUrl extends RelayError {
	constructor(readonly assetId: string) {
		super('NO_AUDIO_URL', `Asset ${assetId} has no audio URL`);
	}
}

export class DownloadFailed extends RelayError {
	constructor(readonly assetId: string, message: string, options?: { cause?: unknown }) {
		super('DOWNLOAD_FAILED', `Download of ${assetId} failed: ${message}`, options);
	}
}

export type FallbackAttempt = {
	account: string;
	outcome: 'quota-exhausted' | 'no-clips' | 'failed' | 'renewal-failed';
	error: RelayError;
};

export class AllSessionsExhausted extends RelayError {
	constructor(readonly attempts: FallbackAttempt[]) {
		super(
			'ALL_SESSIONS_EXHAUSTED',
			attempts.length === 0
				? 'No authenticated account is available'
				: `All accounts failed: ${attempts.map((a) => `${a.account} (${a.outcome})`).join(', ')}`,
		);
	}
}

export class PollTimeout extends RelayError {
	constructor(readonly assetIds: string[], readonly attempts: number) {
		super('POLL_TIMEOUT', `Assets ${assetIds.join(',')} not ready after ${attempts} checks`);
	}
}
