import twilio from 'twilio';
import type { OtpProvider } from './authSession';
import { OtpTimeout } from './errors';
import { logger } from './logger';

export type SmsMessage = {
	sid: string;
	from: string;
	body: string;
};

/** The slice of the Twilio messages API the listener reads. */
export interface SmsInbox {
	list(query: { to: string; dateSentAfter: Date; limit: number }): Promise<SmsMessage[]>;
}

export type TwilioOtpOptions = {
	inbox: SmsInbox;
	matchRegex?: RegExp;
	sinceSeconds?: number;
	timeoutMs?: number;
	pollIntervalMs?: number;
	sleep?: (ms: number) => Promise<void>;
	now?: () => number;
};

export function twilioInbox(accountSid: string, authToken: string): SmsInbox {
	const client = twilio(accountSid, authToken);
	return {
		list: (query) => client.messages.list(query),
	};
}

/** Polls the account's own Twilio number for the code the identity service texted it. */
export async function waitForOtp(account: string, options: TwilioOtpOptions): Promise<string> {
	const {
		inbox,
		matchRegex = /(\d{6})/,
		sinceSeconds = 120,
		timeoutMs = 30_000,
		pollIntervalMs = 1_000,
		sleep = (ms: number) => new Promise<void>((r) => setTimeout(r, ms)),
		now = Date.now,
	} = options;

	const deadline = now() + timeoutMs;
	const seen = new Set<string>();

	while (now() < deadline) {
		const since = new Date(now() - sinceSeconds * 1000);
		const messages = await inbox.list({ to: account, dateSentAfter: since, limit: 10 });
		for (const msg of messages) {
			if (seen.has(msg.sid)) continue;
			seen.add(msg.sid);
			const match = (msg.body || '').match(matchRegex);
			if (match?.[1]) {
				logger.info('One-time code received over SMS', { account, from: msg.from });
				return match[1];
			}
		}
		await sleep(pollIntervalMs);
	}
	throw new OtpTimeout(account, timeoutMs);
}

export class TwilioOtpProvider implements OtpProvider {
	constructor(private readonly options: TwilioOtpOptions) {}

	requestCode(account: string): Promise<string> {
		return waitForOtp(account, this.options);
	}
}
