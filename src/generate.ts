import type { OtpProvider } from './authSession';
import { Downloader } from './downloader';
import { loadConfig, parsePhoneList, type Config } from './env';
import { logger } from './logger';
import { ask, PromptOtpProvider } from './otpPrompt';
import { TwilioOtpProvider, twilioInbox } from './otpTwilio';
import { waitForCompletion } from './poller';
import { SessionPool } from './sessionPool';

function selectOtpProvider(cfg: Config): OtpProvider {
	if (cfg.TWILIO_ACCOUNT_SID && cfg.TWILIO_AUTH_TOKEN) {
		logger.info('Reading one-time codes from the Twilio inbox of each account');
		return new TwilioOtpProvider({
			inbox: twilioInbox(cfg.TWILIO_ACCOUNT_SID, cfg.TWILIO_AUTH_TOKEN),
			timeoutMs: cfg.OTP_TIMEOUT_MS,
		});
	}
	return new PromptOtpProvider();
}

async function main() {
	const cfg = loadConfig();

	const accounts = cfg.PHONE_NUMBERS.length
		? cfg.PHONE_NUMBERS
		: parsePhoneList(await ask('Phone numbers (comma-separated, including country code): '));
	if (accounts.length === 0) {
		throw new Error('No phone numbers given');
	}

	const pool = await SessionPool.create(accounts, selectOtpProvider(cfg), {
		authBaseUrl: cfg.AUTH_BASE_URL,
		apiBaseUrl: cfg.API_BASE_URL,
		clientVersion: cfg.CLIENT_VERSION,
		modelVersion: cfg.MODEL_VERSION,
		makeInstrumental: cfg.MAKE_INSTRUMENTAL,
		fallbackPolicy: cfg.FALLBACK_POLICY,
	});

	const prompt = cfg.PROMPT ?? (await ask('Creative prompt for the song: '));
	if (!prompt) {
		throw new Error('No prompt given');
	}

	const job = await pool.generateWithFallback(prompt, cfg.PROMPT_MODE);

	await waitForCompletion(job.assetIds, [job.owner], {
		intervalMs: cfg.POLL_INTERVAL_MS,
		maxAttempts: cfg.POLL_MAX_ATTEMPTS,
	});

	const downloader = new Downloader({ outputDir: cfg.OUTPUT_DIR, filePrefix: cfg.FILE_PREFIX });
	const report = await downloader.downloadAll(job);
	logger.info('Done', {
		downloaded: report.downloaded.map((d) => d.path),
		failed: report.failed.map((f) => f.assetId),
	});
	await logger.flush();
	if (report.failed.length > 0) process.exitCode = 1;
}

main().catch(async (err) => {
	console.error(err);
	await logger.flush();
	process.exit(1);
});
