import readline from 'node:readline/promises';
import { stdin as input, stdout as output } from 'node:process';
import type { OtpProvider } from './authSession';

export async function ask(question: string): Promise<string> {
	const rl = readline.createInterface({ input, output });
	try {
		return (await rl.question(question)).trim();
	} finally {
		rl.close();
	}
}

/** Asks on the terminal for the code each account received. */
export class PromptOtpProvider implements OtpProvider {
	requestCode(account: string): Promise<string> {
		return ask(`Enter the one-time code you received for ${account}: `);
	}
}
