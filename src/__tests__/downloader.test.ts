import fs from 'fs/promises';
import os from 'node:os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, test } from 'vitest';
import { Downloader } from '../downloader';
import { DownloadFailed, NoAudioUrl } from '../errors';
import { SessionPool, type PoolEntry } from '../sessionPool';
import { API_BASE, AUTH_BASE, CLIENT_VERSION, FakeRemote } from './helpers/fake-remote';

const PHONE = '+15550000030';

function bytes(n: number): Uint8Array {
	const out = new Uint8Array(n);
	for (let i = 0; i < n; i++) out[i] = i % 251;
	return out;
}

describe('Downloader', () => {
	let dir: string;
	let remote: FakeRemote;
	let owner: PoolEntry;
	let downloader: Downloader;

	beforeEach(async () => {
		dir = await fs.mkdtemp(path.join(os.tmpdir(), 'songrelay-'));
		remote = new FakeRemote();
		const pool = await SessionPool.create([PHONE], { requestCode: async () => '123456' }, {
			authBaseUrl: AUTH_BASE,
			apiBaseUrl: API_BASE,
			clientVersion: CLIENT_VERSION,
			modelVersion: 'chirp-v3-5',
			transport: remote.transport,
		});
		owner = pool.usable()[0];
		downloader = new Downloader({ outputDir: dir, filePrefix: 'clip', transport: remote.transport });
	});

	afterEach(async () => {
		await fs.rm(dir, { recursive: true, force: true });
	});

	test('streams the audio to a file named after the asset id', async () => {
		const audio = bytes(200_000);
		remote.audio.set('https://cdn.test/s1.mp3', audio);
		remote.feedScript = [[{ id: 's1', status: 'complete', audio_url: 'https://cdn.test/s1.mp3' }]];

		const result = await downloader.downloadAsset(owner, 's1');

		expect(result).toEqual({ assetId: 's1', path: path.join(dir, 'clip-s1.mp3'), bytes: 200_000, alreadyPresent: false });
		const written = await fs.readFile(result.path);
		expect(written.byteLength).toBe(audio.byteLength);
		expect(Buffer.compare(written, Buffer.from(audio))).toBe(0);
		await expect(fs.stat(`${result.path}.part`)).rejects.toThrow();
	});

	test('renews exactly once before fetching metadata', async () => {
		remote.audio.set('https://cdn.test/s1.mp3', bytes(10));
		remote.feedScript = [[{ id: 's1', status: 'complete', audio_url: 'https://cdn.test/s1.mp3' }]];
		const before = remote.calls.length;

		await downloader.downloadAsset(owner, 's1');

		expect(remote.calls.slice(before).map((c) => c.kind)).toEqual(['renew', 'feed', 'audio']);
	});

	test('leaves an existing file untouched', async () => {
		const target = path.join(dir, 'clip-s1.mp3');
		await fs.writeFile(target, 'abc');
		const before = remote.calls.length;

		const result = await downloader.downloadAsset(owner, 's1');

		expect(result).toEqual({ assetId: 's1', path: target, bytes: 3, alreadyPresent: true });
		expect(remote.calls.length).toBe(before);
	});

	test('a record without an audio URL fails with NoAudioUrl', async () => {
		remote.feedScript = [[{ id: 's1', status: 'complete' }]];

		await expect(downloader.downloadAsset(owner, 's1')).rejects.toBeInstanceOf(NoAudioUrl);
	});

	test('an audio request error fails with DownloadFailed and writes nothing', async () => {
		remote.feedScript = [[{ id: 's1', status: 'complete', audio_url: 'https://cdn.test/missing.mp3' }]];

		await expect(downloader.downloadAsset(owner, 's1')).rejects.toBeInstanceOf(DownloadFailed);
		expect(await fs.readdir(dir)).toEqual([]);
	});

	test('a compressed answer is not checked against its encoded content-length', async () => {
		const audio = bytes(5_000);
		remote.feedScript = [[{ id: 's1', status: 'complete', audio_url: 'https://cdn.test/s1.mp3' }]];
		const gzipped = new Downloader({
			outputDir: dir,
			transport: async (url, init) =>
				url === 'https://cdn.test/s1.mp3'
					? new Response(audio, { status: 200, headers: { 'content-encoding': 'gzip', 'content-length': '40' } })
					: remote.transport(url, init),
		});

		const result = await gzipped.downloadAsset(owner, 's1');

		expect(result.bytes).toBe(5_000);
		expect((await fs.readFile(result.path)).byteLength).toBe(5_000);
	});

	test('a short identity-encoded answer fails with DownloadFailed', async () => {
		remote.feedScript = [[{ id: 's1', status: 'complete', audio_url: 'https://cdn.test/s1.mp3' }]];
		const truncated = new Downloader({
			outputDir: dir,
			transport: async (url, init) =>
				url === 'https://cdn.test/s1.mp3'
					? new Response(bytes(30), { status: 200, headers: { 'content-length': '40' } })
					: remote.transport(url, init),
		});

		await expect(truncated.downloadAsset(owner, 's1')).rejects.toThrow('Download of s1 failed: received 30 of 40 bytes');
		expect(await fs.readdir(dir)).toEqual([]);
	});

	test('the body of a failed audio request is cancelled', async () => {
		let cancelled = false;
		remote.feedScript = [[{ id: 's1', status: 'complete', audio_url: 'https://cdn.test/s1.mp3' }]];
		const failing = new Downloader({
			outputDir: dir,
			transport: async (url, init) =>
				url === 'https://cdn.test/s1.mp3'
					? new Response(
							new ReadableStream<Uint8Array>({
								cancel() {
									cancelled = true;
								},
							}),
							{ status: 503 },
						)
					: remote.transport(url, init),
		});

		await expect(failing.downloadAsset(owner, 's1')).rejects.toBeInstanceOf(DownloadFailed);
		expect(cancelled).toBe(true);
	});

	test('downloadAll keeps going after one asset fails', async () => {
		remote.audio.set('https://cdn.test/s2.mp3', bytes(64));
		remote.feedScript = [
			[{ id: 's1', status: 'complete' }],
			[{ id: 's2', status: 'complete', audio_url: 'https://cdn.test/s2.mp3' }],
		];

		const report = await downloader.downloadAll({ assetIds: ['s1', 's2'], owner, prompt: 'x', mode: 'description' });

		expect(report.failed.map((f) => f.assetId)).toEqual(['s1']);
		expect(report.failed[0].error).toBeInstanceOf(NoAudioUrl);
		expect(report.downloaded.map((d) => d.bytes)).toEqual([64]);
	});
});
