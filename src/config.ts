/* Libraries */
import { join } from 'path';
import { UsbIdsError } from './errors';

/* Interfaces */
export interface RegistryConfig {
	/* Registry file used by the bundled lookups and the CLI */
	databasePath: string;
	updateUrl: string;
	timeoutMs: number;
	retries: number;
	retryDelayMs: number;
}

/* Snapshot shipped with the package; the same relative path from src/ and dist/ */
export const BUNDLED_DATABASE_PATH = join(__dirname, '..', 'data', 'usb.ids');

export const DEFAULT_UPDATE_URL = 'http://www.linux-usb.org/usb.ids';

function readEnvString(env: NodeJS.ProcessEnv, name: string, fallback: string){
	const raw = env[name];
	if(raw === undefined || raw.trim() === '') return fallback;

	return raw.trim();
}

function readEnvInt(env: NodeJS.ProcessEnv, name: string, fallback: number, opts: { min?: number, max?: number } = {}){
	const raw = env[name];
	if(raw === undefined || raw.trim() === '') return fallback;

	const trimmed = raw.trim();
	if(!/^\d+$/.test(trimmed))
		throw new UsbIdsError(`Invalid ${name}: expected a non-negative integer`);

	const parsed = parseInt(trimmed, 10);
	const min = opts.min ?? 0;
	const max = opts.max ?? Number.MAX_SAFE_INTEGER;

	if(parsed < min || parsed > max)
		throw new UsbIdsError(`Invalid ${name}: expected a value between ${min} and ${max}`);

	return parsed;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RegistryConfig {
	return {
		databasePath: readEnvString(env, 'USB_IDS_DATABASE', BUNDLED_DATABASE_PATH),
		updateUrl: readEnvString(env, 'USB_IDS_URL', DEFAULT_UPDATE_URL),
		timeoutMs: readEnvInt(env, 'USB_IDS_TIMEOUT_MS', 30000, { min: 1 }),
		retries: readEnvInt(env, 'USB_IDS_RETRIES', 2, { max: 10 }),
		retryDelayMs: readEnvInt(env, 'USB_IDS_RETRY_DELAY_MS', 1000)
	};
}
