import { describe, it, expect } from 'vitest';
import { BUNDLED_DATABASE_PATH, DEFAULT_UPDATE_URL, loadConfig } from '../src/config';
import { UsbIdsError } from '../src/errors';

describe('loadConfig', () => {
	it('falls back to defaults', () => {
		expect(loadConfig({})).toEqual({
			databasePath: BUNDLED_DATABASE_PATH,
			updateUrl: DEFAULT_UPDATE_URL,
			timeoutMs: 30000,
			retries: 2,
			retryDelayMs: 1000
		});
	});

	it('reads the environment', () => {
		const config = loadConfig({
			USB_IDS_DATABASE: ' /tmp/usb.ids ',
			USB_IDS_URL: 'http://registry.test/usb.ids',
			USB_IDS_TIMEOUT_MS: '5000',
			USB_IDS_RETRIES: '0',
			USB_IDS_RETRY_DELAY_MS: '250'
		});

		expect(config).toEqual({
			databasePath: '/tmp/usb.ids',
			updateUrl: 'http://registry.test/usb.ids',
			timeoutMs: 5000,
			retries: 0,
			retryDelayMs: 250
		});
	});

	it('treats blank values as unset', () => {
		expect(loadConfig({ USB_IDS_TIMEOUT_MS: '  ' }).timeoutMs).toBe(30000);
	});

	it('rejects values that are not integers', () => {
		expect(() => loadConfig({ USB_IDS_TIMEOUT_MS: 'soon' })).toThrowError(UsbIdsError);
		expect(() => loadConfig({ USB_IDS_TIMEOUT_MS: 'soon' })).toThrowError('Invalid USB_IDS_TIMEOUT_MS: expected a non-negative integer');
	});

	it('rejects values out of range', () => {
		expect(() => loadConfig({ USB_IDS_TIMEOUT_MS: '0' })).toThrowError(/USB_IDS_TIMEOUT_MS/);
		expect(() => loadConfig({ USB_IDS_RETRIES: '11' })).toThrowError('Invalid USB_IDS_RETRIES: expected a value between 0 and 10');
	});
});
