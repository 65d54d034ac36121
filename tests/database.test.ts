import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import UsbIdDatabase from '../src/UsbIdDatabase';
import { UsbIdsError, UsbIdsParseError } from '../src/errors';
import { REGISTRY } from './fixtures';

describe('UsbIdDatabase', () => {
	const database = UsbIdDatabase.fromString(REGISTRY);

	describe('devices', () => {
		it('finds a device by vendor and product id', () => {
			const device = database.device(0x1234, 0x0002);

			expect(device?.name).toBe('Gadget');
			expect(device?.vendor.name).toBe('Test Vendor');
			expect(device?.vendorId).toBe(0x1234);
		});

		it('returns the same device for the pair it reports', () => {
			const device = database.device(0xabcd, 0xffff);
			const [vid, pid] = device?.asVidPid() ?? [0, 0];

			expect(database.device(vid, pid)).toBe(device);
		});

		it('accepts hex strings', () => {
			expect(database.device('1234', '0002')?.name).toBe('Gadget');
			expect(database.device('0x1234', '0X0002')?.name).toBe('Gadget');
			expect(database.device('ABCD', 'FFFF')?.name).toBe('Last Device');
		});

		it('returns null for pairs the registry does not list', () => {
			expect(database.device(0x1234, 0x0003)).toBeNull();
			expect(database.device(0x9999, 0x0001)).toBeNull();
		});

		it('returns null for ids that cannot exist', () => {
			expect(database.device(-1, 1)).toBeNull();
			expect(database.device(0x10000, 1)).toBeNull();
			expect(database.device(0x1234, 1.5)).toBeNull();
			expect(database.device('zzzz', '0001')).toBeNull();
			expect(database.device('12345', '0001')).toBeNull();
			expect(database.vendor('')).toBeNull();
		});

		it('lists the devices of a vendor that point back to it', () => {
			const vendor = database.vendor(0x1234);

			for(const device of vendor?.devices ?? []){
				expect(device.vendor).toBe(vendor);
				expect(device.name).not.toBe('');
			}
		});

		it('iterates vendors in file order', () => {
			expect([...database.vendors()].map(v => v.hexId)).toEqual(['1234', 'abcd']);
		});
	});

	describe('classes', () => {
		it('finds classes, subclasses and protocols', () => {
			expect(database.deviceClass(0x03)?.name).toBe('Human Interface Device');
			expect(database.subClass(0x03, 0x01)?.name).toBe('Boot Interface Subclass');
			expect(database.protocol(0x03, 0x01, 0x01)?.name).toBe('Keyboard');
			expect(database.protocol('ff', 'ff', 'ff')?.name).toBe('Vendor Specific Protocol');
		});

		it('links subclasses back to their class', () => {
			const subClass = database.subClass(0x03, 0x01);

			expect(subClass?.usbClass).toBe(database.deviceClass(0x03));
			expect(subClass?.asCidScid()).toEqual([0x03, 0x01]);
		});

		it('returns null for missing entries', () => {
			expect(database.deviceClass(0x07)).toBeNull();
			expect(database.subClass(0x03, 0x02)).toBeNull();
			expect(database.protocol(0x03, 0x01, 0x03)).toBeNull();
			expect(database.deviceClass(0x100)).toBeNull();
		});

		it('iterates classes in file order', () => {
			expect([...database.classes()].map(c => c.id)).toEqual([0x03, 0xff]);
		});
	});

	describe('other tables', () => {
		it('looks up every table by id', () => {
			expect(database.audioTerminal('0201')?.name).toBe('Microphone');
			expect(database.hidDescriptor(0x21)?.name).toBe('HID');
			expect(database.hidReportItem(0x04)?.name).toBe('Usage Page');
			expect(database.bias(1)?.name).toBe('Right Hand');
			expect(database.phy(2)?.name).toBe('Eye');
			expect(database.usage(0x01, 0x002)?.name).toBe('Mouse');
			expect(database.dialect(0x0009, 0x02)?.name).toBe('UK');
			expect(database.countryCode(0x21)?.name).toBe('US');
			expect(database.videoTerminal(0x0201)?.name).toBe('Camera Sensor');
		});

		it('limits ids to the width of their table', () => {
			expect(database.bias(0x10)).toBeNull();
			expect(database.bias('01')).toBeNull();
		});

		it('iterates the smaller tables', () => {
			expect([...database.usagePages()].map(p => p.name)).toEqual(['Generic Desktop Controls']);
			expect([...database.languages()].map(l => l.name)).toEqual(['English']);
			expect([...database.countryCodes()].map(c => c.toString())).toEqual(['21  US']);
		});
	});

	describe('search', () => {
		it('matches device names case-insensitively', () => {
			const result = database.search('WIDGET');

			expect(result.vendors).toEqual([]);
			expect(result.devices.map(d => d.name)).toEqual(['Widget', 'Widget (duplicate)']);
		});

		it('matches vendor names', () => {
			expect(database.search('vendor').vendors.map(v => v.name)).toEqual(['Test Vendor', 'Other Vendor']);
		});

		it('returns nothing for a blank term', () => {
			expect(database.search('   ')).toEqual({ vendors: [], devices: [] });
		});
	});

	describe('metadata', () => {
		it('exposes the registry version and date', () => {
			expect(database.version).toBe('2023.01.01');
			expect(database.date).toBe('2023-01-01 00:00:00');
			expect(database.path).toBeNull();
		});

		it('counts every table', () => {
			expect(database.stats()).toEqual({
				vendors: 2,
				devices: 4,
				classes: 2,
				audioTerminals: 1,
				hidDescriptors: 1,
				hidReportItems: 1,
				biases: 1,
				phys: 1,
				usagePages: 1,
				languages: 1,
				countryCodes: 1,
				videoTerminals: 1
			});
		});
	});

	describe('loading and reloading', () => {
		let dir: string;
		let file: string;

		beforeEach(() => {
			dir = mkdtempSync(join(tmpdir(), 'usb-ids-db-'));
			file = join(dir, 'usb.ids');
			writeFileSync(file, '# Version: 1\n1234  Old Vendor\n\t0001  Old Device\n');
		});

		afterEach(() => {
			rmSync(dir, { recursive: true, force: true });
		});

		it('loads a file synchronously and asynchronously', async () => {
			const sync = UsbIdDatabase.loadSync(file);
			const loaded = await UsbIdDatabase.load(file);

			expect(sync.path).toBe(file);
			expect(sync.device(0x1234, 0x0001)?.name).toBe('Old Device');
			expect(loaded.device(0x1234, 0x0001)?.name).toBe('Old Device');
		});

		it('picks up a changed file on reload', async () => {
			const db = UsbIdDatabase.loadSync(file);
			const reloaded = vi.fn();
			const namespaced = vi.fn();

			db.on('reloaded', reloaded);
			db.on('db::*', namespaced);

			writeFileSync(file, REGISTRY);
			const metadata = await db.reload();

			expect(metadata).toEqual({ version: '2023.01.01', date: '2023-01-01 00:00:00' });
			expect(db.device(0x1234, 0x0001)?.name).toBe('Widget');
			expect(reloaded).toHaveBeenCalledWith(metadata);
			expect(namespaced).toHaveBeenCalledWith(metadata);
		});

		it('keeps the current tables when the new file does not parse', async () => {
			const db = UsbIdDatabase.loadSync(file);

			writeFileSync(file, '\t0001  Orphan\n');

			await expect(db.reload()).rejects.toBeInstanceOf(UsbIdsParseError);
			expect(db.device(0x1234, 0x0001)?.name).toBe('Old Device');
			expect(db.version).toBe('1');
		});

		it('refuses to reload a database built from a string', async () => {
			await expect(UsbIdDatabase.fromString(REGISTRY).reload()).rejects.toBeInstanceOf(UsbIdsError);
		});
	});
});
