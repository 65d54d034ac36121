//#region Libraries
import logger from 'debug';
import { EventEmitter2 } from 'eventemitter2';
import { readFileSync } from 'fs';
import { readFile } from 'fs/promises';
import UsbIdsParser from './UsbIdsParser';
import { UsbIdsError } from './errors';
import { parseId, type UsbId } from './utils';

/* Entities */
import type Entry from './entities/Entry';
import type Vendor from './entities/Vendor';
import type Device from './entities/Device';
import type UsbClass from './entities/classes/UsbClass';
import type SubClass from './entities/classes/SubClass';
import type Protocol from './entities/classes/Protocol';
import type UsagePage from './entities/hid/UsagePage';
import type { Usage } from './entities/hid/UsagePage';
import type Language from './entities/languages/Language';
import type { Dialect } from './entities/languages/Language';

/* Interfaces and Types */
import type { DatabaseOptions, ParsedRegistry, RegistryMetadata, RegistryStats, SearchResult } from './typings/database';
//#endregion

//#region Configuring Logging
const debug = logger('usb-ids:database');
//#endregion

//#region Helpers
function lookup<T>(table: Map<number, T>, id: UsbId, digits: number): T | null {
	const key = parseId(id, digits);
	if(key === null) return null;

	return table.get(key) ?? null;
}
//#endregion

//#region Database Class
export default class UsbIdDatabase extends EventEmitter2 {
	//#region Private Variables

	/* Replaced as a whole on reload */
	private registry: ParsedRegistry;

	/* File the registry was read from, null when built from a string */
	private source: string | null;

	private options: DatabaseOptions = {};

	//#endregion

	//#region Constuctor

	constructor(registry: ParsedRegistry, source: string | null = null, options?: DatabaseOptions){
		/* Constructing super class */
		super({ wildcard: true, delimiter: '::' });

		/* Saving options */
		if(options){
			this.options = options;

			if(this.options.debug)
				debug.enabled = this.options.debug;
		}

		this.registry = registry;
		this.source = source;
	}

	public static fromString(text: string, options?: DatabaseOptions){
		const registry = new UsbIdsParser(options).parse(text);

		return new UsbIdDatabase(registry, null, options);
	}

	public static loadSync(path: string, options?: DatabaseOptions){
		debug(`loading ${path}`);

		const registry = new UsbIdsParser(options).parse(readFileSync(path, 'utf8'));

		return new UsbIdDatabase(registry, path, options);
	}

	public static async load(path: string, options?: DatabaseOptions){
		debug(`loading ${path}`);

		const registry = new UsbIdsParser(options).parse(await readFile(path, 'utf8'));

		return new UsbIdDatabase(registry, path, options);
	}

	//#endregion

	//#region Database Metadata

	get metadata(): RegistryMetadata { return { ...this.registry.metadata }; }

	get version(){ return this.registry.metadata.version; }

	get date(){ return this.registry.metadata.date; }

	get path(){ return this.source; }

	public stats(): RegistryStats {
		const registry = this.registry;
		let devices = 0;

		for(const vendor of registry.vendors.values())
			devices += vendor.devices.length;

		return {
			vendors: registry.vendors.size,
			devices,
			classes: registry.classes.size,
			audioTerminals: registry.audioTerminals.size,
			hidDescriptors: registry.hidDescriptors.size,
			hidReportItems: registry.hidReportItems.size,
			biases: registry.biases.size,
			phys: registry.phys.size,
			usagePages: registry.usagePages.size,
			languages: registry.languages.size,
			countryCodes: registry.countryCodes.size,
			videoTerminals: registry.videoTerminals.size
		};
	}

	//#endregion

	//#region Reloading

	public async reload(){
		if(this.source === null)
			throw new UsbIdsError('Database was not loaded from a file and cannot be reloaded');

		debug(`reloading ${this.source}`);

		/* Parse first so a bad file leaves the current tables in place */
		const registry = new UsbIdsParser(this.options).parse(await readFile(this.source, 'utf8'));
		this.registry = registry;

		this.emit('reloaded', this.metadata);
		this.emit(['db', 'reloaded'], this.metadata);

		return this.metadata;
	}

	//#endregion

	//#region Vendors & Devices

	public vendor(vid: UsbId): Vendor | null {
		return lookup(this.registry.vendors, vid, 4);
	}

	/* The device with the given vendor and product ids, or null if the registry has none */
	public device(vid: UsbId, pid: UsbId): Device | null {
		return this.vendor(vid)?.device(pid) ?? null;
	}

	public vendors(){ return this.registry.vendors.values(); }

	public search(term: string): SearchResult {
		const needle = term.trim().toLowerCase();
		const result: SearchResult = { vendors: [], devices: [] };

		if(needle === '') return result;

		for(const vendor of this.registry.vendors.values()){
			if(vendor.name.toLowerCase().includes(needle))
				result.vendors.push(vendor);

			for(const device of vendor.devices){
				if(device.name.toLowerCase().includes(needle))
					result.devices.push(device);
			}
		}

		debug(`search "${needle}": ${result.vendors.length} vendors, ${result.devices.length} devices`);

		return result;
	}

	//#endregion

	//#region Classes

	public deviceClass(cid: UsbId): UsbClass | null {
		return lookup(this.registry.classes, cid, 2);
	}

	public subClass(cid: UsbId, scid: UsbId): SubClass | null {
		return this.deviceClass(cid)?.subClass(scid) ?? null;
	}

	public protocol(cid: UsbId, scid: UsbId, pid: UsbId): Protocol | null {
		return this.subClass(cid, scid)?.protocol(pid) ?? null;
	}

	public classes(){ return this.registry.classes.values(); }

	//#endregion

	//#region Other Tables

	public audioTerminal(id: UsbId): Entry | null { return lookup(this.registry.audioTerminals, id, 4); }

	public hidDescriptor(id: UsbId): Entry | null { return lookup(this.registry.hidDescriptors, id, 2); }

	public hidReportItem(id: UsbId): Entry | null { return lookup(this.registry.hidReportItems, id, 2); }

	public bias(id: UsbId): Entry | null { return lookup(this.registry.biases, id, 1); }

	public phy(id: UsbId): Entry | null { return lookup(this.registry.phys, id, 2); }

	public usagePage(id: UsbId): UsagePage | null { return lookup(this.registry.usagePages, id, 2); }

	public usage(page: UsbId, id: UsbId): Usage | null {
		return this.usagePage(page)?.usage(id) ?? null;
	}

	public language(id: UsbId): Language | null { return lookup(this.registry.languages, id, 4); }

	public dialect(language: UsbId, id: UsbId): Dialect | null {
		return this.language(language)?.dialect(id) ?? null;
	}

	public countryCode(id: UsbId): Entry | null { return lookup(this.registry.countryCodes, id, 2); }

	public videoTerminal(id: UsbId): Entry | null { return lookup(this.registry.videoTerminals, id, 4); }

	public audioTerminals(){ return this.registry.audioTerminals.values(); }

	public hidDescriptors(){ return this.registry.hidDescriptors.values(); }

	public hidReportItems(){ return this.registry.hidReportItems.values(); }

	public biases(){ return this.registry.biases.values(); }

	public phys(){ return this.registry.phys.values(); }

	public usagePages(){ return this.registry.usagePages.values(); }

	public languages(){ return this.registry.languages.values(); }

	public countryCodes(){ return this.registry.countryCodes.values(); }

	public videoTerminals(){ return this.registry.videoTerminals.values(); }

	//#endregion
}
//#endregion
