import type Entry from '../entities/Entry';
import type Vendor from '../entities/Vendor';
import type Device from '../entities/Device';
import type UsbClass from '../entities/classes/UsbClass';
import type UsagePage from '../entities/hid/UsagePage';
import type Language from '../entities/languages/Language';

export interface RegistryMetadata {
	version: string | null;
	date: string | null;
}

export interface RegistryTables {
	vendors: Map<number, Vendor>;
	classes: Map<number, UsbClass>;
	audioTerminals: Map<number, Entry>;
	hidDescriptors: Map<number, Entry>;
	hidReportItems: Map<number, Entry>;
	biases: Map<number, Entry>;
	phys: Map<number, Entry>;
	usagePages: Map<number, UsagePage>;
	languages: Map<number, Language>;
	countryCodes: Map<number, Entry>;
	videoTerminals: Map<number, Entry>;
}

export interface ParsedRegistry extends RegistryTables {
	metadata: RegistryMetadata;
}

/* Tables that hold plain id/name entries */
export type FlatTable = 'audioTerminals' | 'hidDescriptors' | 'hidReportItems' | 'biases' | 'phys' | 'countryCodes' | 'videoTerminals';

export type RegistryStats = { [K in keyof RegistryTables]: number } & {
	devices: number;
};

export interface ParserOptions {
	debug?: boolean;
}

export interface DatabaseOptions {
	debug?: boolean;
}

export interface SearchResult {
	vendors: Vendor[];
	devices: Device[];
}
