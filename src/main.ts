/* Database */
import UsbIdDatabase from './UsbIdDatabase';
import UsbIdsParser, { parse } from './UsbIdsParser';
import UsbIdsUpdater from './UsbIdsUpdater';

/* Vendors and devices */
import Entry from './entities/Entry';
import Vendor from './entities/Vendor';
import Device from './entities/Device';
import Interface from './entities/Interface';

/* Device classes. Class 0x00 defers to the interface descriptors */
import UsbClass from './entities/classes/UsbClass';
import SubClass from './entities/classes/SubClass';
import Protocol from './entities/classes/Protocol';

/* HID usage tables and string descriptor languages */
import UsagePage, { Usage } from './entities/hid/UsagePage';
import Language, { Dialect } from './entities/languages/Language';

/* Exporting Database as default */
export default UsbIdDatabase;

/* Exporting extras */
export {
	// Database
	UsbIdDatabase,
	UsbIdsParser,
	UsbIdsUpdater,
	parse,

	// Entities
	Entry,
	Vendor,
	Device,
	Interface,
	UsbClass,
	SubClass,
	Protocol,
	UsagePage,
	Usage,
	Language,
	Dialect
};

export {
	getBundledDatabase,
	resetBundledDatabase,
	fromVidPid,
	vendorFromId,
	vendors,
	classFromId,
	subClassFromCidScid,
	protocolFromCidScidPid,
	classes
} from './lookup';

export { listUsbPorts } from './ports';
export { loadConfig, BUNDLED_DATABASE_PATH, DEFAULT_UPDATE_URL } from './config';
export { UsbIdsError, UsbIdsParseError, UsbIdsUpdateError } from './errors';
export { toHex, toIdString, formatVidPid, parseId, parseVidPid } from './utils';

/* Types */
export type { UsbId } from './utils';
export type { UsbPort } from './ports';
export type { RegistryConfig } from './config';
export type { UpdaterOptions, UpdateRequest, UpdateResult } from './UsbIdsUpdater';
export type {
	DatabaseOptions,
	ParserOptions,
	ParsedRegistry,
	RegistryMetadata,
	RegistryStats,
	RegistryTables,
	SearchResult
} from './typings/database';
