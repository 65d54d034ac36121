//#region Libraries
import logger from 'debug';
import Entry from './entities/Entry';
import Vendor from './entities/Vendor';
import type Device from './entities/Device';
import UsbClass from './entities/classes/UsbClass';
import type SubClass from './entities/classes/SubClass';
import UsagePage from './entities/hid/UsagePage';
import Language from './entities/languages/Language';
import { UsbIdsParseError } from './errors';
import type { FlatTable, ParsedRegistry, ParserOptions, RegistryMetadata } from './typings/database';
//#endregion

//#region Configuring Logging
const debug = logger('usb-ids:parser');
//#endregion

//#region Line Matchers
/*
 * The registry is a line format: top level entries start in column 0, children
 * are indented with one tab, grandchildren with two. Id and name are always
 * separated by two spaces.
 */
const VENDOR_LINE = /^([0-9a-fA-F]{4})  (.*)$/;
const KEYWORD_LINE = /^([A-Z]+) ([0-9a-fA-F]+)  (.*)$/;
const CHILD_LINE = /^\t([0-9a-fA-F]+)  (.*)$/;
const GRANDCHILD_LINE = /^\t\t([0-9a-fA-F]+)  (.*)$/;

const VERSION_COMMENT = /^#\s*Version:\s*(.+?)\s*$/;
const DATE_COMMENT = /^#\s*Date:\s*(.+?)\s*$/;

/* Keyword sections of plain id/name entries */
const FLAT_SECTIONS: { [keyword: string]: { table: FlatTable, digits: number } } = {
	AT: { table: 'audioTerminals', digits: 4 },
	HID: { table: 'hidDescriptors', digits: 2 },
	R: { table: 'hidReportItems', digits: 2 },
	BIAS: { table: 'biases', digits: 1 },
	PHY: { table: 'phys', digits: 2 },
	HCC: { table: 'countryCodes', digits: 2 },
	VT: { table: 'videoTerminals', digits: 4 }
};

interface IdLine {
	id: number;
	name: string;
}

function match(pattern: RegExp, line: string, digits: number | number[]): IdLine | null {
	const m = pattern.exec(line);
	if(!m) return null;

	const widths = Array.isArray(digits) ? digits : [digits];
	if(!widths.includes(m[1].length)) return null;

	return { id: parseInt(m[1], 16), name: m[2] };
}
//#endregion

//#region Parser State
/*
 * The current section decides what an indented line means: "\t01  x" is a
 * device under a vendor but a subclass under a class.
 */
type Section =
	| { kind: 'none' }
	| { kind: 'vendors', vendor: Vendor, device?: Device }
	| { kind: 'classes', usbClass: UsbClass, subClass?: SubClass }
	| { kind: 'usages', page: UsagePage }
	| { kind: 'languages', language: Language }
	| { kind: 'flat', keyword: string }
	| { kind: 'unknown', keyword: string };
//#endregion

//#region Parser Class
export default class UsbIdsParser {

	//#region Private Variables

	private registry: ParsedRegistry = UsbIdsParser.emptyRegistry();
	private section: Section = { kind: 'none' };
	private lineNumber = 0;
	private ignored = 0;

	//#endregion

	//#region Constuctor

	constructor(options?: ParserOptions){
		if(options?.debug)
			debug.enabled = true;
	}

	//#endregion

	//#region Parsing

	public parse(text: string): ParsedRegistry {
		/* Resetting state, a parser can be reused */
		this.registry = UsbIdsParser.emptyRegistry();
		this.section = { kind: 'none' };
		this.lineNumber = 0;
		this.ignored = 0;

		for(const rawLine of text.split('\n')){
			this.lineNumber++;
			this.parseLine(rawLine.endsWith('\r') ? rawLine.slice(0, -1) : rawLine);
		}

		debug(`parsed ${this.registry.vendors.size} vendors, ${this.registry.classes.size} classes in ${this.lineNumber} lines (${this.ignored} ignored)`);

		return this.registry;
	}

	private parseLine(line: string){
		if(line.trim() === '') return;

		if(line.startsWith('#')){
			this.parseComment(line, this.registry.metadata);
			return;
		}

		if(line.startsWith('\t'))
			this.parseChild(line);
		else
			this.parseTopLevel(line);
	}

	private parseComment(line: string, metadata: RegistryMetadata){
		const version = VERSION_COMMENT.exec(line);
		if(version && metadata.version === null){
			metadata.version = version[1];
			return;
		}

		const date = DATE_COMMENT.exec(line);
		if(date && metadata.date === null)
			metadata.date = date[1];
	}

	private parseTopLevel(line: string){
		const vendor = match(VENDOR_LINE, line, 4);

		if(vendor){
			this.assertUnique(this.registry.vendors, vendor.id, 'vendor', line);

			const entry = new Vendor(vendor.id, vendor.name);
			this.registry.vendors.set(vendor.id, entry);
			this.section = { kind: 'vendors', vendor: entry };
			return;
		}

		const m = KEYWORD_LINE.exec(line);

		if(!m){
			this.skipTopLevel(line, line.split(/\s/)[0]);
			return;
		}

		const [, keyword, hex, name] = m;
		const entryOf = (digits: number): IdLine | null =>
			hex.length === digits ? { id: parseInt(hex, 16), name } : null;

		switch(true){
			case keyword === 'C': {
				const entry = entryOf(2);
				if(!entry) return this.skipTopLevel(line, keyword);

				this.assertUnique(this.registry.classes, entry.id, 'class', line);

				const usbClass = new UsbClass(entry.id, entry.name);
				this.registry.classes.set(entry.id, usbClass);
				this.section = { kind: 'classes', usbClass };
				break;
			}

			case keyword === 'HUT': {
				const entry = entryOf(2);
				if(!entry) return this.skipTopLevel(line, keyword);

				this.assertUnique(this.registry.usagePages, entry.id, 'usage page', line);

				const page = new UsagePage(entry.id, entry.name);
				this.registry.usagePages.set(entry.id, page);
				this.section = { kind: 'usages', page };
				break;
			}

			case keyword === 'L': {
				const entry = entryOf(4);
				if(!entry) return this.skipTopLevel(line, keyword);

				this.assertUnique(this.registry.languages, entry.id, 'language', line);

				const language = new Language(entry.id, entry.name);
				this.registry.languages.set(entry.id, language);
				this.section = { kind: 'languages', language };
				break;
			}

			case Object.prototype.hasOwnProperty.call(FLAT_SECTIONS, keyword): {
				const { table, digits } = FLAT_SECTIONS[keyword];
				const entry = entryOf(digits);
				if(!entry) return this.skipTopLevel(line, keyword);

				this.assertUnique(this.registry[table], entry.id, keyword, line);

				this.registry[table].set(entry.id, new Entry(entry.id, entry.name, digits));
				this.section = { kind: 'flat', keyword };
				break;
			}

			default:
				/* Sections this library does not model; their children are skipped too */
				if(this.section.kind !== 'unknown' || this.section.keyword !== keyword)
					debug(`skipping unknown section "${keyword}" at line ${this.lineNumber}`);

				this.section = { kind: 'unknown', keyword };
		}
	}

	private parseChild(line: string){
		const section = this.section;

		switch(section.kind){
			case 'none':
				throw new UsbIdsParseError('Indented entry before any parent entry', this.lineNumber, line);

			case 'vendors': {
				const device = match(CHILD_LINE, line, 4);
				if(device){
					section.device = section.vendor.addDevice(device.id, device.name);
					return;
				}

				const iface = match(GRANDCHILD_LINE, line, 2);
				if(iface){
					if(!section.device)
						throw new UsbIdsParseError(`Interface without a parent device in vendor ${section.vendor.hexId}`, this.lineNumber, line);

					/* Lookups return the first device with an id, so its interfaces go there */
					const device = section.vendor.device(section.device.id) ?? section.device;
					device.addInterface(iface.id, iface.name);
					return;
				}

				return this.unmatched(line);
			}

			case 'classes': {
				const subClass = match(CHILD_LINE, line, 2);
				if(subClass){
					section.subClass = section.usbClass.addSubClass(subClass.id, subClass.name);
					return;
				}

				const protocol = match(GRANDCHILD_LINE, line, 2);
				if(protocol){
					if(!section.subClass)
						throw new UsbIdsParseError(`Protocol without a parent subclass in class ${section.usbClass.hexId}`, this.lineNumber, line);

					section.subClass.addProtocol(protocol.id, protocol.name);
					return;
				}

				return this.unmatched(line);
			}

			case 'usages': {
				const usage = match(CHILD_LINE, line, [3, 4]);
				if(usage){
					section.page.addUsage(usage.id, usage.name);
					return;
				}

				return this.unmatched(line);
			}

			case 'languages': {
				const dialect = match(CHILD_LINE, line, 2);
				if(dialect){
					section.language.addDialect(dialect.id, dialect.name);
					return;
				}

				return this.unmatched(line);
			}

			case 'flat':
			case 'unknown':
				return this.unmatched(line);
		}
	}

	//#endregion

	//#region Helpers

	private unmatched(line: string){
		/* Nothing has been parsed yet, so this is not a registry */
		if(this.section.kind === 'none')
			throw new UsbIdsParseError('Unrecognized line before any entry', this.lineNumber, line);

		if(this.section.kind !== 'unknown')
			debug(`ignoring line ${this.lineNumber}: ${JSON.stringify(line)}`);

		this.ignored++;
	}

	/* A malformed parent line; its children must not land under the previous parent */
	private skipTopLevel(line: string, keyword: string){
		this.unmatched(line);
		this.section = { kind: 'unknown', keyword };
	}

	private assertUnique(table: Map<number, unknown>, id: number, kind: string, line: string){
		if(table.has(id))
			throw new UsbIdsParseError(`Duplicate ${kind} id`, this.lineNumber, line);
	}

	public static emptyRegistry(): ParsedRegistry {
		return {
			metadata: { version: null, date: null },
			vendors: new Map(),
			classes: new Map(),
			audioTerminals: new Map(),
			hidDescriptors: new Map(),
			hidReportItems: new Map(),
			biases: new Map(),
			phys: new Map(),
			usagePages: new Map(),
			languages: new Map(),
			countryCodes: new Map(),
			videoTerminals: new Map()
		};
	}

	//#endregion
}
//#endregion

/* Parses registry text with a throwaway parser */
export function parse(text: string, options?: ParserOptions){
	return new UsbIdsParser(options).parse(text);
}
