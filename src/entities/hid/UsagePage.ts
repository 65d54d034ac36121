/* Libraries */
import Entry from '../Entry';
import ParentEntry from '../ParentEntry';
import type { UsbId } from '../../utils';

/* Usage ids are written with 3 digits, a few pages use 4 */
export class Usage extends Entry {
	constructor(id: number, name: string){
		super(id, name, 3);
	}
}

/* HID usage table page (HUT) */
export default class UsagePage extends ParentEntry<Usage> {
	protected readonly childDigits = 4;

	constructor(id: number, name: string){
		super(id, name, 2);
	}

	get usages(): readonly Usage[] { return this.entries; }

	public usage(id: UsbId){
		return this.findChild(id);
	}

	public addUsage(id: number, name: string){
		return this.addChild(new Usage(id, name));
	}
}
