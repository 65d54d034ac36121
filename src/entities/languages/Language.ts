/* Libraries */
import Entry from '../Entry';
import ParentEntry from '../ParentEntry';
import type { UsbId } from '../../utils';

/* Class */
export class Dialect extends Entry {
	constructor(id: number, name: string){
		super(id, name, 2);
	}
}

/* String descriptor language (LANGID primary language) */
export default class Language extends ParentEntry<Dialect> {
	protected readonly childDigits = 2;

	constructor(id: number, name: string){
		super(id, name, 4);
	}

	get dialects(): readonly Dialect[] { return this.entries; }

	public dialect(id: UsbId){
		return this.findChild(id);
	}

	public addDialect(id: number, name: string){
		return this.addChild(new Dialect(id, name));
	}
}
