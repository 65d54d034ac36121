/* Libraries */
import ParentEntry from '../ParentEntry';
import SubClass from './SubClass';
import type { UsbId } from '../../utils';

/* Class */
export default class UsbClass extends ParentEntry<SubClass> {
	protected readonly childDigits = 2;

	constructor(id: number, name: string){
		super(id, name, 2);
	}

	get subClasses(): readonly SubClass[] { return this.entries; }

	public subClass(id: UsbId){
		return this.findChild(id);
	}

	public addSubClass(id: number, name: string){
		return this.addChild(new SubClass(this, id, name));
	}
}
