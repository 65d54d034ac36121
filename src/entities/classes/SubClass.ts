/* Libraries */
import ParentEntry from '../ParentEntry';
import Protocol from './Protocol';
import type UsbClass from './UsbClass';
import type { UsbId } from '../../utils';

/* Class */
export default class SubClass extends ParentEntry<Protocol> {
	public readonly usbClass: UsbClass;
	protected readonly childDigits = 2;

	constructor(usbClass: UsbClass, id: number, name: string){
		super(id, name, 2);

		this.usbClass = usbClass;
	}

	get classId(){ return this.usbClass.id; }

	/* Not every subclass lists its protocols; USB-IF defines more than the registry has */
	get protocols(): readonly Protocol[] { return this.entries; }

	public asCidScid(): [number, number] {
		return [this.usbClass.id, this.id];
	}

	public protocol(id: UsbId){
		return this.findChild(id);
	}

	public addProtocol(id: number, name: string){
		return this.addChild(new Protocol(id, name));
	}
}
