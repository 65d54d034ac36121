/* Libraries */
import ParentEntry from './ParentEntry';
import Device from './Device';
import type { UsbId } from '../utils';

/* Class */
export default class Vendor extends ParentEntry<Device> {
	protected readonly childDigits = 4;

	constructor(id: number, name: string){
		super(id, name, 4);
	}

	get devices(): readonly Device[] { return this.entries; }

	public device(pid: UsbId){
		return this.findChild(pid);
	}

	public addDevice(id: number, name: string){
		return this.addChild(new Device(this, id, name));
	}
}
