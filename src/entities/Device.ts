/* Libraries */
import ParentEntry from './ParentEntry';
import Interface from './Interface';
import type Vendor from './Vendor';
import { formatVidPid, type UsbId } from '../utils';

/* Class */
export default class Device extends ParentEntry<Interface> {
	public readonly vendor: Vendor;
	protected readonly childDigits = 2;

	constructor(vendor: Vendor, id: number, name: string){
		super(id, name, 4);

		this.vendor = vendor;
	}

	get vendorId(){ return this.vendor.id; }

	get interfaces(): readonly Interface[] { return this.entries; }

	/* [vendor id, product id], the order most USB libraries take them in */
	public asVidPid(): [number, number] {
		return [this.vendor.id, this.id];
	}

	public interface(id: UsbId){
		return this.findChild(id);
	}

	public addInterface(id: number, name: string){
		return this.addChild(new Interface(id, name));
	}

	public toString(){
		return `${formatVidPid(this.vendor.id, this.id)}  ${this.vendor.name} ${this.name}`;
	}
}
