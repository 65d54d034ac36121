/* Libraries */
import Entry from './Entry';

/**
 * An interface listed under a device in the registry. The registry only knows
 * interfaces for a handful of devices, so this is not an authoritative list;
 * query the device itself for its real descriptors.
 */
export default class Interface extends Entry {
	constructor(id: number, name: string){
		super(id, name, 2);
	}
}
