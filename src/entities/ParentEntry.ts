/* Libraries */
import Entry from './Entry';
import { parseId, type UsbId } from '../utils';

/* Class */
export default abstract class ParentEntry<C extends Entry> extends Entry {
	/* Children in registry order, duplicates included */
	protected readonly entries: C[] = [];

	/* First child for each id */
	private index = new Map<number, C>();

	/* Width of the child ids, in hex digits */
	protected abstract readonly childDigits: number;

	protected addChild(child: C){
		this.entries.push(child);

		if(!this.index.has(child.id))
			this.index.set(child.id, child);

		return child;
	}

	protected findChild(id: UsbId){
		const key = parseId(id, this.childDigits);
		if(key === null) return null;

		return this.index.get(key) ?? null;
	}
}
