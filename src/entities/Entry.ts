/* Libraries */
import { toIdString } from '../utils';

/* Class */
export default class Entry {
	/* Entry Info */
	public readonly id: number;
	public readonly name: string;

	/* Width of the id in the registry, in hex digits */
	public readonly digits: number;

	constructor(id: number, name: string, digits: number){
		this.id = id;
		this.name = name;
		this.digits = digits;
	}

	get hexId(){ return toIdString(this.id, this.digits); }

	public toString(){
		return `${this.hexId}  ${this.name}`;
	}
}
