/* Libraries */
import Entry from '../Entry';

/* Class */
export default class Protocol extends Entry {
	constructor(id: number, name: string){
		super(id, name, 2);
	}
}
