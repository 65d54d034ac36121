/* Types */
export type UsbId = number | string;

/* General Functions */

export function toHex(n: number, digits = 2){
	return `0x${n.toString(16).toUpperCase().padStart(digits, '0')}`;
}

/* Registry notation: lowercase, zero padded, no prefix */
export function toIdString(n: number, digits = 4){
	return n.toString(16).padStart(digits, '0');
}

export function formatVidPid(vid: number, pid: number){
	return `${toIdString(vid)}:${toIdString(pid)}`;
}

/**
 * Normalizes an id given as a number or a hex string ("1d6b", "0x1D6B").
 * Returns null when the value is not an id that fits in `digits` hex digits.
 */
export function parseId(value: UsbId, digits: number): number | null {
	const max = 16 ** digits - 1;
	let id: number;

	if(typeof value === 'number'){
		id = value;
	} else {
		const hex = value.trim().replace(/^0x/i, '');

		if(!/^[0-9a-f]+$/i.test(hex) || hex.length > digits) return null;

		id = parseInt(hex, 16);
	}

	if(!Number.isInteger(id) || id < 0 || id > max) return null;

	return id;
}

/* Splits "1d6b:0003" into a vendor and product id */
export function parseVidPid(value: string): [number, number] | null {
	const parts = value.split(':');
	if(parts.length !== 2) return null;

	const vid = parseId(parts[0], 4);
	const pid = parseId(parts[1], 4);

	if(vid === null || pid === null) return null;

	return [vid, pid];
}

export function toTable(header: string[], rows: string[][]){

	// Column widths from the widest cell
	const widths = header.map((h, i) => Math.max(h.length, ...rows.map(r => (r[i] ?? '').length)));

	const line = (cells: string[]) => `| ${cells.map((c, i) => c.padEnd(widths[i])).join(' | ')} |`;

	// Creating table header
	let table = `${line(header)}\n|${widths.map(w => '-'.repeat(w + 2)).join('|')}|`;

	// Adding rows to table
	for(const row of rows){
		table += `\n${line(row)}`;
	}

	// Returning completed table
	return table;
}
