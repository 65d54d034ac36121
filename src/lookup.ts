/* Libraries */
import UsbIdDatabase from './UsbIdDatabase';
import { loadConfig } from './config';
import type { UsbId } from './utils';

/* Loaded on first use */
let bundled: UsbIdDatabase | null = null;

/**
 * The registry snapshot shipped with the package, or the file named by
 * `USB_IDS_DATABASE`. Parsed once and cached.
 */
export function getBundledDatabase(){
	if(bundled === null)
		bundled = UsbIdDatabase.loadSync(loadConfig().databasePath);

	return bundled;
}

/* Drops the cached database, the next lookup reads the file again */
export function resetBundledDatabase(){
	bundled = null;
}

/* Vendors */

export function vendors(){
	return getBundledDatabase().vendors();
}

export function vendorFromId(vid: UsbId){
	return getBundledDatabase().vendor(vid);
}

/**
 * Returns the device with the given vendor and product ids, or `null` when the
 * registry does not list that pair.
 *
 * @example
 * fromVidPid(0x1d6b, 0x0003)?.name // '3.0 root hub'
 */
export function fromVidPid(vid: UsbId, pid: UsbId){
	return getBundledDatabase().device(vid, pid);
}

/* Classes */

export function classes(){
	return getBundledDatabase().classes();
}

export function classFromId(cid: UsbId){
	return getBundledDatabase().deviceClass(cid);
}

export function subClassFromCidScid(cid: UsbId, scid: UsbId){
	return getBundledDatabase().subClass(cid, scid);
}

export function protocolFromCidScidPid(cid: UsbId, scid: UsbId, pid: UsbId){
	return getBundledDatabase().protocol(cid, scid, pid);
}
