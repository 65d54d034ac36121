//#region Libraries
import logger from 'debug';
import { SerialPort } from 'serialport';
import type UsbIdDatabase from './UsbIdDatabase';
import type Vendor from './entities/Vendor';
import type Device from './entities/Device';
import { getBundledDatabase } from './lookup';
import { parseId } from './utils';
//#endregion

//#region Configuring Logging
const debug = logger('usb-ids:ports');
//#endregion

//#region Interfaces
export interface UsbPort {
	path: string;
	vendorId: number | null;
	productId: number | null;
	manufacturer?: string;
	serialNumber?: string;
	/* Registry entries for the port's ids, null when unknown */
	vendor: Vendor | null;
	device: Device | null;
}
//#endregion

/**
 * Lists the host's serial ports with the registry names of the USB adapters
 * behind them. Ports that are not USB devices have no ids and no names.
 */
export async function listUsbPorts(database: UsbIdDatabase = getBundledDatabase()): Promise<UsbPort[]> {
	const ports = await SerialPort.list();

	debug(`found ${ports.length} serial ports`);

	return ports.map(port => {
		const vendorId = port.vendorId === undefined ? null : parseId(port.vendorId, 4);
		const productId = port.productId === undefined ? null : parseId(port.productId, 4);

		const vendor = vendorId === null ? null : database.vendor(vendorId);
		const device = vendor === null || productId === null ? null : vendor.device(productId);

		return {
			path: port.path,
			vendorId,
			productId,
			manufacturer: port.manufacturer,
			serialNumber: port.serialNumber,
			vendor,
			device
		};
	});
}
