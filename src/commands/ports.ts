/* Libraries */
import chalk from 'chalk';
import { listUsbPorts } from '../ports';
import { toIdString, toTable } from '../utils';
import type { CommandContext } from './context';

export async function portsCommand(context: CommandContext){
	const ports = await listUsbPorts(context.database());

	if(ports.length === 0){
		context.print(chalk.yellow('No serial ports found'));
		return;
	}

	const rows = ports.map(port => [
		port.path,
		port.vendorId === null || port.productId === null ? '-' : `${toIdString(port.vendorId)}:${toIdString(port.productId)}`,
		port.vendor?.name ?? port.manufacturer ?? '-',
		port.device?.name ?? '-'
	]);

	context.print(toTable(['Path', 'ID', 'Vendor', 'Device'], rows));
}
