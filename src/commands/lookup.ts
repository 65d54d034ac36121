/* Libraries */
import chalk from 'chalk';
import { UsbIdsError } from '../errors';
import { formatVidPid, parseId, parseVidPid, toIdString } from '../utils';
import { EXIT_NO_MATCH, type CommandContext } from './context';

function requireId(value: string, digits: number, label: string){
	const id = parseId(value, digits);

	if(id === null)
		throw new UsbIdsError(`Invalid ${label} "${value}": expected up to ${digits} hex digits`);

	return id;
}

/* `lookup 1d6b`, `lookup 1d6b 0003` or `lookup 1d6b:0003` */
export function lookupCommand(context: CommandContext, vidArg: string, pidArg?: string){
	let vid: number;
	let pid: number | null = null;

	const pair = pidArg === undefined && vidArg.includes(':') ? parseVidPid(vidArg) : null;

	if(pair){
		[vid, pid] = pair;
	} else {
		vid = requireId(vidArg, 4, 'vendor id');

		if(pidArg !== undefined)
			pid = requireId(pidArg, 4, 'product id');
	}

	const database = context.database();
	const vendor = database.vendor(vid);

	if(vendor === null){
		context.print(chalk.yellow(`No match for vendor ${toIdString(vid)}`));
		context.setExitCode(EXIT_NO_MATCH);
		return;
	}

	if(pid === null){
		context.print(`${chalk.bold(vendor.hexId)}  ${vendor.name}`);
		context.print(chalk.gray(`${vendor.devices.length} devices`));
		return;
	}

	const device = vendor.device(pid);

	if(device === null){
		context.print(chalk.yellow(`No match for ${formatVidPid(vid, pid)}`));
		context.setExitCode(EXIT_NO_MATCH);
		return;
	}

	context.print(`${chalk.bold(formatVidPid(vid, pid))}  ${vendor.name} ${device.name}`);

	for(const iface of device.interfaces)
		context.print(`  ${chalk.gray('interface')} ${iface.hexId}  ${iface.name}`);
}
