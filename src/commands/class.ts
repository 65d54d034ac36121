/* Libraries */
import chalk from 'chalk';
import { UsbIdsError } from '../errors';
import { parseId, toIdString } from '../utils';
import { EXIT_NO_MATCH, type CommandContext } from './context';

function requireId(value: string, label: string){
	const id = parseId(value, 2);

	if(id === null)
		throw new UsbIdsError(`Invalid ${label} "${value}": expected up to 2 hex digits`);

	return id;
}

/* `class 03`, `class 03 01` or `class 03 01 02` */
export function classCommand(context: CommandContext, cidArg: string, scidArg?: string, protocolArg?: string){
	const cid = requireId(cidArg, 'class id');
	const scid = scidArg === undefined ? null : requireId(scidArg, 'subclass id');
	const pid = protocolArg === undefined ? null : requireId(protocolArg, 'protocol id');

	const path = [cid, scid, pid].filter((id): id is number => id !== null).map(id => toIdString(id, 2)).join(':');
	const noMatch = () => {
		context.print(chalk.yellow(`No match for class ${path}`));
		context.setExitCode(EXIT_NO_MATCH);
	};

	const usbClass = context.database().deviceClass(cid);
	if(usbClass === null) return noMatch();

	context.print(`${chalk.bold('class')}    ${usbClass.hexId}  ${usbClass.name}`);

	if(scid === null){
		for(const subClass of usbClass.subClasses)
			context.print(`  ${chalk.gray('subclass')} ${subClass.hexId}  ${subClass.name}`);
		return;
	}

	const subClass = usbClass.subClass(scid);
	if(subClass === null) return noMatch();

	context.print(`${chalk.bold('subclass')} ${subClass.hexId}  ${subClass.name}`);

	if(pid === null){
		for(const protocol of subClass.protocols)
			context.print(`  ${chalk.gray('protocol')} ${protocol.hexId}  ${protocol.name}`);
		return;
	}

	const protocol = subClass.protocol(pid);
	if(protocol === null) return noMatch();

	context.print(`${chalk.bold('protocol')} ${protocol.hexId}  ${protocol.name}`);
}
