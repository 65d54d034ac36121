#!/usr/bin/env node

//#region Libraries
import { Command } from 'commander';
import chalk from 'chalk';
import logger from 'debug';
import { readFileSync } from 'fs';
import { join } from 'path';
import UsbIdDatabase from './UsbIdDatabase';
import { getBundledDatabase } from './lookup';
import { lookupCommand } from './commands/lookup';
import { classCommand } from './commands/class';
import { searchCommand, type SearchOptions } from './commands/search';
import { portsCommand } from './commands/ports';
import { infoCommand } from './commands/info';
import { updateCommand, type UpdateCommandOptions } from './commands/update';
import { EXIT_ERROR, type CliIO, type CommandContext, type GlobalOptions } from './commands/context';
//#endregion

//#region Configuring Logging
const debug = logger('usb-ids:cli');
//#endregion

const processIO: CliIO = {
	print: line => process.stdout.write(`${line}\n`),
	error: line => process.stderr.write(`${line}\n`),
	setExitCode: code => { process.exitCode = code; }
};

function packageVersion(){
	const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf8'));

	if(typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string')
		return pkg.version;

	return '0.0.0';
}

export function createProgram(io: CliIO = processIO){
	const program = new Command();
	let database: UsbIdDatabase | null = null;

	const context: CommandContext = {
		...io,
		get options(): GlobalOptions { return program.opts<GlobalOptions>(); },
		database(){
			if(database === null){
				const { database: path, debug: enabled } = program.opts<GlobalOptions>();
				database = path === undefined ? getBundledDatabase() : UsbIdDatabase.loadSync(path, { debug: enabled });
			}

			return database;
		}
	};

	/* Errors end up as one red line and exit code 2 */
	const run = <A extends unknown[]>(action: (...args: A) => void | Promise<void>) => async (...args: A) => {
		try {
			await action(...args);
		} catch(error){
			debug(error);
			io.error(chalk.red(error instanceof Error ? error.message : String(error)));
			io.setExitCode(EXIT_ERROR);
		}
	};

	program
		.name('usb-ids')
		.description('Look up USB vendors, devices and classes in the USB ID Repository')
		.version(packageVersion())
		.option('--database <file>', 'Registry file to use instead of the bundled snapshot')
		.option('--debug', 'Enable debug logging')
		.hook('preAction', (thisCommand) => {
			if(thisCommand.opts<GlobalOptions>().debug)
				logger.enable('usb-ids:*');
		});

	program
		.command('lookup <vid> [pid]')
		.description('Look up a vendor, or a device by vendor and product id (also accepts vid:pid)')
		.action(run((vid: string, pid: string | undefined) => lookupCommand(context, vid, pid)));

	program
		.command('class <class> [subclass] [protocol]')
		.description('Look up a device class, subclass or protocol')
		.action(run((cid: string, scid: string | undefined, protocol: string | undefined) => classCommand(context, cid, scid, protocol)));

	program
		.command('search <term>')
		.description('Search vendor and device names')
		.option('-l, --limit <count>', 'Maximum rows to print', '50')
		.action(run((term: string, options: SearchOptions) => searchCommand(context, term, options)));

	program
		.command('ports')
		.description('List serial ports with the names of their USB adapters')
		.action(run(() => portsCommand(context)));

	program
		.command('update')
		.description('Download the current registry and replace the local copy')
		.option('-o, --output <file>', 'File to write')
		.option('-u, --url <url>', 'Registry URL')
		.action(run((options: UpdateCommandOptions) => updateCommand(context, options)));

	program
		.command('info')
		.description('Show the registry version and table sizes')
		.action(run(() => infoCommand(context)));

	return program;
}

if(require.main === module){
	createProgram().parseAsync(process.argv).catch((error: unknown) => {
		process.stderr.write(`${chalk.red(String(error))}\n`);
		process.exitCode = EXIT_ERROR;
	});
}
