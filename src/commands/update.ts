/* Libraries */
import chalk from 'chalk';
import UsbIdsUpdater from '../UsbIdsUpdater';
import { loadConfig } from '../config';
import type { CommandContext } from './context';

export interface UpdateCommandOptions {
	output?: string;
	url?: string;
}

export async function updateCommand(context: CommandContext, options: UpdateCommandOptions, updater?: UsbIdsUpdater){
	const output = options.output ?? context.options.database ?? loadConfig().databasePath;
	const registryUpdater = updater ?? new UsbIdsUpdater({ debug: context.options.debug });

	registryUpdater.on('download::retry', (event: { attempt: number, wait: number }) => {
		context.error(chalk.yellow(`Download failed (attempt ${event.attempt}), retrying in ${event.wait}ms`));
	});

	const result = await registryUpdater.update({ output, url: options.url });

	context.print(chalk.green(`Updated ${result.path}`));
	context.print(`  version ${result.version ?? 'unknown'}, ${result.vendors} vendors, ${result.classes} classes, ${result.bytes} bytes`);
}
