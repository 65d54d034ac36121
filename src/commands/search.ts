/* Libraries */
import chalk from 'chalk';
import { toTable } from '../utils';
import { EXIT_NO_MATCH, type CommandContext } from './context';

export interface SearchOptions {
	limit?: string;
}

export function searchCommand(context: CommandContext, term: string, options: SearchOptions = {}){
	const limit = options.limit === undefined ? 50 : parseInt(options.limit, 10);
	const { vendors, devices } = context.database().search(term);

	if(vendors.length === 0 && devices.length === 0){
		context.print(chalk.yellow(`No match for "${term}"`));
		context.setExitCode(EXIT_NO_MATCH);
		return;
	}

	const rows = [
		...vendors.map(v => [v.hexId, v.name, '']),
		...devices.map(d => [`${d.vendor.hexId}:${d.hexId}`, d.vendor.name, d.name])
	];

	const shown = Number.isInteger(limit) && limit > 0 ? rows.slice(0, limit) : rows;

	context.print(toTable(['ID', 'Vendor', 'Device'], shown));

	if(shown.length < rows.length)
		context.print(chalk.gray(`${rows.length - shown.length} more not shown`));
}
