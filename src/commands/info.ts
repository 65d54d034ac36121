/* Libraries */
import chalk from 'chalk';
import { toTable } from '../utils';
import type { CommandContext } from './context';

export function infoCommand(context: CommandContext){
	const database = context.database();
	const stats = database.stats();

	context.print(`${chalk.bold('file')}     ${database.path ?? '-'}`);
	context.print(`${chalk.bold('version')}  ${database.version ?? 'unknown'}`);
	context.print(`${chalk.bold('date')}     ${database.date ?? 'unknown'}`);

	const rows = Object.entries(stats).map(([table, count]) => [table, count.toString()]);

	context.print(toTable(['Table', 'Entries'], rows));
}
