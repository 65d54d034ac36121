//#region Libraries
import logger from 'debug';
import axios from 'axios';
import Bluebird from 'bluebird';
import { queue, type AsyncResultCallback, type QueueObject } from 'async';
import { EventEmitter2 } from 'eventemitter2';
import { mkdir, readFile, rename, unlink, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import UsbIdsParser from './UsbIdsParser';
import type UsbIdDatabase from './UsbIdDatabase';
import { UsbIdsUpdateError } from './errors';
import { loadConfig } from './config';
import type { ParsedRegistry } from './typings/database';
//#endregion

//#region Configuring Logging
const debug = logger('usb-ids:updater');
//#endregion

//#region Interfaces
/* The part of an axios instance the updater uses */
export interface HttpClient {
	get(url: string, config: { responseType: 'text' }): Promise<{ data: unknown, status: number }>;
}

export interface UpdaterOptions {
	debug?: boolean;
	url?: string;
	output?: string;
	timeoutMs?: number;
	retries?: number;
	retryDelayMs?: number;
	/* Defaults to an axios instance built from the options */
	client?: HttpClient;
}

export interface UpdateRequest {
	url?: string;
	output?: string;
	/* Reloaded from `output` once the new file is in place */
	database?: UsbIdDatabase;
}

export interface UpdateResult {
	path: string;
	url: string;
	version: string | null;
	date: string | null;
	vendors: number;
	classes: number;
	bytes: number;
}

interface UpdateTask {
	url: string;
	output: string;
	database?: UsbIdDatabase;
}
//#endregion

//#region Updater Class
export default class UsbIdsUpdater extends EventEmitter2 {
	//#region Private Variables

	/* One update at a time; they all write the same file */
	private updateQueue: QueueObject<UpdateTask>;
	private client: HttpClient;
	private options: Required<Omit<UpdaterOptions, 'client' | 'debug'>>;

	//#endregion

	//#region Constuctor

	constructor(options: UpdaterOptions = {}){
		super({ wildcard: true, delimiter: '::' });

		if(options.debug)
			debug.enabled = true;

		const config = loadConfig();

		this.options = {
			url: options.url ?? config.updateUrl,
			output: options.output ?? config.databasePath,
			timeoutMs: options.timeoutMs ?? config.timeoutMs,
			retries: options.retries ?? config.retries,
			retryDelayMs: options.retryDelayMs ?? config.retryDelayMs
		};

		this.client = options.client ?? axios.create({
			timeout: this.options.timeoutMs,
			responseType: 'text',
			headers: { Accept: 'text/plain' }
		});

		this.updateQueue = queue(this.processQueue, 1);
	}

	//#endregion

	//#region Public Methods

	get pending(){ return this.updateQueue.length() + this.updateQueue.running(); }

	/**
	 * Downloads the registry, checks that it parses, then replaces the output
	 * file. The old file is left untouched when any step fails.
	 */
	public update(request: UpdateRequest = {}){
		const task: UpdateTask = {
			url: request.url ?? this.options.url,
			output: request.output ?? this.options.output,
			database: request.database
		};

		return new Bluebird<UpdateResult>((resolve, reject) => {
			this.updateQueue.push(task, (error?: Error | null, result?: UpdateResult) => {
				if(error)
					reject(error);
				else if(result)
					resolve(result);
				else
					reject(new UsbIdsUpdateError('Update finished without a result'));
			});
		});
	}

	//#endregion

	//#region Queue Processing

	private processQueue = (task: UpdateTask, callback: AsyncResultCallback<UpdateResult>) => {
		this.runUpdate(task).then(
			result => callback(null, result),
			(error: unknown) => callback(error instanceof Error ? error : new UsbIdsUpdateError(String(error)))
		);
	};

	private async runUpdate(task: UpdateTask): Promise<UpdateResult> {
		const source = task.database?.path;
		if(task.database && (source === null || source === undefined || resolve(source) !== resolve(task.output)))
			throw new UsbIdsUpdateError(`Database was loaded from ${source ?? 'a string'}, not ${task.output}`);

		const text = await this.download(task.url);

		/* Validating before anything is written */
		let registry: ParsedRegistry;
		try {
			registry = new UsbIdsParser().parse(text);
		} catch(error){
			throw new UsbIdsUpdateError(`Downloaded registry from ${task.url} does not parse`, { cause: error });
		}

		/* A cut-off download still parses, the partial last line is skipped */
		if(!text.endsWith('\n'))
			throw new UsbIdsUpdateError(`Downloaded registry from ${task.url} is truncated`);

		if(registry.vendors.size === 0)
			throw new UsbIdsUpdateError(`Downloaded registry from ${task.url} has no vendors`);

		if(registry.classes.size === 0)
			throw new UsbIdsUpdateError(`Downloaded registry from ${task.url} has no device classes`);

		const current = await this.currentVendorCount(task.output);
		if(current !== null && registry.vendors.size * 2 < current)
			throw new UsbIdsUpdateError(`Downloaded registry from ${task.url} has ${registry.vendors.size} vendors, fewer than half of the ${current} in ${task.output}`);

		await this.replaceFile(task.output, text);

		if(task.database){
			try {
				await task.database.reload();
			} catch(error){
				throw new UsbIdsUpdateError(`Wrote ${task.output} but could not reload the database`, { cause: error });
			}
		}

		const result: UpdateResult = {
			path: task.output,
			url: task.url,
			version: registry.metadata.version,
			date: registry.metadata.date,
			vendors: registry.vendors.size,
			classes: registry.classes.size,
			bytes: Buffer.byteLength(text, 'utf8')
		};

		debug(`updated ${result.path} to version ${result.version ?? 'unknown'} (${result.bytes} bytes)`);

		this.emit('updated', result);
		this.emit(['db', 'updated'], result);

		return result;
	}

	private async download(url: string): Promise<string> {
		for(let attempt = 1; ; attempt++){
			debug(`downloading ${url} (attempt ${attempt})`);
			this.emit(['download', 'start'], { url, attempt });

			try {
				const response = await this.client.get(url, { responseType: 'text' });

				if(typeof response.data !== 'string')
					throw new UsbIdsUpdateError(`Unexpected response body from ${url}`, { status: response.status });

				this.emit(['download', 'complete'], { url, attempt, bytes: Buffer.byteLength(response.data, 'utf8') });

				return response.data;
			} catch(error){
				if(error instanceof UsbIdsUpdateError) throw error;

				const status = axios.isAxiosError(error) ? error.response?.status : undefined;

				/* No response or a server error may go away, a 4xx will not */
				const transient = status === undefined || status >= 500;

				if(!transient || attempt > this.options.retries)
					throw new UsbIdsUpdateError(`Failed to download ${url}${status === undefined ? '' : `: HTTP ${status}`}`, { cause: error, status });

				const wait = this.options.retryDelayMs * attempt;
				debug(`[!]: download failed (${status ?? 'no response'}), retrying in ${wait}ms`);
				this.emit(['download', 'retry'], { url, attempt, status, wait });

				await Bluebird.delay(wait);
			}
		}
	}

	/* Vendors in the file about to be replaced, null when there is none to compare with */
	private async currentVendorCount(path: string){
		let text: string;
		try {
			text = await readFile(path, 'utf8');
		} catch(error){
			debug(`no current registry at ${path}: ${String(error)}`);
			return null;
		}

		try {
			return new UsbIdsParser().parse(text).vendors.size;
		} catch(error){
			debug(`current registry at ${path} does not parse: ${String(error)}`);
			return null;
		}
	}

	private async replaceFile(path: string, text: string){
		const temp = `${path}.${process.pid}.tmp`;

		await mkdir(dirname(path), { recursive: true });
		await writeFile(temp, text, 'utf8');

		try {
			await rename(temp, path);
		} catch(error){
			await unlink(temp).catch((cleanupError: unknown) => debug(`could not remove ${temp}: ${String(cleanupError)}`));
			throw new UsbIdsUpdateError(`Could not replace ${path}`, { cause: error });
		}
	}

	//#endregion
}
//#endregion
