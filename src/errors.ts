//#region Base Error
export class UsbIdsError extends Error {
	constructor(message: string, options: { cause?: unknown } = {}){
		super(message);

		this.name = new.target.name;

		if(options.cause !== undefined)
			this.cause = options.cause;
	}
}
//#endregion

//#region Parser Errors
export class UsbIdsParseError extends UsbIdsError {
	/* 1-based line number of the offending line */
	public readonly line: number;
	public readonly content: string;

	constructor(message: string, line: number, content: string){
		super(`${message} (line ${line}: ${JSON.stringify(content)})`);

		this.line = line;
		this.content = content;
	}
}
//#endregion

//#region Updater Errors
export class UsbIdsUpdateError extends UsbIdsError {
	/* HTTP status of the failed download, if there was a response */
	public readonly status?: number;

	constructor(message: string, options: { cause?: unknown, status?: number } = {}){
		super(message, { cause: options.cause });

		this.status = options.status;
	}
}
//#endregion
