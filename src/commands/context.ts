/* Libraries */
import type UsbIdDatabase from '../UsbIdDatabase';

/* Where command output goes; the process streams outside of tests */
export interface CliIO {
	print(line: string): void;
	error(line: string): void;
	setExitCode(code: number): void;
}

export type GlobalOptions = {
	database?: string;
	debug?: boolean;
};

export interface CommandContext extends CliIO {
	options: GlobalOptions;
	/* Loaded on first call */
	database(): UsbIdDatabase;
}

/* Exit codes */
export const EXIT_NO_MATCH = 1;
export const EXIT_ERROR = 2;
