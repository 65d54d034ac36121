/* Small registry in the usb.ids format, covering every section */
export const REGISTRY = [
	'#',
	'#	Test registry',
	'#',
	'# Version: 2023.01.01',
	'# Date:    2023-01-01 00:00:00',
	'',
	'1234  Test Vendor',
	'\t0001  Widget',
	'\t\t00  Widget Control',
	'\t\t01  Widget Data',
	'\t0002  Gadget',
	'\t0001  Widget (duplicate)',
	'abcd  Other Vendor',
	'\tffff  Last Device',
	'',
	'C 03  Human Interface Device',
	'\t01  Boot Interface Subclass',
	'\t\t01  Keyboard',
	'\t\t02  Mouse',
	'C ff  Vendor Specific Class',
	'\tff  Vendor Specific Subclass',
	'\t\tff  Vendor Specific Protocol',
	'',
	'AT 0201  Microphone',
	'HID 21  HID',
	'R 04  Usage Page',
	'BIAS 1  Right Hand',
	'PHY 02  Eye',
	'HUT 01  Generic Desktop Controls',
	'\t002  Mouse',
	'\t1001  Wide Usage',
	'L 0009  English',
	'\t02  UK',
	'HCC 21  US',
	'VT 0201  Camera Sensor',
	''
].join('\n');

/* Strips chalk's color codes from CLI output */
export function stripAnsi(text: string){
	return text.replace(/\u001b\[[0-9;]*m/g, '');
}
