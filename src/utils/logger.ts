import consoleStamp from 'console-stamp';

/**
 * Decoder log output. Set `DEBUG_PDU` to see every decoded message,
 * otherwise only warnings and errors are printed.
 */
export const logger = new console.Console(process.stdout, process.stderr);

consoleStamp(logger, {
	format: ':date(yyyy-mm-dd HH:MM:ss.l) :label [sms-pdu]',
	level: process.env.DEBUG_PDU ? 'debug' : 'warn'
});
