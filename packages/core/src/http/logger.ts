/**
 * HttpLogger - where log entries and diagnostics are printed
 *
 * Printing is separate from broadcasting: every HttpLog entry goes to the
 * client's logs() channel regardless of which logger is installed.
 */
import { formatHttpLog, type HttpLog } from "./http-log.js"

const PREFIX = "[streamwire]"

export interface HttpLogger {
	log(entry: HttpLog): void
	debug(message: string): void
	warn(message: string, cause?: unknown): void
}

export class ConsoleHttpLogger implements HttpLogger {
	log(entry: HttpLog): void {
		const text = formatHttpLog(entry)
		if (entry._tag === "Success") {
			console.info(text)
		} else {
			console.error(text)
		}
	}

	debug(message: string): void {
		console.debug(`${PREFIX} ${message}`)
	}

	warn(message: string, cause?: unknown): void {
		if (cause === undefined) {
			console.warn(`${PREFIX} ${message}`)
		} else {
			console.warn(`${PREFIX} ${message}`, cause)
		}
	}
}

export class SilentHttpLogger implements HttpLogger {
	log(_entry: HttpLog): void {}
	debug(_message: string): void {}
	warn(_message: string, _cause?: unknown): void {}
}
