import createDebug from "debug";

const BASE_NAMESPACE = "psgraph";

type Loggable = string | Error;

function formatMessage(value: Loggable): string {
	if (typeof value === "string") return value;
	return value.message;
}

/**
 * Namespaced logger wrapping the `debug` package.
 *
 *   log.debug(fmt, ...args) -- only visible when DEBUG=psgraph:* or DEBUG=psgraph:<ns>
 *   log.info(msg)           -- printed to stderr
 *   log.error(msg | error)  -- printed to stderr, prefixed with "Error:"
 *
 * Library code only uses debug(); info() and error() are for the CLI.
 * Everything goes to stderr so a PostScript program piped to stdout stays clean.
 */
function createLogger(namespace: string) {
	const debug = createDebug(`${BASE_NAMESPACE}:${namespace}`);

	return {
		debug,

		info(message: string) {
			process.stderr.write(`${message}\n`);
		},

		error(value: Loggable) {
			process.stderr.write(`Error: ${formatMessage(value)}\n`);
		},
	};
}

export { createLogger, type Loggable };
