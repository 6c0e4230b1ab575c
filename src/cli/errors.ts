import { PsGraphError } from "../errors/index.ts";
import { createLogger } from "../utils/logger.ts";

const log = createLogger("cli");

type CommandFn<A extends unknown[]> = (...args: A) => Promise<void>;

// Runs a command and reports failures on stderr. Library errors print their
// formatted form; the exit code is set rather than exiting so that pending
// output is flushed.
function wrapCommand<A extends unknown[]>(
	fn: CommandFn<A>,
	opts?: { exitCode?: number },
): (...args: A) => Promise<void> {
	const exitCode = opts?.exitCode ?? 1;
	return async (...args: A) => {
		try {
			await fn(...args);
		} catch (error) {
			if (error instanceof PsGraphError) {
				// format() starts with its own "error:" line
				log.info(error.format());
			} else if (error instanceof Error) {
				log.error(error);
			} else {
				log.error(String(error));
			}
			process.exitCode = exitCode;
		}
	};
}

export { wrapCommand };
