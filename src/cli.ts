import { createBot } from "./bot.js";
import { type Logger, createLogger } from "./lib/logger/index.js";
import { type BotConfig, apiKeysFromEnv, loadConfig } from "./shared/config.js";
import { classifyError } from "./shared/errors.js";

export interface CliOptions {
	readonly env?: NodeJS.ProcessEnv;
	/** Log sink; stdout when absent. */
	readonly destination?: { write(msg: string): void };
}

/**
 * Load the configuration, start the bot and stop it on SIGINT or SIGTERM.
 *
 * Resolves to the exit code once startup has finished. A startup failure is
 * logged as "Startup failed" with its error code and resolves to 1.
 */
export async function runCli(options: CliOptions = {}): Promise<number> {
	const env = options.env ?? process.env;
	// configuration errors are reported before the configured level is known
	let logger = createLogger({ level: "info", name: "bandgrid", destination: options.destination });
	try {
		const config = loadConfig({}, env);
		logger = createLogger({ level: config.logLevel, name: "bandgrid", destination: options.destination });
		await run(config, env, logger);
		return 0;
	} catch (error) {
		const failure = classifyError(error);
		logger.error({ code: failure.code, err: failure.message }, "Startup failed");
		return 1;
	}
}

async function run(config: BotConfig, env: NodeJS.ProcessEnv, logger: Logger): Promise<void> {
	const keys = apiKeysFromEnv(env);
	if (keys === null) {
		logger.warn("No API keys in the environment, signed requests will fail");
	}

	const bot = createBot(config, keys, { logger });
	if (!bot.ok) throw bot.error;
	const { scheduler } = bot.value;

	let stopping = false;
	const shutdown = (signal: NodeJS.Signals): void => {
		if (stopping) return;
		stopping = true;
		logger.info({ signal }, "Shutting down");
		void scheduler.stop().then(
			() => logger.info("Shutdown complete"),
			(error: unknown) => {
				logger.error({ err: error instanceof Error ? error.message : String(error) }, "Shutdown failed");
				process.exitCode = 1;
			},
		);
	};
	process.once("SIGINT", shutdown);
	process.once("SIGTERM", shutdown);

	try {
		await scheduler.start();
	} catch (error) {
		await scheduler.stop();
		throw error;
	}
	logger.info({ symbol: config.symbol, account: keys !== null }, "Bandgrid running");
}
