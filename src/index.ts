#!/usr/bin/env node
import {v4 as uuidv4} from 'uuid';
import {env} from './config/env.js';
import {logger} from './config/logger.js';
import {createServer} from './server.js';
import {pipelineConfigFromEnv, runAccessibilityPipeline} from './services/accessibilityPipeline.js';
import {isFatalError} from './types/errors.js';
import type {Server} from 'http';

const USAGE = 'Usage: prep-transit-access <run [--refresh] | serve>';

let server: Server | null = null;

function shutdown(signal: string) {
	logger.info({signal}, 'Shutting down');
	if (server) {
		server.close(() => process.exit(0));
		return;
	}
	process.exit(0);
}

async function run(args: string[]) {
	const refresh = args.includes('--refresh');
	const result = await runAccessibilityPipeline(pipelineConfigFromEnv(env, refresh));
	logger.info({runId: result.runId, outputDir: env.outputDir, unavailable: result.unavailableCount}, 'Outputs written');
}

function serve() {
	process.on('SIGINT', () => shutdown('SIGINT'));
	process.on('SIGTERM', () => shutdown('SIGTERM'));

	const app = createServer(env.outputDir);
	server = app.listen(env.port, () => {
		logger.info({port: env.port, outputDir: env.outputDir}, 'Server listening');
	});
}

async function main() {
	const [command = 'run', ...args] = process.argv.slice(2);
	switch (command) {
		case 'run':
			await run(args);
			return;
		case 'serve':
			serve();
			return;
		default:
			logger.error({command}, USAGE);
			process.exitCode = 2;
	}
}

main().catch((error: unknown) => {
	const errorId = uuidv4();
	if (isFatalError(error)) {
		logger.error({err: error, errorId, kind: error.name}, error.message);
	} else {
		logger.error({err: error, errorId}, 'Run failed');
	}
	process.exitCode = 1;
});
