import express from 'express';
import {createResultRoutes} from './routes/resultRoutes.js';
import {outputPaths} from './storage/outputPaths.js';

export function createServer(outputDir: string) {
	const app = express();
	app.use(express.json({limit: '2mb'}));

	app.use(createResultRoutes(outputPaths(outputDir)));

	return app;
}
