import express, { type Express, type NextFunction, type Request, type Response } from "express";
import type winston from "winston";

import { toSafeErrorResponse } from "../lib/errors";
import type { TemperatureMetrics } from "../metrics";
import type { SnapshotStore } from "../state/snapshot";
import { renderLandingPage } from "./landing";

export interface AppOptions {
	metrics: TemperatureMetrics;
	store: SnapshotStore;
	logger: winston.Logger;
	telemetryPath: string;
	jsonPath: string;
}

export function createApp(opts: AppOptions): Express {
	const { metrics, store, logger, telemetryPath, jsonPath } = opts;
	const app = express();

	app.disable("x-powered-by");

	const landingPage = renderLandingPage({ telemetryPath, jsonPath });

	app.get("/", (_req: Request, res: Response) => {
		res.type("html").send(landingPage);
	});

	app.get(telemetryPath, async (_req: Request, res: Response, next: NextFunction) => {
		try {
			const body = await metrics.render();
			// end() keeps prom-client's content type; send() would insert a charset
			res.set("Content-Type", metrics.contentType);
			res.end(body);
		} catch (err) {
			next(err);
		}
	});

	app.get(jsonPath, (_req: Request, res: Response) => {
		// One read of the published reference; later passes do not affect this response
		res.json(store.toJSON());
	});

	app.use((req: Request, res: Response) => {
		logger.debug("Not found", { method: req.method, url: req.url });
		res.status(404).json({ error: { code: "NOT_FOUND", message: "Not found" } });
	});

	app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
		logger.error("Unhandled request error", { method: req.method, url: req.url, error: err.message, stack: err.stack });
		const { status, body } = toSafeErrorResponse(err);
		res.status(status).json(body);
	});

	return app;
}
