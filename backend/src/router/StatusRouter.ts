import type { HealthService } from "../health";
import { getLog } from "../util/Logger";
import express, { type Router } from "express";

const log = getLog(import.meta);

export interface StatusRouterOptions {
	healthService?: HealthService;
}

export function createStatusRouter(options?: StatusRouterOptions): Router {
	const router = express.Router();
	const healthService = options?.healthService;

	router.get("/check", (_req, res) => {
		res.send("OK");
	});

	/**
	 * 200 while every critical check passes, 503 otherwise.
	 */
	router.get("/health", async (_req, res) => {
		if (!healthService) {
			res.json({ status: "healthy", timestamp: new Date().toISOString() });
			return;
		}
		try {
			const result = await healthService.check();
			res.status(result.status === "healthy" ? 200 : 503).json(result);
		} catch (error) {
			log.error(error, "Health check failed unexpectedly");
			res.status(503).json({
				status: "unhealthy",
				timestamp: new Date().toISOString(),
				message: "Health check failed unexpectedly",
			});
		}
	});

	return router;
}
