import { OwnerNotFoundError, RegistrationRejectedError } from "../registration/RegistrationErrors";
import type { RegistrationSaga } from "../registration/RegistrationSaga";
import { getLog } from "../util/Logger";
import { validationError } from "./RouterUtil";
import express, { type Router } from "express";
import { z } from "zod";

const log = getLog(import.meta);

const RegisterResourceSchema = z.object({
	externalId: z.string().min(1),
	ownerId: z.number().int().positive(),
	pin: z
		.string()
		.regex(/^\d{6}$/, "PIN must be 6 digits")
		.optional(),
});

/**
 * POST / registers a phone number with the provider and returns the outcome,
 * including REGISTRATION_FAILED outcomes the provider reported.
 */
export function createRegistrationRouter(registrationSaga: RegistrationSaga): Router {
	const router = express.Router();

	router.post("/", async (req, res) => {
		const parsed = RegisterResourceSchema.safeParse(req.body);
		if (!parsed.success) {
			res.status(400).json(validationError(parsed.error));
			return;
		}
		try {
			res.json(await registrationSaga.register(parsed.data));
		} catch (error) {
			if (error instanceof OwnerNotFoundError) {
				res.status(404).json({ error: error.message });
				return;
			}
			if (error instanceof RegistrationRejectedError) {
				res.status(422).json({ error: error.message });
				return;
			}
			log.error(error, "Error registering %s", parsed.data.externalId);
			res.status(500).json({ error: "Failed to register phone number" });
		}
	});

	return router;
}
