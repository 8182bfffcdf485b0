import { config } from "dotenv";

// .env.local is loaded first so its values win over .env
config({ path: ".env.local" });
config({ path: ".env" });

/**
 * Re-parses .env and .env.local files, updating process.env with new values.
 *
 * Uses `override: true` to force re-reading values, overwriting any existing
 * process.env values. Loads .env first, then .env.local so local overrides
 * take precedence.
 */
export function loadEnvFiles(): void {
	config({ path: ".env", override: true });
	config({ path: ".env.local", override: true });
}
