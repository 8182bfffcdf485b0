import { createTokenCipher, generateTokenEncryptionKey, isEncryptedToken } from "./server";
import { describe, expect, it } from "vitest";

describe("server exports", () => {
	it("should export the token cipher", () => {
		const cipher = createTokenCipher(generateTokenEncryptionKey());

		expect(isEncryptedToken(cipher.encrypt("test-access-token"))).toBe(true);
	});
});
