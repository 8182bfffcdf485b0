import {
	CredentialEncryptionError,
	createTokenCipher,
	generateTokenEncryptionKey,
	isEncryptedToken,
	TOKEN_ENVELOPE_PREFIX,
} from "./TokenCipher";
import { describe, expect, it } from "vitest";

describe("TokenCipher", () => {
	const cipher = createTokenCipher(generateTokenEncryptionKey());

	it("should decrypt what it encrypted", () => {
		const envelope = cipher.encrypt("test-access-token");

		expect(envelope.startsWith(TOKEN_ENVELOPE_PREFIX)).toBe(true);
		expect(cipher.decrypt(envelope)).toBe("test-access-token");
	});

	it("should produce a different envelope for each encryption", () => {
		expect(cipher.encrypt("same")).not.toBe(cipher.encrypt("same"));
	});

	it("should return legacy plaintext unchanged", () => {
		expect(cipher.decrypt("legacy-plain-token")).toBe("legacy-plain-token");
	});

	it("should reject an envelope encrypted with another key", () => {
		const other = createTokenCipher(generateTokenEncryptionKey());

		expect(() => cipher.decrypt(other.encrypt("test-access-token"))).toThrow(CredentialEncryptionError);
	});

	it("should reject a tampered envelope", () => {
		const envelope = cipher.encrypt("test-access-token");
		const payload = Buffer.from(envelope.slice(TOKEN_ENVELOPE_PREFIX.length), "base64");
		payload[payload.length - 1] ^= 0xff;

		expect(() => cipher.decrypt(`${TOKEN_ENVELOPE_PREFIX}${payload.toString("base64")}`)).toThrow(
			/^Failed to decrypt credential/,
		);
	});

	it("should reject a truncated envelope", () => {
		expect(() => cipher.decrypt(`${TOKEN_ENVELOPE_PREFIX}AAAA`)).toThrow("Encrypted credential is truncated");
	});

	it("should reject a key of the wrong length", () => {
		expect(() => createTokenCipher(Buffer.from("tooshort").toString("base64"))).toThrow(
			"Encryption key must be 32 bytes (256 bits) when decoded from base64",
		);
	});

	it("should recognize envelopes", () => {
		expect(isEncryptedToken(cipher.encrypt("x"))).toBe(true);
		expect(isEncryptedToken("plain")).toBe(false);
	});
});
