import { createLog } from "./LoggerCommon";
import { createCipheriv, createDecipheriv, randomBytes } from "node:crypto";

const log = createLog(import.meta);

const ALGORITHM = "aes-256-gcm";
const IV_LENGTH = 12; // 96 bits for GCM
const TAG_LENGTH = 16; // 128 bits

/**
 * Envelope prefix of an encrypted credential. The payload is base64(iv | tag | ciphertext).
 */
export const TOKEN_ENVELOPE_PREFIX = "enc:v1:";

/**
 * Stateless credential cipher handed to the components that need a working credential.
 */
export interface TokenCipher {
	encrypt(plaintext: string): string;
	/**
	 * Decrypts an envelope. Values without the envelope prefix predate encryption
	 * and are returned unchanged.
	 */
	decrypt(envelope: string): string;
}

export class CredentialEncryptionError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "CredentialEncryptionError";
	}
}

export function isEncryptedToken(value: string): boolean {
	return value.startsWith(TOKEN_ENVELOPE_PREFIX);
}

/**
 * @param key Base64 encoded 32-byte encryption key
 */
export function createTokenCipher(key: string): TokenCipher {
	const encryptionKey = Buffer.from(key, "base64");
	if (encryptionKey.length !== 32) {
		throw new CredentialEncryptionError("Encryption key must be 32 bytes (256 bits) when decoded from base64");
	}

	return { encrypt, decrypt };

	function encrypt(plaintext: string): string {
		const iv = randomBytes(IV_LENGTH);
		const cipher = createCipheriv(ALGORITHM, encryptionKey, iv, { authTagLength: TAG_LENGTH });
		const ciphertext = Buffer.concat([cipher.update(plaintext, "utf8"), cipher.final()]);
		const payload = Buffer.concat([iv, cipher.getAuthTag(), ciphertext]);
		return `${TOKEN_ENVELOPE_PREFIX}${payload.toString("base64")}`;
	}

	function decrypt(envelope: string): string {
		if (!isEncryptedToken(envelope)) {
			log.warn("Credential is stored unencrypted; it will be encrypted on the next write");
			return envelope;
		}

		const payload = Buffer.from(envelope.slice(TOKEN_ENVELOPE_PREFIX.length), "base64");
		if (payload.length <= IV_LENGTH + TAG_LENGTH) {
			throw new CredentialEncryptionError("Encrypted credential is truncated");
		}
		const iv = payload.subarray(0, IV_LENGTH);
		const tag = payload.subarray(IV_LENGTH, IV_LENGTH + TAG_LENGTH);
		const ciphertext = payload.subarray(IV_LENGTH + TAG_LENGTH);

		try {
			const decipher = createDecipheriv(ALGORITHM, encryptionKey, iv, { authTagLength: TAG_LENGTH });
			decipher.setAuthTag(tag);
			return Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString("utf8");
		} catch (error) {
			throw new CredentialEncryptionError(
				`Failed to decrypt credential: ${error instanceof Error ? error.message : String(error)}`,
			);
		}
	}
}

/**
 * Generate a random key suitable for createTokenCipher. Returns a base64 encoded 32-byte key.
 */
export function generateTokenEncryptionKey(): string {
	return randomBytes(32).toString("base64");
}
