/**
 * The registration can never succeed as requested: the phone is blocked or disabled
 * by the provider, belongs to another owner, or the owner cannot take another phone.
 */
export class RegistrationRejectedError extends Error {
	constructor(
		readonly externalId: string,
		readonly reason: string,
	) {
		super(`Registration of ${externalId} rejected: ${reason}`);
		this.name = "RegistrationRejectedError";
	}
}

export class OwnerNotFoundError extends Error {
	constructor(readonly ownerId: number) {
		super(`Messaging account not found: ${ownerId}`);
		this.name = "OwnerNotFoundError";
	}
}
