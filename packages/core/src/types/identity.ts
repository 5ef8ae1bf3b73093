/**
 * Resolves callers to account-owning identities and checks their transaction
 * secret. Rate limiting of failed attempts is the provider's concern.
 */
export interface IdentityProvider {
	verifySecret(identity: string, secret: string): Promise<boolean>;
	/** Name shown to the counterparty on the other leg of a transfer. */
	displayName?(identity: string): Promise<string | null>;
}
