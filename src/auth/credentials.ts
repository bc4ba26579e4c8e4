/**
 * Opaque credential container. Secrets never leak through toString,
 * JSON.stringify, template literals, or Node.js inspect.
 */

import { inspect } from "node:util";
import { AuthError } from "../shared/errors.js";
import type { ApiKeySet } from "./types.js";

const store = new WeakMap<Credentials, ApiKeySet>();

export class Credentials {
	/** Marker picked up by the logger's redaction. */
	readonly __opaque = true as const;

	private constructor() {}

	/** @internal */
	static seal(keys: ApiKeySet): Credentials {
		const sealed = new Credentials();
		store.set(sealed, { ...keys });
		return sealed;
	}

	toString(): string {
		return "[REDACTED]";
	}

	toJSON(): string {
		return "[REDACTED]";
	}

	[inspect.custom](): string {
		return "[REDACTED]";
	}
}

/**
 * @example
 * const credentials = createCredentials({ apiKey: "test-key", secret: "test-secret" });
 * `${credentials}` // "[REDACTED]"
 * @throws AuthError when either half is empty
 */
export function createCredentials(keys: ApiKeySet): Credentials {
	if (keys.apiKey.trim().length === 0 || keys.secret.trim().length === 0) {
		throw new AuthError("API key and secret must both be non-empty");
	}
	return Credentials.seal(keys);
}

/**
 * The only way back to the raw keys.
 * @throws AuthError for objects not produced by createCredentials
 */
export function unwrapCredentials(credentials: Credentials): ApiKeySet {
	const keys = store.get(credentials);
	if (keys === undefined) {
		throw new AuthError("Invalid credentials object");
	}
	return { ...keys };
}
