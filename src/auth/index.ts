export type { ApiKeySet, SignedHeaders, StreamSignature } from "./types.js";
export { Credentials, createCredentials, unwrapCredentials } from "./credentials.js";
export {
	SUBSCRIBE_INSTRUCTION,
	buildSignMessage,
	hmacSha256Hex,
	signRequest,
	signStreamSubscription,
} from "./signature.js";
export type { SignParams } from "./signature.js";
