export const DOCUMENT_STORE = Symbol("DOCUMENT_STORE");
export const PUSH_SENDER = Symbol("PUSH_SENDER");
export const IDENTITY_VERIFIER = Symbol("IDENTITY_VERIFIER");
export const SERVICE_ENV = Symbol("SERVICE_ENV");
export const SUBMIT_IDEMPOTENCY = Symbol("SUBMIT_IDEMPOTENCY");
