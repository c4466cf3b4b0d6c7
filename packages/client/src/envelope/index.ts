export { WoStatus, WO_STATUSES } from './types.js';
export type { ResponseEnvelope, JsonObject, JsonValue, JsonPrimitive } from './types.js';
export {
    ResponseEnvelopeSchema,
    WoStatusSchema,
    JsonObjectSchema,
    JsonValueSchema,
} from './schemas.js';
export { encodeEnvelope, decodeEnvelope, buildEnvelope, sanitizeParams } from './envelope.js';
export type { EncodeOptions } from './envelope.js';
