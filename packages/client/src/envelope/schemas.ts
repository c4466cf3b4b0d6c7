import { z } from 'zod';
import { WoStatus } from './types.js';
import type { JsonValue } from './types.js';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
    z.union([
        z.string(),
        z.number(),
        z.boolean(),
        z.null(),
        z.array(JsonValueSchema),
        z.record(JsonValueSchema),
    ])
);

export const JsonObjectSchema = z.record(JsonValueSchema);

export const WoStatusSchema = z.enum([
    WoStatus.ENDED,
    WoStatus.FAILED,
    WoStatus.RUNNING,
    WoStatus.WARNING,
    WoStatus.PAUSED,
]);

export const ResponseEnvelopeSchema = z
    .object({
        wo_status: WoStatusSchema,
        wo_comment: z.string(),
        wo_newparams: JsonObjectSchema,
    })
    .strict();
