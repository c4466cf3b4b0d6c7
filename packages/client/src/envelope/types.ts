/**
 * Status tokens understood by the orchestrator
 */
export const WoStatus = {
    ENDED: 'ENDED',
    FAILED: 'FAILED',
    RUNNING: 'RUNNING',
    WARNING: 'WARNING',
    PAUSED: 'PAUSED',
} as const;

export type WoStatus = (typeof WoStatus)[keyof typeof WoStatus];

export const WO_STATUSES = Object.values(WoStatus);

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

/**
 * Result payload read by the orchestrator.
 * Field names are part of the orchestrator contract.
 */
export interface ResponseEnvelope {
    wo_status: WoStatus;
    wo_comment: string;
    wo_newparams: JsonObject;
}
