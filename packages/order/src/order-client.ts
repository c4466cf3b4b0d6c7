import { z } from 'zod';
import { MsaHttpClient } from '@msa-sdk/client';
import type { JsonObject, MsaHttpClientOptions, MsaResponse } from '@msa-sdk/client';
import { OrderError } from './errors.js';

const API_PATH = '/ordercommand';
const DEFAULT_COMMAND_TIMEOUT_MS = 300_000;

/** CRUD operations an order command can run */
export type OrderCommand = 'CREATE' | 'UPDATE' | 'IMPORT' | 'LIST' | 'READ' | 'DELETE';

/**
 * Where a called command's configuration is applied
 * 0 - not applied, 1 - applied to the database, 2 - applied to the device
 */
export type ApplyMode = 0 | 1 | 2;

// Microservice objects are free-form: any JSON body is accepted
const JsonBodySchema = z.unknown();
const DeploymentSettingsSchema = z.object({
    ConfigProfileByDevice: z.union([z.number().int(), z.string().regex(/^\d+$/)]),
});

/**
 * Order command endpoints of one managed device
 *
 * @example
 * ```typescript
 * const order = new OrderClient('134', { context });
 * const res = await order.commandExecute('CREATE', {
 *     simple_firewall: { '12': { object_id: '12', src_ip: '10.0.0.1' } },
 * });
 * if (res.envelope) return reportFailure(res.envelope.wo_comment, params);
 * ```
 */
export class OrderClient {
    readonly deviceId: string;
    private readonly http: MsaHttpClient;

    constructor(deviceId: string | number, options: MsaHttpClientOptions) {
        this.deviceId = String(deviceId);
        this.http = new MsaHttpClient(options);
    }

    /**
     * Run a microservice command on the device
     */
    commandExecute(
        command: OrderCommand,
        params: JsonObject,
        timeoutMs: number = DEFAULT_COMMAND_TIMEOUT_MS
    ): Promise<MsaResponse> {
        return this.http.post(`${API_PATH}/execute/${this.deviceId}/${command}`, params, {
            timeoutMs,
            action: 'Command execute',
        });
    }

    /**
     * Render the configuration a command would push, without applying it
     */
    commandGenerateConfiguration(command: OrderCommand, params: JsonObject): Promise<MsaResponse> {
        return this.http.post(
            `${API_PATH}/get/configuration/${this.deviceId}/${command}`,
            params,
            { action: 'Command generate configuration' }
        );
    }

    commandSynchronize(timeoutMs: number): Promise<MsaResponse> {
        return this.http.post(`${API_PATH}/synchronize/${this.deviceId}`, undefined, {
            timeoutMs,
            action: 'Command synchronize',
        });
    }

    /**
     * Synchronize only the given microservices from the device
     */
    commandSynchronizeObjects(
        microserviceUris: string[],
        timeoutMs: number
    ): Promise<MsaResponse> {
        return this.http.post(
            `${API_PATH}/microservice/synchronize/${this.deviceId}`,
            { microServiceUris: microserviceUris },
            { timeoutMs, action: 'Command synchronize' }
        );
    }

    commandCall(
        command: OrderCommand,
        mode: ApplyMode,
        params: JsonObject,
        timeoutMs: number = DEFAULT_COMMAND_TIMEOUT_MS
    ): Promise<MsaResponse> {
        return this.http.post(`${API_PATH}/call/${this.deviceId}/${command}/${mode}`, params, {
            timeoutMs,
            action: 'Call command',
        });
    }

    /**
     * Names of the microservices attached to the device
     */
    commandObjectsAll(): Promise<MsaResponse> {
        return this.http.get(`${API_PATH}/objects/${this.deviceId}`, {
            action: 'Get Microservices',
        });
    }

    /**
     * Object ids of a microservice on the device
     * @throws {MsaRuntimeError} when the call fails or the body is not JSON
     */
    async commandObjectsInstances(objectName: string): Promise<unknown> {
        const action = 'Get Microservice Instances';
        const res = await this.http.get(
            `${API_PATH}/objects/${this.deviceId}/${encodeURIComponent(objectName)}`,
            { action }
        );
        return this.parse(res, action, JsonBodySchema);
    }

    /**
     * Parameters of one microservice instance
     * @throws {MsaRuntimeError} when the call fails or the body is not JSON
     */
    async commandObjectsInstancesById(objectName: string, objectId: string): Promise<unknown> {
        const action = 'Get Microservice Object Details';
        const objectPath = `${encodeURIComponent(objectName)}/${encodeURIComponent(objectId)}`;
        const res = await this.http.get(`${API_PATH}/objects/${this.deviceId}/${objectPath}`, {
            action,
        });
        return this.parse(res, action, JsonBodySchema);
    }

    /**
     * Deployment settings (configuration profile) id of the device
     * @throws {MsaRuntimeError} when the call fails or the body has no usable id
     */
    async commandGetDeploymentSettingsId(): Promise<number> {
        const action = 'Get deployment settings ID';
        const res = await this.http.get(`/conf-profile/v1/device/${this.deviceId}`, { action });
        const body = this.parse(res, action, DeploymentSettingsSchema);
        return Number(body.ConfigProfileByDevice);
    }

    private parse<S extends z.ZodTypeAny>(
        res: MsaResponse,
        action: string,
        schema: S
    ): z.output<S> {
        if (res.envelope) {
            throw OrderError.requestFailed(action, res.envelope);
        }

        let body: unknown;
        try {
            body = res.json();
        } catch (error) {
            throw OrderError.invalidResponse(
                action,
                error instanceof Error ? error.message : String(error)
            );
        }

        const result = schema.safeParse(body);
        if (!result.success) {
            throw OrderError.invalidResponse(action, result.error.issues[0]?.message ?? 'invalid');
        }
        return result.data;
    }
}
