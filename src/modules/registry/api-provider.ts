import axios, { AxiosInstance, AxiosRequestConfig } from 'axios';
import * as rax from 'retry-axios';
import { z } from 'zod';
import { CompanyProfile, RegistryEntry } from '../../types';
import { DataSourceUnavailableError, describeError } from '../../utils/errors';
import { logger } from '../observability';
import { RegistryRecordSchema, RegistrySource, toRegistryEntry } from './provider';

export interface RegistryApiOptions {
    baseUrl: string;
    apiKey?: string;
    apiSecret?: string;
    timeoutMs: number;
    retries: number;
    retryDelayMs: number;
    // Lets tests answer requests in-process
    adapter?: AxiosRequestConfig['adapter'];
}

const SearchResponseSchema = z.union([
    z.array(RegistryRecordSchema),
    z.object({ data: z.array(RegistryRecordSchema) }),
]);

const ProfileSchema = RegistryRecordSchema.passthrough();
const WrappedProfileSchema = z.object({ data: ProfileSchema });

const log = logger.child('registry-api');

/**
 * Company-search API client. Transient failures (429/5xx, dropped connections) are
 * retried by retry-axios; whatever still fails surfaces as DataSourceUnavailableError.
 */
export class RegistryApiSource implements RegistrySource {
    name = 'RegistryApi';
    private client: AxiosInstance;

    constructor(options: RegistryApiOptions) {
        const headers: Record<string, string> = { 'Content-Type': 'application/json' };
        if (options.apiKey) headers['x-api-key'] = options.apiKey;
        if (options.apiSecret) headers['x-api-secret-key'] = options.apiSecret;

        this.client = axios.create({
            baseURL: options.baseUrl,
            timeout: options.timeoutMs,
            headers,
            adapter: options.adapter,
        });

        this.client.defaults.raxConfig = {
            instance: this.client,
            retry: options.retries,
            noResponseRetries: options.retries,
            retryDelay: options.retryDelayMs,
            httpMethodsToRetry: ['GET'],
            statusCodesToRetry: [[429, 429], [500, 599]],
            backoffType: 'static',
            onRetryAttempt: (err) => {
                const cfg = rax.getConfig(err);
                log.warn('Retrying registry request', { attempt: cfg?.currentRetryAttempt, url: err.config?.url });
            },
        };
        rax.attach(this.client);
    }

    async fetchCandidates(query: string): Promise<RegistryEntry[]> {
        const body = await this.get('/company/search', { name: query });
        const parsed = SearchResponseSchema.safeParse(body);
        if (!parsed.success) {
            throw new DataSourceUnavailableError('Registry search returned an unexpected payload', { query });
        }

        const records = Array.isArray(parsed.data) ? parsed.data : parsed.data.data;
        return records.map((r) => toRegistryEntry(r, this.name));
    }

    async getCompanyByCin(cin: string): Promise<CompanyProfile> {
        const body = await this.get('/company/profile', { CIN: cin });
        const wrapped = WrappedProfileSchema.safeParse(body);
        const parsed = wrapped.success ? ProfileSchema.safeParse(wrapped.data.data) : ProfileSchema.safeParse(body);
        if (!parsed.success) {
            throw new DataSourceUnavailableError('Registry profile returned an unexpected payload', { cin });
        }

        return { entry: toRegistryEntry(parsed.data, this.name), raw: parsed.data };
    }

    private async get(url: string, params: Record<string, string>): Promise<unknown> {
        try {
            const response = await this.client.get<unknown>(url, { params });
            return response.data;
        } catch (error) {
            const status = axios.isAxiosError(error) ? error.response?.status : undefined;
            throw new DataSourceUnavailableError(
                status ? `Registry API returned status ${status}` : `Registry API request failed: ${describeError(error)}`,
                { url, status },
            );
        }
    }
}
