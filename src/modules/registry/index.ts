import { Settings } from '../../config/env';
import { ConfigurationError } from '../../utils/errors';
import { logger } from '../observability';
import { RegistryApiSource } from './api-provider';
import { CachedRegistrySource } from './cache';
import { RegistrySource, StaticRegistrySource } from './provider';

export { RegistryApiSource } from './api-provider';
export type { RegistryApiOptions } from './api-provider';
export { CachedRegistrySource } from './cache';
export type { CacheOptions } from './cache';
export { StaticRegistrySource, RegistryRecordSchema, toRegistryEntry, DEFAULT_REGISTRY_PATH } from './provider';
export type { RegistrySource, RegistryRecord } from './provider';

export const createApiSource = (settings: Settings): RegistryApiSource => {
    if (!settings.REGISTRY_API_URL) {
        throw new ConfigurationError('REGISTRY_API_URL is not set');
    }
    return new RegistryApiSource({
        baseUrl: settings.REGISTRY_API_URL,
        apiKey: settings.REGISTRY_API_KEY,
        apiSecret: settings.REGISTRY_API_SECRET,
        timeoutMs: settings.REGISTRY_TIMEOUT_MS,
        retries: settings.REGISTRY_RETRIES,
        retryDelayMs: settings.REGISTRY_RETRY_DELAY_MS,
    });
};

export class RegistrySourceFactory {
    /**
     * Live API behind a cache when REGISTRY_MODE=api, the bundled (or given) JSON list otherwise.
     */
    static create(settings: Settings): RegistrySource {
        if (settings.REGISTRY_MODE === 'api') {
            logger.info('Using registry API', { component: 'registry', url: settings.REGISTRY_API_URL });
            return new CachedRegistrySource(createApiSource(settings), {
                ttlMs: settings.CACHE_TTL_MS,
                maxEntries: settings.CACHE_MAX_ENTRIES,
            });
        }

        const source = settings.REGISTRY_DATA_PATH
            ? StaticRegistrySource.fromFile(settings.REGISTRY_DATA_PATH)
            : StaticRegistrySource.fromFile();
        logger.info('Using static registry', { component: 'registry', entries: source.size });
        return source;
    }
}
