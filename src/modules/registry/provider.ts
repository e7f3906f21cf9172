import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { RegistryEntry } from '../../types';
import { ConfigurationError, describeError } from '../../utils/errors';

/**
 * The single seam between the engine and wherever existing company names come from.
 * Implementations may return an empty list; they signal outages by rejecting.
 */
export interface RegistrySource {
    readonly name: string;
    fetchCandidates(query: string): Promise<RegistryEntry[]>;
}

// Record shape shared by the JSON fixture and the company-search API
export const RegistryRecordSchema = z.object({
    company_name: z.string().min(1),
    cin: z.string().min(1),
    status: z.string().optional(),
    date_of_incorporation: z.string().optional(),
});

export type RegistryRecord = z.infer<typeof RegistryRecordSchema>;

export const toRegistryEntry = (record: RegistryRecord, source: string): RegistryEntry => ({
    displayName: record.company_name,
    identifier: record.cin,
    status: record.status,
    incorporatedOn: record.date_of_incorporation,
    source,
});

export const DEFAULT_REGISTRY_PATH = path.join(__dirname, '../../../data/registry.json');

/**
 * In-process registry backed by a fixed list, e.g. a JSON export or a test fixture.
 */
export class StaticRegistrySource implements RegistrySource {
    name = 'StaticRegistry';

    constructor(private readonly entries: readonly RegistryEntry[]) { }

    static fromFile(filePath: string = DEFAULT_REGISTRY_PATH): StaticRegistrySource {
        let raw: unknown;
        try {
            raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
        } catch (e) {
            throw new ConfigurationError(`Cannot read registry file ${filePath}: ${describeError(e)}`);
        }

        const parsed = z.array(RegistryRecordSchema).safeParse(raw);
        if (!parsed.success) {
            throw new ConfigurationError(`Registry file ${filePath} is malformed: ${parsed.error.issues[0]?.message}`);
        }
        return new StaticRegistrySource(parsed.data.map((r) => toRegistryEntry(r, 'static')));
    }

    get size(): number {
        return this.entries.length;
    }

    /**
     * Every entry, in file order. Scoring decides what is close enough, so nothing is prefiltered here.
     */
    async fetchCandidates(_query: string): Promise<RegistryEntry[]> {
        return [...this.entries];
    }
}
