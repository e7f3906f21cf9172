#!/usr/bin/env node
import { Command } from 'commander';
import path from 'path';
import { loadSettings, Settings } from './config/env';
import { NameCheckEngine, toReport } from './modules/engine';
import { logger } from './modules/observability';
import { createApiSource, RegistrySourceFactory } from './modules/registry';
import { describeError } from './utils/errors';

interface CheckOptions {
    registry?: string;
    api?: boolean;
    pretty?: boolean;
}

const resolveSettings = (options: CheckOptions): Settings => {
    const settings = loadSettings();
    if (options.api) return { ...settings, REGISTRY_MODE: 'api' };
    if (options.registry) return { ...settings, REGISTRY_MODE: 'static', REGISTRY_DATA_PATH: path.resolve(options.registry) };
    return settings;
};

const fail = (e: unknown) => {
    logger.error('Command failed', e);
    console.error('Fatal Error:', describeError(e));
    process.exitCode = 1;
};

const program = new Command();

program
    .name('mca-name-check')
    .description('Check proposed Indian company names against the registry and MCA naming rules')
    .version('1.0.0');

program
    .command('check')
    .description('Check one or more proposed company names')
    .argument('<names...>', 'Proposed company names')
    .option('-r, --registry <path>', 'JSON list of existing companies to check against')
    .option('--api', 'Query the registry API configured in the environment')
    .option('--pretty', 'Indent the JSON output')
    .action(async (names: string[], options: CheckOptions) => {
        try {
            const settings = resolveSettings(options);
            const engine = new NameCheckEngine(RegistrySourceFactory.create(settings), {
                timeoutMs: settings.REGISTRY_TIMEOUT_MS,
                concurrency: settings.SEARCH_CONCURRENCY,
            });

            const results = await engine.checkMany(names);
            const reports = results.map(toReport);
            console.log(JSON.stringify(reports.length === 1 ? reports[0] : reports, null, options.pretty ? 2 : undefined));
        } catch (e) {
            fail(e);
        }
    });

program
    .command('lookup')
    .description('Show the registry profile of a company by CIN')
    .argument('<cin>', 'Corporate Identification Number')
    .action(async (cin: string) => {
        try {
            const profile = await createApiSource(loadSettings()).getCompanyByCin(cin);
            console.log(JSON.stringify(profile, null, 2));
        } catch (e) {
            fail(e);
        }
    });

program.parseAsync(process.argv).catch(fail);
