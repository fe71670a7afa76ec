#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from 'commander';
import { z } from 'zod';
import { loadConfig } from './config';
import { logger } from './modules/observability';
import { createOrchestrator } from './pipeline';
import { errorMessage } from './utils/errors';

const HuntOptionsSchema = z.object({
    category: z.string(),
    location: z.string(),
    limit: z.number().int().positive().optional(),
    format: z.enum(['csv', 'json']).optional(),
    outDir: z.string().optional(),
    config: z.string().optional(),
    headful: z.boolean().optional(),
});

const parsePositiveInt = (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed <= 0) {
        throw new InvalidArgumentError('Must be a positive integer.');
    }
    return parsed;
};

const program = new Command();

program
    .name('lead-finder')
    .description('Find well-reviewed local businesses that have no website of their own')
    .version('1.0.0');

program
    .command('hunt')
    .description('Search Google Maps for a category in a location and export opportunity leads')
    .requiredOption('-c, --category <category>', 'Business category, e.g. "Italian Restaurants"')
    .requiredOption('-l, --location <location>', 'Location, e.g. "Vadodara, IN"')
    .option('-n, --limit <count>', 'Maximum businesses to inspect', parsePositiveInt)
    .addOption(new Option('-f, --format <format>', 'Export format').choices(['csv', 'json']))
    .option('-o, --out-dir <path>', 'Directory for the export file')
    .option('--config <path>', 'Path to custom config YAML')
    .option('--headful', 'Show the browser window')
    .action(async (rawOptions: unknown) => {
        try {
            const options = HuntOptionsSchema.parse(rawOptions);
            const config = loadConfig(options.config);
            logger.configure(config.logging);

            const orchestrator = createOrchestrator(config, {
                limit: options.limit,
                headless: options.headful ? false : undefined,
                format: options.format,
                outputDir: options.outDir,
            });
            const leads = await orchestrator.run(options.category, options.location);

            console.log(`Done. ${leads.length} opportunity leads.`);
        } catch (e) {
            console.error('Fatal Error:', errorMessage(e));
            process.exit(1);
        }
    });

void program.parseAsync(process.argv);
