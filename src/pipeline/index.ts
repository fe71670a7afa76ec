import { z } from 'zod';
import { Config, ExportFormat } from '../config';
import { MapsHarvester, harvesterOptionsFromConfig } from '../hunter';
import { PuppeteerDriver } from '../modules/browser';
import { WebsiteClassifier } from '../modules/classifier';
import { FileReportSink } from '../modules/exporter';
import { OpportunityFilter } from '../modules/filter';
import { logger } from '../modules/observability';
import { PerformanceScorer } from '../modules/scorer';
import { BusinessEntity, Harvester, HuntRequest, RawRecord, ReportSink } from '../types';
import { HarvestError, ValidationError } from '../utils/errors';

const HuntRequestSchema = z.object({
    category: z.string().trim().min(1, 'category is required'),
    location: z.string().trim().min(1, 'location is required'),
});

export function toBusinessEntity(record: RawRecord, request: HuntRequest): BusinessEntity {
    return Object.freeze({
        name: record.name,
        category: request.category,
        location: request.location,
        rating: record.rating,
        review_count: record.review_count,
        url: record.url,
        phone: record.phone,
        website_status: WebsiteClassifier.classify(record.url),
        performance_score: PerformanceScorer.score(record.rating, record.review_count),
    });
}

/**
 * Classifies, scores and filters raw records; best score first.
 * Array.prototype.sort is stable, so ties keep discovery order.
 */
export function rankOpportunities(records: readonly RawRecord[], request: HuntRequest): BusinessEntity[] {
    return records
        .map(record => toBusinessEntity(record, request))
        .filter(entity => OpportunityFilter.isOpportunity(entity))
        .sort((a, b) => b.performance_score - a.performance_score);
}

export class DiscoveryOrchestrator {

    constructor(
        private readonly harvester: Harvester,
        private readonly sink: ReportSink | null,
        private readonly options: { limit: number }
    ) {}

    async run(category: string, location: string): Promise<BusinessEntity[]> {
        const parsed = HuntRequestSchema.safeParse({ category, location });
        if (!parsed.success) {
            throw new ValidationError(parsed.error.issues.map(issue => issue.message).join('; '));
        }
        const request: HuntRequest = parsed.data;
        const query = `${request.category} in ${request.location}`;
        logger.log('info', `Starting lead hunt for: ${query}`);

        let records: RawRecord[];
        try {
            records = await this.harvester.search(query, this.options.limit);
        } catch (e) {
            if (!(e instanceof HarvestError)) throw e;
            logger.log('warn', `Harvest aborted for "${query}": ${e.message}`, { code: e.code, ...e.context });
            records = [];
        }

        const leads = rankOpportunities(records, request);
        logger.log('info', `${leads.length} of ${records.length} businesses qualify as leads`);

        if (leads.length === 0) {
            logger.log('info', 'No leads found matching criteria.');
        } else if (this.sink) {
            await this.sink.deliver(leads, request);
        }
        return leads;
    }
}

export interface HuntOverrides {
    limit?: number;
    headless?: boolean;
    format?: ExportFormat;
    outputDir?: string;
}

/** Wires the puppeteer-backed harvester and the file sink from configuration. */
export function createOrchestrator(config: Config, overrides: HuntOverrides = {}): DiscoveryOrchestrator {
    const harvester = new MapsHarvester(
        new PuppeteerDriver(),
        harvesterOptionsFromConfig(config, { headless: overrides.headless })
    );
    const sink = new FileReportSink({
        outputDir: overrides.outputDir ?? config.export.output_dir,
        format: overrides.format ?? config.export.format,
        previewRows: config.export.preview_rows,
    });
    return new DiscoveryOrchestrator(harvester, sink, { limit: overrides.limit ?? config.maps.default_limit });
}
