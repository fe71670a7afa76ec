/**
 * 🗺️ MAPS HARVESTER
 * Incremental Google Maps result harvesting.
 *
 * One session per search: open the results feed, click through every card
 * not seen before, read its detail panel, scroll for more, and stop at the
 * limit or when a scroll brings nothing new.
 */

import { Config, SettleConfig } from '../config';
import { BrowserDriver, BrowserSession, ElementRef, SessionOptions, withSession } from '../modules/browser';
import { CardExtractor, MAPS_SELECTORS } from '../modules/extractor';
import { logger, RunMetrics } from '../modules/observability';
import { CardOutcome, Harvester, HarvestResult, HarvestStopReason, RawRecord } from '../types';
import { NavigationError, ValidationError, errorMessage } from '../utils/errors';
import { HarvestAccumulator } from './accumulator';
import { waitForSettled } from './settle';

export interface MapsHarvesterOptions {
    session: SessionOptions;
    baseUrl: string;
    resultsTimeoutMs: number;
    maxScrollPasses: number;
    settle: {
        activation: SettleConfig;
        scroll: SettleConfig;
    };
}

export const harvesterOptionsFromConfig = (config: Config, overrides: { headless?: boolean } = {}): MapsHarvesterOptions => ({
    session: {
        headless: overrides.headless ?? config.browser.headless,
        viewport: config.browser.viewport,
        userAgent: config.browser.user_agent,
        executablePath: config.browser.executable_path || undefined,
        launchTimeoutMs: config.browser.launch_timeout_ms,
        navigationTimeoutMs: config.browser.navigation_timeout_ms,
    },
    baseUrl: config.maps.base_url,
    resultsTimeoutMs: config.maps.results_timeout_ms,
    maxScrollPasses: config.maps.max_scroll_passes,
    settle: config.maps.settle,
});

type LoopEnd = { stop_reason: HarvestStopReason; passes: number };

export class MapsHarvester implements Harvester {

    constructor(
        private readonly driver: BrowserDriver,
        private readonly options: MapsHarvesterOptions,
        private readonly extractor: CardExtractor = new CardExtractor()
    ) {}

    async search(query: string, limit: number): Promise<RawRecord[]> {
        const result = await this.harvest(query, limit);
        return result.records;
    }

    async harvest(query: string, limit: number): Promise<HarvestResult> {
        if (!Number.isInteger(limit) || limit <= 0) {
            throw new ValidationError(`limit must be a positive integer, got ${limit}`);
        }

        const url = `${this.options.baseUrl}${encodeURIComponent(query)}`;
        const accumulator = new HarvestAccumulator(limit);
        const metrics = new RunMetrics();

        logger.log('info', `🗺️ Maps harvest: "${query}" (limit ${limit})`);

        const end = await withSession(this.driver, this.options.session, async (session) => {
            await this.openResults(session, url);
            return this.collect(session, accumulator, metrics);
        });

        const { records, skipped } = accumulator.drain();
        logger.log('info', `🗺️ Harvest finished for "${query}": ${records.length} records`, {
            stop_reason: end.stop_reason,
            passes: end.passes,
            ...metrics.getSummary(),
        });

        return { query, records, skipped, stop_reason: end.stop_reason, passes: end.passes };
    }

    private async openResults(session: BrowserSession, url: string): Promise<void> {
        try {
            await session.goto(url);
            await session.waitForSelector(MAPS_SELECTORS.feed, this.options.resultsTimeoutMs);
        } catch (e) {
            throw new NavigationError(`Results feed did not load: ${errorMessage(e)}`, { url });
        }
    }

    private async collect(session: BrowserSession, acc: HarvestAccumulator, metrics: RunMetrics): Promise<LoopEnd> {
        let passes = 0;

        for (;;) {
            passes++;
            let cards: ElementRef[];
            try {
                cards = await session.queryAll(MAPS_SELECTORS.card);
            } catch (e) {
                logger.log('warn', `Results feed lost after ${acc.size} records: ${errorMessage(e)}`);
                return { stop_reason: 'session-lost', passes };
            }
            if (cards.length === 0) return { stop_reason: 'no-cards', passes };

            const seenBefore = acc.seenCount;
            for (const card of cards) {
                if (acc.isFull) break;
                const started = Date.now();
                const outcome = await this.processCard(session, card, acc);
                metrics.record(outcome, outcome.kind === 'extracted' ? Date.now() - started : undefined);
            }

            if (acc.isFull) return { stop_reason: 'limit-reached', passes };
            // Virtualized feeds keep old nodes, so "nothing new after a scroll" is the end-of-list signal
            if (passes > 1 && acc.seenCount === seenBefore) return { stop_reason: 'exhausted', passes };
            if (passes >= this.options.maxScrollPasses) return { stop_reason: 'max-passes', passes };

            try {
                await session.scrollToBottom(MAPS_SELECTORS.feed);
                await waitForSettled(() => this.renderedCardCount(session), this.options.settle.scroll);
            } catch (e) {
                logger.log('warn', `Scroll failed after ${acc.size} records: ${errorMessage(e)}`);
                return { stop_reason: 'scroll-failed', passes };
            }
        }
    }

    private async processCard(session: BrowserSession, card: ElementRef, acc: HarvestAccumulator): Promise<CardOutcome> {
        let name: string;
        try {
            name = (await card.attribute('aria-label'))?.trim() ?? '';
        } catch (e) {
            return acc.skip(null, 'missing-label', errorMessage(e));
        }
        if (!name) return acc.skip(null, 'missing-label');
        if (!acc.claim(name)) return acc.skip(name, 'duplicate');

        let opened: boolean;
        try {
            await card.click();
            opened = await waitForSettled(
                () => this.detailPanelLabel(session),
                this.options.settle.activation,
                label => label === name
            );
        } catch (e) {
            logger.log('warn', `Could not open ${name}: ${errorMessage(e)}`);
            return acc.skip(name, 'activation-failed', errorMessage(e));
        }
        // Fields are only read once the panel shows the clicked card
        if (!opened) {
            logger.log('warn', `Detail panel never showed ${name}`);
            return acc.skip(name, 'activation-failed', 'Detail panel did not switch to the clicked card');
        }

        try {
            const record = await this.extractor.extract(session, name);
            logger.log('info', `Found: ${record.name} | Rating: ${record.rating} (${record.review_count})`);
            return acc.accept(record);
        } catch (e) {
            logger.log('warn', `Skipping ${name}: ${errorMessage(e)}`);
            return acc.skip(name, 'extraction-failed', errorMessage(e));
        }
    }

    private async detailPanelLabel(session: BrowserSession): Promise<string> {
        const panel = await session.query(MAPS_SELECTORS.detailPanel);
        if (!panel) return '';
        return (await panel.attribute('aria-label'))?.trim() ?? '';
    }

    private async renderedCardCount(session: BrowserSession): Promise<string> {
        const cards = await session.queryAll(MAPS_SELECTORS.card);
        return String(cards.length);
    }
}
