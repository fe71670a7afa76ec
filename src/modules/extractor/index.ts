import { BrowserSession } from '../browser';
import { RawRecord } from '../../types';
import { ExtractionError, errorMessage } from '../../utils/errors';
import { logger } from '../observability';

/**
 * Maps DOM hooks. Class names in Maps are obfuscated, so only ARIA roles,
 * labels and data-item-id attributes are used.
 */
export const MAPS_SELECTORS = {
    feed: 'div[role="feed"]',
    card: 'div[role="article"]',
    detailPanel: 'div[role="main"]',
    rating: 'span[role="img"][aria-label*="stars"]',
    website: 'a[data-item-id="authority"]',
    phone: 'button[data-item-id*="phone:tel:"]',
} as const;

// e.g. "4.5 stars 1,204 Reviews"
const RATING_LABEL = /(?<![\d.])(\d+(?:\.\d+)?)\s+stars\s+([\d,]+)\s+Reviews/i;

export type RatingSummary = { rating: number; review_count: number };

const NO_RATING: RatingSummary = { rating: 0, review_count: 0 };

export function parseRatingLabel(label: string | null): RatingSummary {
    if (!label) return NO_RATING;

    const match = label.match(RATING_LABEL);
    if (!match) return NO_RATING;

    const rating = parseFloat(match[1]);
    const reviewCount = parseInt(match[2].replace(/,/g, ''), 10);
    if (!Number.isFinite(rating) || rating < 0 || rating > 5 || !Number.isFinite(reviewCount)) {
        return NO_RATING;
    }
    return { rating, review_count: reviewCount };
}

export function cleanPhoneLabel(label: string | null): string | null {
    if (!label) return null;
    const phone = label.replace(/^Phone:\s*/, '').trim();
    return phone || null;
}

export class CardExtractor {

    /**
     * Reads the detail panel of the card that was just activated.
     * Missing or unreadable fields fall back to their defaults; only a lost
     * session fails the whole card.
     */
    async extract(session: BrowserSession, name: string): Promise<RawRecord> {
        if (!session.isConnected()) {
            throw new ExtractionError('Browser session is no longer connected', { name });
        }

        const { rating, review_count } = await this.readField(session, name, 'rating', NO_RATING, async () => {
            const el = await session.query(MAPS_SELECTORS.rating);
            return parseRatingLabel(el ? await el.attribute('aria-label') : null);
        });

        const url = await this.readField(session, name, 'website', null, async () => {
            const el = await session.query(MAPS_SELECTORS.website);
            const href = el ? await el.attribute('href') : null;
            return href?.trim() || null;
        });

        const phone = await this.readField(session, name, 'phone', null, async () => {
            const el = await session.query(MAPS_SELECTORS.phone);
            return cleanPhoneLabel(el ? await el.attribute('aria-label') : null);
        });

        return { name, rating, review_count, url, phone };
    }

    private async readField<T>(
        session: BrowserSession,
        name: string,
        field: string,
        fallback: T,
        read: () => Promise<T>
    ): Promise<T> {
        try {
            return await read();
        } catch (e) {
            if (!session.isConnected()) {
                throw new ExtractionError(`Browser session lost while reading ${field}`, { name, cause: errorMessage(e) });
            }
            logger.log('debug', `Field "${field}" unreadable for ${name}: ${errorMessage(e)}`);
            return fallback;
        }
    }
}
