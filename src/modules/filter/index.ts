import { BusinessEntity, WebsiteStatus } from '../../types';

export const MIN_RATING = 4.0;
export const MIN_REVIEWS = 15;

const LEAD_STATUSES: ReadonlySet<WebsiteStatus> = new Set([WebsiteStatus.NONE, WebsiteStatus.SOCIAL_ONLY]);

export class OpportunityFilter {

    /** No official site, yet rated and reviewed well enough to be worth a call. */
    static isOpportunity(entity: Pick<BusinessEntity, 'website_status' | 'rating' | 'review_count'>): boolean {
        return LEAD_STATUSES.has(entity.website_status)
            && entity.rating >= MIN_RATING
            && entity.review_count >= MIN_REVIEWS;
    }
}
