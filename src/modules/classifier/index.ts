import { WebsiteStatus } from '../../types';

/** Social networks, review aggregators, messaging and link-in-bio services. */
export const SOCIAL_DOMAINS: readonly string[] = [
    'facebook.com',
    'instagram.com',
    'yelp.com',
    'linkedin.com',
    'whatsapp.com',
    'twitter.com',
    'tiktok.com',
    'linktr.ee',
];

export class WebsiteClassifier {

    /**
     * Substring match on the lowercased URL, so subdomains (m.facebook.com)
     * and redirect URLs embedding the domain also count as social.
     */
    static classify(url: string | null | undefined): WebsiteStatus {
        if (!url || !url.trim()) return WebsiteStatus.NONE;

        const lowerUrl = url.toLowerCase();
        if (SOCIAL_DOMAINS.some(d => lowerUrl.includes(d))) return WebsiteStatus.SOCIAL_ONLY;

        return WebsiteStatus.OFFICIAL;
    }
}
