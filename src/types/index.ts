export enum WebsiteStatus {
    OFFICIAL = 'OFFICIAL',
    SOCIAL_ONLY = 'SOCIAL_ONLY',
    NONE = 'NONE',
}

/**
 * One result card as read from the Maps detail panel.
 * Fields that could not be read keep their defaults (0, 0, null, null).
 */
export type RawRecord = {
    name: string; // Accessible label of the card, also the dedup key
    rating: number;
    review_count: number;
    url: string | null;
    phone: string | null;
};

export type BusinessEntity = Readonly<{
    name: string;
    category: string;
    location: string;
    rating: number;
    review_count: number;
    url: string | null;
    phone: string | null;
    website_status: WebsiteStatus;
    performance_score: number;
}>;

export type SkipReason =
    | 'missing-label'
    | 'duplicate'
    | 'activation-failed'
    | 'extraction-failed';

export type CardOutcome =
    | { kind: 'extracted'; record: RawRecord }
    | { kind: 'skipped'; name: string | null; reason: SkipReason; detail?: string };

export type SkippedCard = Extract<CardOutcome, { kind: 'skipped' }>;

export type HarvestStopReason =
    | 'limit-reached'
    | 'no-cards'
    | 'exhausted'
    | 'max-passes'
    | 'scroll-failed'
    | 'session-lost';

export type HarvestResult = {
    query: string;
    records: RawRecord[];
    skipped: SkippedCard[];
    stop_reason: HarvestStopReason;
    passes: number;
};

export type HuntRequest = {
    category: string;
    location: string;
};

export interface Harvester {
    search(query: string, limit: number): Promise<RawRecord[]>;
    harvest(query: string, limit: number): Promise<HarvestResult>;
}

export interface ReportSink {
    deliver(leads: readonly BusinessEntity[], request: HuntRequest): Promise<string>;
}
