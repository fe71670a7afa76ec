import { BrowserDriver, BrowserSession, ElementRef, SessionOptions } from '../../src/modules/browser';
import { MAPS_SELECTORS } from '../../src/modules/extractor';
import { SessionError } from '../../src/utils/errors';

/**
 * In-memory stand-in for a Maps results page. Cards render in batches:
 * the first batch is visible on load, each scroll appends the next one
 * and already rendered cards stay in place.
 */
export type FakeCard = {
    label: string | null;
    ratingLabel?: string;
    website?: string;
    phoneLabel?: string;
    failClick?: boolean;
    failLabel?: boolean;
    brokenFields?: boolean;
    dropsSession?: boolean;
    /** The session closes on the first field lookup. */
    closesOnLookup?: boolean;
    /** How long the detail panel keeps showing the previous card after a click. */
    panelDelayMs?: number;
};

export type FakePageOptions = {
    batches?: FakeCard[][];
    /** Called for every scroll once `batches` is used up. */
    onScroll?: (scrollCount: number) => FakeCard[];
    feedAppears?: boolean;
    failScroll?: boolean;
    /** 1-based index of the card-list query that throws. */
    failCardQueryAt?: number;
};

class FakeElement implements ElementRef {
    constructor(
        private readonly attrs: Record<string, string | undefined>,
        private readonly onClick: () => void = () => undefined,
        private readonly failing = false
    ) {}

    async attribute(name: string): Promise<string | null> {
        if (this.failing) throw new Error(`Node is detached from document`);
        return this.attrs[name] ?? null;
    }

    async click(): Promise<void> {
        this.onClick();
    }
}

export class FakeSession implements BrowserSession {
    readonly visited: string[] = [];
    readonly clicked: string[] = [];
    rendered: FakeCard[];
    scrolls = 0;
    closed = false;
    private active: FakeCard | null = null;
    private shown: FakeCard | null = null;
    private shownFrom = 0;
    private cardQueries = 0;
    private nextBatch = 1;

    constructor(private readonly page: FakePageOptions) {
        this.rendered = [...(page.batches?.[0] ?? [])];
    }

    async goto(url: string): Promise<void> {
        this.visited.push(url);
    }

    async waitForSelector(selector: string, timeoutMs: number): Promise<void> {
        if (this.page.feedAppears === false) {
            throw new Error(`Waiting for selector \`${selector}\` failed: Waiting failed: ${timeoutMs}ms exceeded`);
        }
    }

    async queryAll(selector: string): Promise<ElementRef[]> {
        if (selector !== MAPS_SELECTORS.card) return [];
        this.cardQueries++;
        if (this.cardQueries === this.page.failCardQueryAt) throw new Error('Execution context was destroyed');
        return this.rendered.map(card => new FakeElement(
            { 'aria-label': card.label ?? undefined },
            () => this.activate(card),
            card.failLabel === true
        ));
    }

    async query(selector: string): Promise<ElementRef | null> {
        const card = this.panelCard();
        if (!card) return null;
        if (card.closesOnLookup && selector !== MAPS_SELECTORS.detailPanel) {
            this.closed = true;
            throw new Error('Protocol error: Target closed');
        }
        if (card.brokenFields && selector !== MAPS_SELECTORS.detailPanel) {
            throw new Error('Execution context was destroyed');
        }

        switch (selector) {
            case MAPS_SELECTORS.detailPanel:
                return new FakeElement({ 'aria-label': card.label ?? undefined });
            case MAPS_SELECTORS.rating:
                return card.ratingLabel !== undefined ? new FakeElement({ 'aria-label': card.ratingLabel }) : null;
            case MAPS_SELECTORS.website:
                return card.website !== undefined ? new FakeElement({ href: card.website }) : null;
            case MAPS_SELECTORS.phone:
                return card.phoneLabel !== undefined ? new FakeElement({ 'aria-label': card.phoneLabel }) : null;
            default:
                return null;
        }
    }

    async scrollToBottom(): Promise<void> {
        if (this.page.failScroll) throw new Error('Protocol error: Target closed');
        this.scrolls++;

        const batches = this.page.batches ?? [];
        if (this.nextBatch < batches.length) {
            this.rendered.push(...batches[this.nextBatch]);
            this.nextBatch++;
        } else if (this.page.onScroll) {
            this.rendered.push(...this.page.onScroll(this.scrolls));
        }
    }

    isConnected(): boolean {
        return !this.closed && !(this.active?.dropsSession ?? false);
    }

    async close(): Promise<void> {
        this.closed = true;
    }

    private activate(card: FakeCard): void {
        if (card.failClick) throw new Error('Node is either not visible or not an HTMLElement');
        this.clicked.push(card.label ?? '');
        this.shown = this.panelCard();
        this.active = card;
        this.shownFrom = Date.now() + (card.panelDelayMs ?? 0);
    }

    /** The card whose details the panel currently renders. */
    private panelCard(): FakeCard | null {
        return Date.now() >= this.shownFrom ? this.active : this.shown;
    }
}

export class FakeDriver implements BrowserDriver {
    readonly sessions: FakeSession[] = [];
    readonly openedWith: SessionOptions[] = [];

    constructor(private readonly page: FakePageOptions, private readonly launchFails = false) {}

    async open(options: SessionOptions): Promise<FakeSession> {
        this.openedWith.push(options);
        if (this.launchFails) throw new SessionError('Browser launch failed: spawn ENOENT');
        const session = new FakeSession(this.page);
        this.sessions.push(session);
        return session;
    }

    get lastSession(): FakeSession {
        const session = this.sessions[this.sessions.length - 1];
        if (!session) throw new Error('No session was opened');
        return session;
    }
}

export const card = (name: string, extra: Partial<FakeCard> = {}): FakeCard => ({
    label: name,
    ratingLabel: '4.5 stars 120 Reviews',
    ...extra,
});
