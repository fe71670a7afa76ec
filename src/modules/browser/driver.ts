/**
 * The browser capability set the harvester depends on.
 * Any automation backend (or an in-memory fake) can stand behind it.
 */

export interface SessionOptions {
    headless: boolean;
    viewport: { width: number; height: number };
    userAgent: string;
    executablePath?: string;
    launchTimeoutMs: number;
    navigationTimeoutMs: number;
}

export interface ElementRef {
    /** Attribute value, or null when the attribute is missing. */
    attribute(name: string): Promise<string | null>;
    click(): Promise<void>;
}

export interface BrowserSession {
    goto(url: string): Promise<void>;
    /** Rejects when nothing matches `selector` within `timeoutMs`. */
    waitForSelector(selector: string, timeoutMs: number): Promise<void>;
    queryAll(selector: string): Promise<ElementRef[]>;
    query(selector: string): Promise<ElementRef | null>;
    scrollToBottom(selector: string): Promise<void>;
    isConnected(): boolean;
    close(): Promise<void>;
}

export interface BrowserDriver {
    open(options: SessionOptions): Promise<BrowserSession>;
}

/**
 * Opens a session, hands it to `work` and closes it on every exit path.
 */
export async function withSession<T>(
    driver: BrowserDriver,
    options: SessionOptions,
    work: (session: BrowserSession) => Promise<T>
): Promise<T> {
    const session = await driver.open(options);
    try {
        return await work(session);
    } finally {
        await session.close();
    }
}
