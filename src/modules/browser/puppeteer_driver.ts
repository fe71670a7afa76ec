/**
 * 🧭 PUPPETEER DRIVER
 * Launches a local Chrome/Chromium through puppeteer-core and exposes it
 * through the BrowserSession capability set. One browser per session.
 */

import puppeteer, { Browser, ElementHandle, Page } from 'puppeteer-core';
import * as fs from 'fs';
import * as os from 'os';

import { BrowserDriver, BrowserSession, ElementRef, SessionOptions } from './driver';
import { SessionError, errorMessage } from '../../utils/errors';
import { logger } from '../observability';

const CHROMIUM_PATHS = [
    '/usr/bin/chromium',
    '/usr/bin/chromium-browser',
    '/usr/bin/google-chrome',
    '/snap/bin/chromium',
];

function getSandboxArgs(): string[] {
    const inDocker = process.env.RUNNING_IN_DOCKER === 'true' || fs.existsSync('/.dockerenv');
    return inDocker ? ['--no-sandbox', '--disable-setuid-sandbox'] : [];
}

export function resolveExecutablePath(configured?: string): string {
    if (configured) return configured;
    if (process.env.CHROME_PATH) return process.env.CHROME_PATH;

    if (os.platform() === 'linux') {
        const found = CHROMIUM_PATHS.find(p => fs.existsSync(p));
        if (found) return found;
    }
    throw new SessionError('No Chrome/Chromium executable found. Set CHROME_PATH or browser.executable_path.');
}

class PuppeteerElement implements ElementRef {
    constructor(private readonly handle: ElementHandle<Element>) {}

    attribute(name: string): Promise<string | null> {
        return this.handle.evaluate((el, attr) => el.getAttribute(attr), name);
    }

    async click(): Promise<void> {
        await this.handle.click();
    }
}

class PuppeteerSession implements BrowserSession {
    private closed = false;

    constructor(private readonly browser: Browser, private readonly page: Page) {}

    async goto(url: string): Promise<void> {
        await this.page.goto(url, { waitUntil: 'domcontentloaded' });
    }

    async waitForSelector(selector: string, timeoutMs: number): Promise<void> {
        await this.page.waitForSelector(selector, { timeout: timeoutMs });
    }

    async queryAll(selector: string): Promise<ElementRef[]> {
        const handles = await this.page.$$(selector);
        return handles.map(handle => new PuppeteerElement(handle));
    }

    async query(selector: string): Promise<ElementRef | null> {
        const handle = await this.page.$(selector);
        return handle ? new PuppeteerElement(handle) : null;
    }

    async scrollToBottom(selector: string): Promise<void> {
        await this.page.$eval(selector, (el) => {
            el.scrollTop = el.scrollHeight;
        });
    }

    isConnected(): boolean {
        return !this.closed && this.browser.connected && !this.page.isClosed();
    }

    async close(): Promise<void> {
        if (this.closed) return;
        this.closed = true;
        try {
            await this.browser.close();
        } catch (e) {
            logger.log('warn', `Browser close failed, killing process: ${errorMessage(e)}`);
            this.forceKill();
        }
    }

    private forceKill(): void {
        const pid = this.browser.process()?.pid;
        if (pid === undefined) return;
        try {
            process.kill(pid, 'SIGKILL');
        } catch (e) {
            logger.log('warn', `Could not kill browser process ${pid}: ${errorMessage(e)}`);
        }
    }
}

export class PuppeteerDriver implements BrowserDriver {
    async open(options: SessionOptions): Promise<BrowserSession> {
        const executablePath = resolveExecutablePath(options.executablePath);

        let browser: Browser;
        try {
            browser = await puppeteer.launch({
                headless: options.headless,
                executablePath,
                timeout: options.launchTimeoutMs,
                protocolTimeout: options.launchTimeoutMs,
                args: [
                    ...getSandboxArgs(),
                    '--disable-dev-shm-usage',
                    '--disable-gpu',
                    '--disable-extensions',
                    `--window-size=${options.viewport.width},${options.viewport.height}`,
                ]
            });
        } catch (e) {
            throw new SessionError(`Browser launch failed: ${errorMessage(e)}`, { executablePath });
        }

        try {
            const page = await browser.newPage();
            await page.setUserAgent(options.userAgent);
            await page.setViewport(options.viewport);
            await page.setExtraHTTPHeaders({ 'Accept-Language': 'en-US,en;q=0.9' });
            page.setDefaultTimeout(options.navigationTimeoutMs);
            page.setDefaultNavigationTimeout(options.navigationTimeoutMs);
            return new PuppeteerSession(browser, page);
        } catch (e) {
            await browser.close();
            throw new SessionError(`Page setup failed: ${errorMessage(e)}`);
        }
    }
}
