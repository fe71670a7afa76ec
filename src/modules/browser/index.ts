export { BrowserDriver, BrowserSession, ElementRef, SessionOptions, withSession } from './driver';
export { PuppeteerDriver, resolveExecutablePath } from './puppeteer_driver';
