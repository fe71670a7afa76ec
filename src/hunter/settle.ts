import { SettleConfig } from '../config';

export const delay = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Polls `probe` until it returns the same accepted value for `quiet_ms`, or
 * until `timeout_ms` has passed. Hitting the ceiling is not an error: the
 * caller decides whether unsettled content is usable.
 *
 * Always polls at least once. Returns true when an accepted value settled
 * before the ceiling.
 */
export async function waitForSettled(
    probe: () => Promise<string>,
    options: SettleConfig,
    accept: (value: string) => boolean = () => true
): Promise<boolean> {
    const started = Date.now();
    let last = await probe();
    let stableSince = started;

    for (;;) {
        await delay(options.poll_ms);

        const current = await probe();
        const now = Date.now();
        if (current !== last) {
            last = current;
            stableSince = now;
        } else if (accept(current) && now - stableSince >= options.quiet_ms) {
            return true;
        }

        if (now - started >= options.timeout_ms) return false;
    }
}
