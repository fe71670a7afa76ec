import fs from 'fs';
import os from 'os';
import path from 'path';
import yaml from 'js-yaml';
import { getConfig, loadConfig, parseConfig, resetConfig } from '../src/config';
import { ConfigurationError } from '../src/utils/errors';

const defaultDocument = () =>
    yaml.load(fs.readFileSync(path.join(__dirname, '../src/config/default.yaml'), 'utf8'));

describe('Config Module', () => {
    afterEach(() => resetConfig());

    test('default document holds the harvesting defaults', () => {
        const config = parseConfig(defaultDocument(), {});

        expect(config.maps.results_timeout_ms).toBe(15000);
        expect(config.maps.default_limit).toBe(15);
        expect(config.maps.settle.activation.timeout_ms).toBe(1000);
        expect(config.maps.settle.scroll.timeout_ms).toBe(2000);
        expect(config.browser.viewport).toEqual({ width: 1280, height: 800 });
        expect(config.browser.headless).toBe(true);
        expect(config.export.format).toBe('csv');
    });

    test('environment overrides win', () => {
        const config = parseConfig(defaultDocument(), {
            HEADLESS: 'false',
            CHROME_PATH: '/opt/chrome/chrome',
            LOG_LEVEL: 'debug',
            LEADS_OUTPUT_DIR: '/tmp/leads',
        });

        expect(config.browser.headless).toBe(false);
        expect(config.browser.executable_path).toBe('/opt/chrome/chrome');
        expect(config.logging.level).toBe('debug');
        expect(config.export.output_dir).toBe('/tmp/leads');
    });

    test('rejects an unknown log level from the environment', () => {
        expect(() => parseConfig(defaultDocument(), { LOG_LEVEL: 'verbose' })).toThrow(ConfigurationError);
    });

    test('rejects an invalid document with the offending path', () => {
        const doc = parseConfig(defaultDocument(), {});
        const broken = { ...doc, maps: { ...doc.maps, default_limit: 0 } };

        expect(() => parseConfig(broken, {})).toThrow(/maps\.default_limit/);
    });

    test('loads once and caches', () => {
        const config = loadConfig();

        expect(getConfig()).toBe(config);
        expect(config.maps.default_limit).toBe(15);
    });

    test('a missing file is a ConfigurationError', () => {
        const missing = path.join(os.tmpdir(), 'lead-finder-missing', 'config.yaml');

        expect(() => loadConfig(missing)).toThrow(ConfigurationError);
    });
});
