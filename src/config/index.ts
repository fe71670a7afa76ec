import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError, errorMessage } from '../utils/errors';

dotenv.config();

const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

const SettleSchema = z.object({
    quiet_ms: z.number().int().nonnegative(),
    poll_ms: z.number().int().nonnegative(),
    timeout_ms: z.number().int().nonnegative(),
});

const ConfigSchema = z.object({
    browser: z.object({
        headless: z.boolean(),
        executable_path: z.string().default(''),
        viewport: z.object({
            width: z.number().int().positive(),
            height: z.number().int().positive(),
        }),
        user_agent: z.string().min(1),
        launch_timeout_ms: z.number().int().positive(),
        navigation_timeout_ms: z.number().int().positive(),
    }),
    maps: z.object({
        base_url: z.string().url(),
        results_timeout_ms: z.number().int().positive(),
        default_limit: z.number().int().positive(),
        max_scroll_passes: z.number().int().positive(),
        settle: z.object({
            activation: SettleSchema,
            scroll: SettleSchema,
        }),
    }),
    export: z.object({
        output_dir: z.string().min(1),
        format: z.enum(['csv', 'json']),
        preview_rows: z.number().int().nonnegative(),
    }),
    logging: z.object({
        level: LogLevelSchema,
        dir: z.string().min(1),
    }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SettleConfig = z.infer<typeof SettleSchema>;
export type ExportFormat = Config['export']['format'];

let configInstance: Config | null = null;

const DEFAULT_CONFIG_PATH = path.join(__dirname, '../../src/config/default.yaml');

/**
 * Environment wins over the YAML document for the few settings an operator
 * flips per run.
 */
const withEnvOverrides = (config: Config, env: NodeJS.ProcessEnv): Config => {
    let level = config.logging.level;
    if (env.LOG_LEVEL) {
        const parsedLevel = LogLevelSchema.safeParse(env.LOG_LEVEL);
        if (!parsedLevel.success) {
            throw new ConfigurationError(`Invalid LOG_LEVEL "${env.LOG_LEVEL}"`);
        }
        level = parsedLevel.data;
    }

    return {
        ...config,
        browser: {
            ...config.browser,
            headless: env.HEADLESS !== undefined ? env.HEADLESS !== 'false' : config.browser.headless,
            executable_path: env.CHROME_PATH || config.browser.executable_path,
        },
        export: {
            ...config.export,
            output_dir: env.LEADS_OUTPUT_DIR || config.export.output_dir,
        },
        logging: { ...config.logging, level },
    };
};

export const parseConfig = (raw: unknown, env: NodeJS.ProcessEnv = process.env): Config => {
    const parsed = ConfigSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new ConfigurationError(`Invalid configuration: ${issues}`);
    }
    return withEnvOverrides(parsed.data, env);
};

export const loadConfig = (configPath?: string): Config => {
    if (configInstance && !configPath) return configInstance;

    const validPath = configPath || DEFAULT_CONFIG_PATH;
    let fileContents: string;
    try {
        fileContents = fs.readFileSync(validPath, 'utf8');
    } catch (e) {
        throw new ConfigurationError(`Cannot read config file ${validPath}: ${errorMessage(e)}`);
    }
    configInstance = parseConfig(yaml.load(fileContents));

    return configInstance;
};

export const getConfig = (): Config => {
    if (!configInstance) {
        return loadConfig(); // Auto-load default
    }
    return configInstance;
};

export const resetConfig = (): void => {
    configInstance = null;
};
