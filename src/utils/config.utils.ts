import dotenv from 'dotenv';
import { tmpdir } from 'os';
import { z } from 'zod';
import { AppConfig } from '../interfaces/index.js';
import { parseLogLevel } from './logger.utils.js';

const booleanFlag = z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(['true', 'false', '1', '0', 'yes', 'no']))
    .transform((value) => value === 'true' || value === '1' || value === 'yes');

const markerList = z
    .string()
    .transform((value) =>
        value
            .split(',')
            .map((marker) => marker.trim())
            .filter(Boolean)
    )
    .pipe(z.array(z.string()).min(1, 'at least one unknown-version marker is required'));

// Environment variables, all optional
export const EnvConfigSchema = z.object({
    WINGET_EXECUTABLE: z.string().min(1).default('winget'),
    WINGET_SILENT_INSTALL: booleanFlag.default('false'),
    WINGET_UNKNOWN_VERSION_MARKERS: markerList.default('<,Unknown'),
    WINGET_EXPORT_DIR: z.string().min(1).optional(),
    LOG_LEVEL: z
        .string()
        .default('info')
        .transform((value, ctx) => {
            const level = parseLogLevel(value);
            if (level === undefined) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown log level: ${value}` });
                return z.NEVER;
            }
            return level;
        }),
    LOG_DIRECTORY: z.string().min(1).default('./logs'),
    LOG_TO_FILE: booleanFlag.default('false'),
});

/**
 * Build the application config from an environment map
 */
export function parseConfig(env: NodeJS.ProcessEnv): AppConfig {
    const parsed = EnvConfigSchema.parse(env);
    return {
        wingetExecutable: parsed.WINGET_EXECUTABLE,
        silentInstall: parsed.WINGET_SILENT_INSTALL,
        unknownVersionMarkers: parsed.WINGET_UNKNOWN_VERSION_MARKERS,
        exportDirectory: parsed.WINGET_EXPORT_DIR ?? tmpdir(),
        logLevel: parsed.LOG_LEVEL,
        logDirectory: parsed.LOG_DIRECTORY,
        logToFile: parsed.LOG_TO_FILE,
    };
}

let cachedConfig: AppConfig | null = null;

/**
 * Load `.env` once and return the validated process configuration
 */
export function loadConfig(): AppConfig {
    if (!cachedConfig) {
        dotenv.config();
        cachedConfig = parseConfig(process.env);
    }
    return cachedConfig;
}
