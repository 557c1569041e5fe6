import dotenv from 'dotenv';

// Load environment variables
dotenv.config();

/**
 * Application configuration loaded from environment variables.
 */
export interface Config {
    // Server
    port: number;
    host: string;
    environment: string;
    corsOrigins: string[];

    // Scraping
    scraper: {
        timeoutMs: number;
        userAgent: string;
        maxRedirects: number;
    };
}

function getEnvVar(key: string, defaultValue?: string): string {
    let value = process.env[key];
    if (value === undefined) {
        if (defaultValue !== undefined) {
            return defaultValue;
        }
        throw new Error(`Missing required environment variable: ${key}`);
    }

    // Proactive cleanup: trim whitespace and remove wrapping quotes
    value = value.trim();
    if (value.startsWith('"') && value.endsWith('"')) {
        value = value.substring(1, value.length - 1);
    } else if (value.startsWith("'") && value.endsWith("'")) {
        value = value.substring(1, value.length - 1);
    }

    return value;
}

function getEnvVarNumber(key: string, defaultValue?: number): number {
    const value = getEnvVar(key, defaultValue?.toString());
    const parsed = parseFloat(value);
    if (isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a number, got: ${value}`);
    }
    return parsed;
}

function getEnvVarList(key: string, defaultValue: string): string[] {
    return getEnvVar(key, defaultValue)
        .split(',')
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
}

/**
 * Loads configuration from environment variables.
 */
export function loadConfig(): Config {
    return {
        // Server
        port: getEnvVarNumber('PORT', 8000),
        host: getEnvVar('HOST', '0.0.0.0'),
        environment: getEnvVar('NODE_ENV', 'development'),
        corsOrigins: getEnvVarList('CORS_ORIGINS', '*'),

        // Scraping
        scraper: {
            timeoutMs: getEnvVarNumber('SCRAPER_TIMEOUT_MS', 10000),
            userAgent: getEnvVar('SCRAPER_USER_AGENT', 'AdmissionAnnouncementsBot/1.0'),
            maxRedirects: getEnvVarNumber('SCRAPER_MAX_REDIRECTS', 5),
        },
    };
}

/**
 * Checks value ranges the environment parser cannot enforce.
 */
export function validateConfig(config: Config): string[] {
    const errors: string[] = [];

    if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
        errors.push(`PORT must be an integer between 1 and 65535, got: ${config.port}`);
    }
    if (config.scraper.timeoutMs <= 0) {
        errors.push(`SCRAPER_TIMEOUT_MS must be positive, got: ${config.scraper.timeoutMs}`);
    }
    if (!Number.isInteger(config.scraper.maxRedirects) || config.scraper.maxRedirects < 0) {
        errors.push(`SCRAPER_MAX_REDIRECTS must be a non-negative integer, got: ${config.scraper.maxRedirects}`);
    }
    if (config.corsOrigins.length === 0) {
        errors.push('CORS_ORIGINS must name at least one origin (use * to allow any)');
    }

    return errors;
}

// Singleton config instance (lazy loaded)
let cachedConfig: Config | null = null;

export function getConfig(): Config {
    if (!cachedConfig) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

export function resetConfig(): void {
    cachedConfig = null;
}
