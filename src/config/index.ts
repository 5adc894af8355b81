/**
 * Configuration Management
 * All configuration loaded from environment variables with sensible defaults
 */

import { config as loadEnv } from 'dotenv';

// Load .env file
loadEnv();

export interface Config {
    // Logging
    logging: {
        level: string;
        pretty: boolean;
    };

    // Canonical output
    output: {
        indent: number;
        byAlias: boolean;
    };
}

export function getEnv(key: string, defaultValue: string): string {
    return process.env[key] ?? defaultValue;
}

export function getEnvInt(key: string, defaultValue: number): number {
    const value = process.env[key];
    if (value === undefined) return defaultValue;
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;
}

export function getEnvBool(key: string, defaultValue: boolean): boolean {
    const value = process.env[key];
    if (value === undefined) return defaultValue;
    return value.toLowerCase() === 'true' || value === '1';
}

export const config: Config = {
    logging: {
        level: getEnv('LOG_LEVEL', 'info'),
        pretty: getEnvBool('LOG_PRETTY', false),
    },

    output: {
        indent: getEnvInt('MODEL_JSON_INDENT', 2),
        byAlias: getEnvBool('MODEL_BY_ALIAS', true),
    },
};
