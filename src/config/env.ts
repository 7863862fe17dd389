/**
 * Centralized environment configuration
 *
 * Type-safe access to environment variables with defaults. Everything the
 * codec reads from the environment goes through this module.
 */
import type { GpmlVersion } from '../types/pathway';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

/**
 * Get environment variable with fallback to default value
 */
export function getEnv(key: string, defaultValue: string): string {
    const value = typeof process !== 'undefined' ? process.env[key] : undefined;
    return value ? value : defaultValue;
}

/**
 * Get numeric environment variable with fallback to default value
 */
export function getEnvNumber(key: string, defaultValue: number): number {
    const parsed = parseInt(getEnv(key, String(defaultValue)), 10);
    return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Get boolean environment variable with fallback to default value
 */
export function getEnvBoolean(key: string, defaultValue: boolean): boolean {
    const value = getEnv(key, String(defaultValue));
    return value === 'true' || value === '1';
}

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some((level) => level === value);
}

function getEnvLogLevel(key: string, defaultValue: LogLevel): LogLevel {
    const value = getEnv(key, defaultValue).toLowerCase();
    return isLogLevel(value) ? value : defaultValue;
}

function getEnvVersion(key: string, defaultValue: GpmlVersion): GpmlVersion {
    const value = getEnv(key, defaultValue);
    return value === '2013a' || value === '2021' ? value : defaultValue;
}

/**
 * Logging Configuration
 */
export const LOG_CONFIG = {
    /**
     * Minimum severity printed to the console: debug, info, warn, error, silent
     * Default: warn
     */
    LEVEL: getEnvLogLevel('LOG_LEVEL', 'warn'),

    /**
     * Recorded events kept in memory; the oldest are dropped first
     * Default: 250
     */
    MAX_EVENTS: getEnvNumber('LOG_MAX_EVENTS', 250),
} as const;

/**
 * Codec Configuration
 */
export const GPML_CONFIG = {
    /**
     * Schema generation written when the caller does not choose one
     * Default: 2021
     */
    DEFAULT_VERSION: getEnvVersion('GPML_DEFAULT_VERSION', '2021'),

    /**
     * Run the schema validator on every written document
     * Default: false
     */
    VALIDATE_ON_WRITE: getEnvBoolean('GPML_VALIDATE_ON_WRITE', false),

    /**
     * Spaces per indentation level in written documents
     * Default: 2
     */
    INDENT: getEnvNumber('GPML_INDENT', 2),
} as const;

/**
 * All configuration grouped
 */
export const ENV = {
    LOG: LOG_CONFIG,
    GPML: GPML_CONFIG,
} as const;
