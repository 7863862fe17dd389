/**
 * Biological data source lookup used by the Xref codecs.
 *
 * The resolver is injected into readers and writers; the default one matches
 * a bundled table by full name or system code, ignoring case.
 */
import { readFileSync } from 'node:fs';

export interface DataSource {
    fullName: string;
    systemCode: string;
}

/** Maps a data source name as found in a document to a known source. */
export type DataSourceResolver = (fullName: string) => DataSource | null;

function isDataSource(value: unknown): value is DataSource {
    return (
        typeof value === 'object' &&
        value !== null &&
        'fullName' in value &&
        typeof value.fullName === 'string' &&
        'systemCode' in value &&
        typeof value.systemCode === 'string'
    );
}

let bundled: DataSource[] | null = null;

export function bundledDataSources(): DataSource[] {
    if (bundled) return bundled;
    const raw: unknown = JSON.parse(readFileSync(new URL('./dataSources.json', import.meta.url), 'utf8'));
    bundled = Array.isArray(raw) ? raw.filter(isDataSource) : [];
    return bundled;
}

/** Build a resolver over a list of sources; full names win over system codes. */
export function createDataSourceResolver(sources: DataSource[]): DataSourceResolver {
    const byName = new Map<string, DataSource>();
    const byCode = new Map<string, DataSource>();
    for (const source of sources) {
        byName.set(source.fullName.toLowerCase(), source);
        if (!byCode.has(source.systemCode.toLowerCase())) byCode.set(source.systemCode.toLowerCase(), source);
    }
    return (fullName) => {
        const key = fullName.trim().toLowerCase();
        if (key === '') return null;
        return byName.get(key) ?? byCode.get(key) ?? null;
    };
}

let defaultResolver: DataSourceResolver | null = null;

export function defaultDataSourceResolver(): DataSourceResolver {
    if (!defaultResolver) defaultResolver = createDataSourceResolver(bundledDataSources());
    return defaultResolver;
}

/** Canonical full name for a document value, or the value itself when unknown. */
export function canonicalDataSource(name: string, resolve: DataSourceResolver): string {
    return resolve(name)?.fullName ?? name;
}
