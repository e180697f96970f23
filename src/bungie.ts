import fetch from 'node-fetch';
import { BungieApiError } from './errors';
import { BUNGIE_ROOT, MANIFEST_URL } from './config';

// Only the fields the lookup tables read. Browse the full definitions at
// https://data.destinysets.com
export interface DisplayProperties {
    name: string;
}

export interface ItemCategoryDefinition {
    hash: number;
    displayProperties: DisplayProperties;
}

export interface SocketEntry {
    randomizedPlugSetHash?: number;
}

export interface InventoryItemDefinition {
    hash: number;
    displayProperties: DisplayProperties;
    itemCategoryHashes?: number[];
    sockets?: {
        socketEntries?: SocketEntry[];
    };
}

export interface PlugSetDefinition {
    reusablePlugItems: { plugItemHash: number }[];
}

// Definition blobs are keyed by the stringified hash
export type DefinitionTable<T> = Record<string, T>;

export interface Manifest {
    jsonWorldComponentContentPaths: Record<string, Record<string, string>>;
}

interface ManifestEnvelope {
    ErrorStatus: string;
    Message: string;
    Response: Manifest;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

async function fetchJson(url: string, apiKey: string): Promise<{ status: number; body: unknown }> {
    const res = await fetch(url, { headers: { 'X-API-Key': apiKey } });

    let body: unknown = null;
    try {
        body = await res.json();
    } catch {
        body = null; // not JSON, e.g. an HTML maintenance page
    }

    return { status: res.status, body };
}

export async function fetchManifest(apiKey: string): Promise<Manifest> {
    const { status, body } = await fetchJson(MANIFEST_URL, apiKey);

    if (!isRecord(body)) {
        throw new BungieApiError(`error fetching manifest: HTTP ${status}`);
    }

    const envelope = body as Partial<ManifestEnvelope>;
    if (status !== 200 || envelope.ErrorStatus !== 'Success' || !envelope.Response) {
        throw new BungieApiError(`error fetching manifest: ${envelope.Message ?? `HTTP ${status}`}`);
    }

    return envelope.Response;
}

export async function fetchContent<T>(manifest: Manifest, key: string, apiKey: string): Promise<DefinitionTable<T>> {
    const contentPath = manifest.jsonWorldComponentContentPaths['en']?.[key];
    if (!contentPath) {
        throw new BungieApiError(`manifest has no English content path for ${key}`);
    }

    const url = new URL(contentPath, BUNGIE_ROOT).toString();
    const { status, body } = await fetchJson(url, apiKey);

    if (status !== 200 || !isRecord(body)) {
        throw new BungieApiError(`error fetching content blob ${key}: HTTP ${status}`);
    }

    return body as DefinitionTable<T>;
}
