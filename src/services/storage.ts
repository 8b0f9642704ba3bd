import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { env } from '../config/env';

export const RAW_PREFIX = 'raw-data/';
export const PROCESSED_PREFIX = 'processed-data/';

export interface ObjectStore {
    /** Stores `bytes` under `key` and returns the object's URL. */
    upload(bytes: Buffer, key: string, contentType?: string): Promise<string>;
    /** Copies the object to a fresh local temp file and returns its path. */
    download(key: string): Promise<string>;
    remove(key: string): Promise<void>;
    keyFromUrl(url: string): string | null;
}

export function contentTypeFor(filename: string): string {
    const ext = path.extname(filename).toLowerCase();
    if (ext === '.pdf') return 'application/pdf';
    if (ext === '.html' || ext === '.htm') return 'text/html';
    return 'application/octet-stream';
}

function tempPathFor(key: string): string {
    return path.join(os.tmpdir(), `${uuidv4()}${path.extname(key)}`);
}

// 1. Supabase Storage (Production)
export class SupabaseObjectStore implements ObjectStore {
    private client: SupabaseClient;

    constructor(url: string, apiKey: string, private readonly bucket: string) {
        this.client = createClient(url, apiKey);
    }

    async upload(bytes: Buffer, key: string, contentType = contentTypeFor(key)): Promise<string> {
        const { error } = await this.client.storage
            .from(this.bucket)
            .upload(key, bytes, { contentType, upsert: true });
        if (error) throw error;

        const { data } = this.client.storage.from(this.bucket).getPublicUrl(key);
        return data.publicUrl;
    }

    async download(key: string): Promise<string> {
        const { data, error } = await this.client.storage.from(this.bucket).download(key);
        if (error) throw error;

        const target = tempPathFor(key);
        await fs.promises.writeFile(target, Buffer.from(await data.arrayBuffer()));
        return target;
    }

    async remove(key: string): Promise<void> {
        const { error } = await this.client.storage.from(this.bucket).remove([key]);
        if (error) throw error;
    }

    keyFromUrl(url: string): string | null {
        const marker = `/object/public/${this.bucket}/`;
        const idx = url.indexOf(marker);
        return idx === -1 ? null : decodeURIComponent(url.slice(idx + marker.length)) || null;
    }
}

// 2. Local directory (Fallback/Dev)
export class LocalObjectStore implements ObjectStore {
    private readonly basePath: string;

    constructor(baseDir: string) {
        this.basePath = path.resolve(baseDir);
    }

    private resolveKey(key: string): string {
        const target = path.resolve(this.basePath, key);
        if (!target.startsWith(this.basePath + path.sep)) {
            throw new Error(`Key escapes storage root: ${key}`);
        }
        return target;
    }

    async upload(bytes: Buffer, key: string): Promise<string> {
        const target = this.resolveKey(key);
        await fs.promises.mkdir(path.dirname(target), { recursive: true });
        await fs.promises.writeFile(target, bytes);
        return target;
    }

    async download(key: string): Promise<string> {
        const source = this.resolveKey(key);
        if (!fs.existsSync(source)) throw new Error(`Object not found: ${key}`);
        const target = tempPathFor(key);
        await fs.promises.copyFile(source, target);
        return target;
    }

    async remove(key: string): Promise<void> {
        await fs.promises.rm(this.resolveKey(key), { force: true });
    }

    keyFromUrl(url: string): string | null {
        const relative = path.relative(this.basePath, path.resolve(url));
        if (!relative || relative.startsWith('..') || path.isAbsolute(relative)) return null;
        return relative.split(path.sep).join('/');
    }
}

function createObjectStore(): ObjectStore {
    if (env.SUPABASE_URL && env.SUPABASE_KEY) {
        console.log(`[Storage] Using Supabase bucket "${env.STORAGE_BUCKET}"`);
        return new SupabaseObjectStore(env.SUPABASE_URL, env.SUPABASE_KEY, env.STORAGE_BUCKET);
    }
    console.log(`[Storage] Using local directory ${env.LOCAL_STORAGE_DIR} (WARNING: Not for production)`);
    return new LocalObjectStore(env.LOCAL_STORAGE_DIR);
}

export const objectStore = createObjectStore();
