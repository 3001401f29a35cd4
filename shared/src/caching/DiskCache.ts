import { createHash } from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { Logger } from '../utils/Logger';

/**
 * JSON cache of artifacts on the local disk, one file per key, so a rerun can skip an external
 * call whose answer it already has.
 */
export class DiskCache {
    private readonly directory: string;
    private readonly logger: Logger;

    constructor(directory: string, logger: Logger = new Logger('DiskCache')) {
        this.directory = directory;
        this.logger = logger;
    }

    /**
     * Stable key for any JSON-serializable value (a composed request, typically)
     */
    static keyFor(value: unknown): string {
        return createHash('sha256').update(JSON.stringify(value, bufferReplacer)).digest('hex');
    }

    private fileFor(key: string): string {
        if (!/^[A-Za-z0-9._-]+$/.test(key)) {
            throw new Error(`Invalid cache key '${key}'`);
        }
        return path.join(this.directory, `${key}.json`);
    }

    public async get<T>(key: string): Promise<T | null> {
        let data: string;
        try {
            data = await fs.readFile(this.fileFor(key), 'utf8');
        } catch (error) {
            if (isMissingFile(error)) {
                this.logger.debug(`Cache miss for ${key}`);
                return null;
            }
            throw error;
        }
        this.logger.debug(`Cache hit for ${key}`);
        return JSON.parse(data) as T;
    }

    public async has(key: string): Promise<boolean> {
        try {
            await fs.access(this.fileFor(key));
            return true;
        } catch (error) {
            if (isMissingFile(error)) {
                return false;
            }
            throw error;
        }
    }

    public async set(key: string, value: unknown): Promise<void> {
        await fs.mkdir(this.directory, { recursive: true });
        await fs.writeFile(this.fileFor(key), JSON.stringify(value, bufferReplacer, 2), 'utf8');
        this.logger.debug(`Cached ${key}`);
    }

    public async delete(key: string): Promise<void> {
        await fs.rm(this.fileFor(key), { force: true });
    }
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Buffers serialize as `{ type: 'Buffer', data: [...] }` by default; hash and store them as base64 instead.
 */
function bufferReplacer(_key: string, value: unknown): unknown {
    if (typeof value === 'object' && value !== null && 'type' in value && value.type === 'Buffer' && 'data' in value && Array.isArray(value.data)) {
        return { type: 'Buffer', base64: Buffer.from(value.data).toString('base64') };
    }
    return value;
}
