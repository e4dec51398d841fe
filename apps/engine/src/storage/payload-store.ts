import fs from 'fs/promises';
import path from 'path';

export interface StoredPayload {
    key: string;
    createdAt: Date;
}

/** Temporary storage for payloads too large to travel inside an envelope. */
export interface PayloadStore {
    put(key: string, bytes: Buffer): Promise<void>;
    get(key: string): Promise<Buffer>;
    /** Returns false when nothing was stored under the key. */
    delete(key: string): Promise<boolean>;
    list(): Promise<StoredPayload[]>;
}

const FILE_PREFIX = 'taskline_';
const FILE_SUFFIX = '.bin';

export class FsPayloadStore implements PayloadStore {
    constructor(private readonly dir: string) { }

    async put(key: string, bytes: Buffer): Promise<void> {
        await fs.mkdir(this.dir, { recursive: true });
        await fs.writeFile(this.fileFor(key), bytes);
    }

    async get(key: string): Promise<Buffer> {
        return fs.readFile(this.fileFor(key));
    }

    async delete(key: string): Promise<boolean> {
        try {
            await fs.unlink(this.fileFor(key));
            return true;
        } catch (err) {
            if (isMissingFile(err)) return false;
            throw err;
        }
    }

    async list(): Promise<StoredPayload[]> {
        let names: string[];
        try {
            names = await fs.readdir(this.dir);
        } catch (err) {
            if (isMissingFile(err)) return [];
            throw err;
        }

        const stored: StoredPayload[] = [];
        for (const name of names) {
            if (!name.startsWith(FILE_PREFIX) || !name.endsWith(FILE_SUFFIX)) continue;
            const key = name.slice(FILE_PREFIX.length, -FILE_SUFFIX.length);
            try {
                const stat = await fs.stat(path.join(this.dir, name));
                stored.push({ key, createdAt: stat.mtime });
            } catch (err) {
                // removed between readdir and stat
                if (!isMissingFile(err)) throw err;
            }
        }
        return stored;
    }

    private fileFor(key: string): string {
        if (!/^[A-Za-z0-9-]+$/.test(key)) {
            throw new Error(`Invalid payload key "${key}"`);
        }
        return path.join(this.dir, `${FILE_PREFIX}${key}${FILE_SUFFIX}`);
    }
}

function isMissingFile(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class InMemoryPayloadStore implements PayloadStore {
    private blobs = new Map<string, { bytes: Buffer; createdAt: Date }>();

    constructor(private readonly now: () => Date = () => new Date()) { }

    async put(key: string, bytes: Buffer): Promise<void> {
        this.blobs.set(key, { bytes: Buffer.from(bytes), createdAt: this.now() });
    }

    async get(key: string): Promise<Buffer> {
        const blob = this.blobs.get(key);
        if (!blob) throw new Error(`No payload stored under "${key}"`);
        return Buffer.from(blob.bytes);
    }

    async delete(key: string): Promise<boolean> {
        return this.blobs.delete(key);
    }

    async list(): Promise<StoredPayload[]> {
        return Array.from(this.blobs, ([key, blob]) => ({ key, createdAt: blob.createdAt }));
    }
}
