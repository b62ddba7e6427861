import { cp, mkdir, readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';

/**
 * The server's data directory. The restore tool insists on an empty
 * target, so purging removes the contents but keeps the directory itself.
 */
export class DataDirectory {
    constructor(readonly path: string) {}

    async entries(): Promise<string[]> {
        await mkdir(this.path, { recursive: true });

        return (await readdir(this.path)).sort();
    }

    async isEmpty(): Promise<boolean> {
        return (await this.entries()).length === 0;
    }

    /**
     * Copies every entry the filter keeps into `destination`. Returns the
     * copied names; nothing is created when there is nothing to copy.
     */
    async copyTo(
        destination: string,
        keep: (name: string) => boolean,
    ): Promise<string[]> {
        const names = (await this.entries()).filter(keep);

        if (names.length === 0) {
            return [];
        }

        await mkdir(destination, { recursive: true });

        for (const name of names) {
            await cp(join(this.path, name), join(destination, name), {
                recursive: true,
                preserveTimestamps: true,
            });
        }

        return names;
    }

    async purge(): Promise<number> {
        const names = await this.entries();

        for (const name of names) {
            await rm(join(this.path, name), {
                recursive: true,
                force: true,
            });
        }

        return names.length;
    }
}
