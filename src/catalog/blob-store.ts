import {
    GetObjectCommand,
    ListObjectsV2Command,
    S3Client,
} from '@aws-sdk/client-s3';

/**
 * Remote object storage as the catalog sees it: a flat key space that can
 * be listed by prefix and read whole.
 */
export interface BlobStore {
    list(prefix: string): Promise<string[]>;
    get(key: string): Promise<Uint8Array>;
}

export interface S3BlobStoreConfig {
    endpoint: string;
    accessKeyId: string;
    secretAccessKey: string;
    bucket: string;
    region: string;
    useSsl: boolean;
    forcePathStyle: boolean;
}

function buildEndpointUrl(endpoint: string, useSsl: boolean): string {
    if (/^https?:\/\//i.test(endpoint)) {
        return endpoint;
    }

    return `${useSsl ? 'https' : 'http'}://${endpoint}`;
}

export function createS3Client(config: S3BlobStoreConfig): S3Client {
    return new S3Client({
        region: config.region,
        endpoint: buildEndpointUrl(config.endpoint, config.useSsl),
        forcePathStyle: config.forcePathStyle,
        credentials: {
            accessKeyId: config.accessKeyId,
            secretAccessKey: config.secretAccessKey,
        },
    });
}

export class S3BlobStore implements BlobStore {
    constructor(
        private readonly client: S3Client,
        private readonly bucket: string,
    ) {}

    async list(prefix: string): Promise<string[]> {
        const keys: string[] = [];
        let continuationToken: string | undefined;

        do {
            const response = await this.client.send(new ListObjectsV2Command({
                Bucket: this.bucket,
                Prefix: prefix,
                ContinuationToken: continuationToken,
            }));

            for (const object of response.Contents || []) {
                if (object.Key) {
                    keys.push(object.Key);
                }
            }

            continuationToken = response.IsTruncated
                ? response.NextContinuationToken
                : undefined;
        } while (continuationToken);

        return keys;
    }

    async get(key: string): Promise<Uint8Array> {
        const response = await this.client.send(new GetObjectCommand({
            Bucket: this.bucket,
            Key: key,
        }));

        if (!response.Body) {
            throw new Error(`object ${key} has no body`);
        }

        return response.Body.transformToByteArray();
    }
}

export class InMemoryBlobStore implements BlobStore {
    private readonly objects = new Map<string, Uint8Array>();

    constructor(initial?: Record<string, Uint8Array | string>) {
        for (const [key, value] of Object.entries(initial || {})) {
            this.put(key, value);
        }
    }

    put(key: string, value: Uint8Array | string): void {
        this.objects.set(
            key,
            typeof value === 'string' ? Buffer.from(value, 'utf8') : value,
        );
    }

    async list(prefix: string): Promise<string[]> {
        return Array.from(this.objects.keys())
            .filter((key) => key.startsWith(prefix))
            .sort((left, right) => left.localeCompare(right));
    }

    async get(key: string): Promise<Uint8Array> {
        const value = this.objects.get(key);

        if (!value) {
            throw new Error(`object ${key} not found`);
        }

        return new Uint8Array(value);
    }
}
