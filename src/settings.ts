// Runtime settings sourced from environment variables

/** Parses a positive integer setting, falling back to `fallback` when unset or malformed. */
export function readPositiveInt(raw: string | undefined, fallback: number): number {
    if (!raw) return fallback;
    const value = Number(raw);
    return Number.isSafeInteger(value) && value > 0 ? value : fallback;
}

export const apiPort: number = readPositiveInt(process.env.API_PORT, 3000);
export const mongoUrl: string = process.env.MONGO_URL || '';
export const mongoDb: string = process.env.MONGO_DB || 'evostake';
// Account allowed to initialize the collection and withdraw mint proceeds
export const adminAccount: string = process.env.ADMIN_ACCOUNT || 'admin';
// Path to a JSON collection configuration; when empty the node waits for a COLLECTION_INITIALIZE transaction
export const collectionConfigPath: string = process.env.COLLECTION_CONFIG || '';
// Seconds between state flushes to MongoDB
export const flushInterval: number = readPositiveInt(process.env.FLUSH_INTERVAL, 10);

export default {
    apiPort,
    mongoUrl,
    mongoDb,
    adminAccount,
    collectionConfigPath,
    flushInterval,
};
