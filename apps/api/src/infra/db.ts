import { Db, MongoClient } from 'mongodb';
import type { Logger } from '../config/logger';

export interface DatabaseHandle {
    client: MongoClient;
    db: Db;
}

/** Builds the client without opening a connection yet. */
export function createDatabase(uri: string): DatabaseHandle {
    const client = new MongoClient(uri);

    // Extract database name from URI or default to 'instrument_valuation'
    const dbName = new URL(uri).pathname.replace('/', '') || 'instrument_valuation';
    return { client, db: client.db(dbName) };
}

export async function connectToDatabase(handle: DatabaseHandle, logger: Logger): Promise<void> {
    await handle.client.connect();
    logger.info({ dbName: handle.db.databaseName }, 'Connected to MongoDB reference store');
}

export async function disconnectFromDatabase(handle: DatabaseHandle, logger: Logger): Promise<void> {
    await handle.client.close();
    logger.info({}, 'Disconnected from MongoDB');
}
