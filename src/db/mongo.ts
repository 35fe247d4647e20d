/**
 * Mongo client singleton for the native driver.
 * Purpose: single entrypoint to obtain the client (`getMongoClient`, needed for
 * sessions/transactions) and database handle (`getDb`), and to close them.
 * Connection settings come from `configureMongo` or, failing that, the
 * environment (`MONGO_URI`, `DB_NAME`).
 */
import { MongoClient, type Db } from "mongodb";

export interface MongoConnectionOptions {
  uri?: string;
  dbName?: string;
}

let settings: MongoConnectionOptions = {};
let client: MongoClient | null = null;
let connectPromise: Promise<MongoClient> | null = null;

const getUri = (): string => {
  const uri = settings.uri ?? process.env.MONGO_URI;
  if (!uri) throw new Error("MongoDB URI not configured (MONGO_URI).");
  return uri;
};

const getDbName = (): string =>
  settings.dbName ?? process.env.DB_NAME ?? "memeboard";

/** Override connection settings. Must run before the first connect. */
export function configureMongo(options: MongoConnectionOptions): void {
  settings = { ...settings, ...options };
}

/**
 * Establish (or reuse) the connection. Concurrent callers share the same
 * in-flight promise so only one pool is opened.
 */
export async function getMongoClient(): Promise<MongoClient> {
  if (client) return client;
  if (!connectPromise) {
    const candidate = new MongoClient(getUri());
    connectPromise = candidate
      .connect()
      .then((connected) => {
        client = connected;
        return connected;
      })
      .catch((error: unknown) => {
        connectPromise = null;
        throw error;
      });
  }
  return connectPromise;
}

export async function getDb(): Promise<Db> {
  const connected = await getMongoClient();
  return connected.db(getDbName());
}

/** Close the client during tests or graceful shutdowns. */
export async function closeDb(): Promise<void> {
  const current = client;
  client = null;
  connectPromise = null;
  if (current) {
    await current.close();
  }
}
