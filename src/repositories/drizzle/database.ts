import { drizzle, type PostgresJsDatabase } from "drizzle-orm/postgres-js";
import postgres from "postgres";

export interface DatabaseConnection {
  db: PostgresJsDatabase;
  close: () => Promise<void>;
}

export interface DatabaseOptions {
  maxConnections: number;
}

export function createDatabaseConnection(connectionString: string, options: DatabaseOptions): DatabaseConnection {
  const client = postgres(connectionString, { max: options.maxConnections });
  return {
    db: drizzle(client),
    close: () => client.end(),
  };
}
