import { DataSource } from "typeorm";
import type { PostgresConnectionOptions } from "typeorm/driver/postgres/PostgresConnectionOptions";
import { config } from "./config";
import { walletEntities } from "./entities";

// DATABASE_URL wins over the discrete DB_* settings.
function connectionOptions(): PostgresConnectionOptions {
  const { ssl, sslRejectUnauthorized, ...server } = config.database;
  const base: PostgresConnectionOptions = {
    type: "postgres",
    synchronize: true,
    logging: false,
    ssl: ssl ? { rejectUnauthorized: sslRejectUnauthorized } : undefined,
    entities: walletEntities,
  };
  return config.databaseUrl ? { ...base, url: config.databaseUrl } : { ...base, ...server };
}

export const AppDataSource = new DataSource(connectionOptions());
