import { ConfigurationError } from "../common/errors/ingestion.error";

export interface DatabaseConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  synchronize: boolean;
  logging: boolean;
}

const REQUIRED_KEYS = [
  "DB_USER",
  "DB_PASS",
  "DB_NAME",
  "INSTANCE_CONNECTION_NAME",
] as const;

/**
 * Reads the Cloud SQL connection settings.
 *
 * Without PRIVATE_IP the instance is reached through the Cloud SQL Unix
 * socket mounted at /cloudsql/<INSTANCE_CONNECTION_NAME>; with it, over
 * TCP to that private address.
 */
export const getDatabaseConfig = (
  env: NodeJS.ProcessEnv = process.env,
): DatabaseConfig => {
  const missing = REQUIRED_KEYS.filter((key) => !env[key]);
  if (missing.length > 0) {
    throw new ConfigurationError(
      `${missing.join(", ")} environment variable${missing.length > 1 ? "s" : ""} not set`,
    );
  }

  const instanceConnectionName = env.INSTANCE_CONNECTION_NAME ?? "";
  const privateIp = env.PRIVATE_IP?.trim();
  const port = parseInt(env.DB_PORT || "5432", 10);
  if (Number.isNaN(port)) {
    throw new ConfigurationError(`DB_PORT must be a number, got "${env.DB_PORT}"`);
  }

  return {
    host: privateIp ? privateIp : `/cloudsql/${instanceConnectionName}`,
    port,
    username: env.DB_USER ?? "",
    password: env.DB_PASS ?? "",
    database: env.DB_NAME ?? "",
    synchronize: env.DB_SYNCHRONIZE === "true",
    logging: env.DB_LOGGING === "true",
  };
};
