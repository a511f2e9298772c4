import { config as dotenv } from "dotenv";
import { ConfigurationError } from "../utils/errors";

dotenv();

export type DbConfig = {
    host: string;
    port: number;
    database: string;
    username: string;
    password: string;
    table: string;
};

export type ServerConfig = {
    db: DbConfig;
    /** Upper bound on request rows scanned when only suspicious activity is wanted. */
    scanLimit: number;
    isDev: boolean;
};

type Env = Record<string, string | undefined>;

const TABLE_NAME = /^[A-Za-z0-9_]+$/;

function positiveInt(env: Env, key: string, fallback: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === "") {
        return fallback;
    }
    const n = Number(raw);
    if (!Number.isInteger(n) || n <= 0) {
        throw new ConfigurationError(
            `${key} must be a positive integer (got "${raw}")`
        );
    }
    return n;
}

// Defaults only suit a local development database.
export function readConfig(env: Env = process.env): ServerConfig {
    const table = env.TELESCOPE_TABLE ?? "telescope_entries";
    if (!TABLE_NAME.test(table)) {
        throw new ConfigurationError(
            `TELESCOPE_TABLE may only contain letters, digits and underscores (got "${table}")`
        );
    }
    return {
        db: {
            host: env.DB_HOST ?? "127.0.0.1",
            port: positiveInt(env, "DB_PORT", 3306),
            database: env.DB_DATABASE ?? "laravel_telescope",
            username: env.DB_USERNAME ?? "root",
            password: env.DB_PASSWORD ?? "",
            table
        },
        scanLimit: positiveInt(env, "TELESCOPE_SCAN_LIMIT", 5000),
        isDev: env.NODE_ENV === "development"
    };
}

export function describeConnection(db: DbConfig): string {
    return `${db.host}:${db.port}/${db.database}`;
}
