import type { RowDataPacket } from "mysql2";
import { createConnection } from "mysql2/promise";
import type { DbConfig } from "../config/config";
import { describeConnection } from "../config/config";
import { ConnectionFailure, QueryFailure, errorMessage } from "../utils/errors";

export type SqlParam = string | number | null;

export type Row = Record<string, unknown>;

export type Db = {
    select: (sql: string, params?: SqlParam[]) => Promise<Row[]>;
    describe: () => string;
    close: () => Promise<void>;
};

/** The slice of a driver connection the client relies on. */
export type DbConnection = {
    query: (sql: string, params: SqlParam[]) => Promise<Row[]>;
    end: () => Promise<void>;
    onError: (listener: (error: unknown) => void) => void;
};

export type Connect = (config: DbConfig) => Promise<DbConnection>;

const connectMysql: Connect = async (config) => {
    const conn = await createConnection({
        host: config.host,
        port: config.port,
        database: config.database,
        user: config.username,
        password: config.password,
        charset: "utf8mb4",
        dateStrings: true
    });
    return {
        query: async (sql, params) => {
            const [rows] = await conn.query<RowDataPacket[]>(sql, params);
            return rows;
        },
        end: () => conn.end(),
        onError: (listener) => {
            conn.on("error", listener);
        }
    };
};

function isFatal(error: unknown): boolean {
    return (
        typeof error === "object" &&
        error !== null &&
        "fatal" in error &&
        error.fatal === true
    );
}

/**
 * Lazily opened connection, reused across tool calls. Calls arriving while
 * the first connect is in flight wait for it. A fatal driver error drops the
 * handle so the next call reconnects.
 */
export function createDb(config: DbConfig, connect: Connect = connectMysql): Db {
    let conn: DbConnection | null = null;
    let pending: Promise<DbConnection> | null = null;

    async function open(): Promise<DbConnection> {
        let opened: DbConnection;
        try {
            opened = await connect(config);
        } catch (error) {
            throw new ConnectionFailure(
                `Cannot reach ${describeConnection(config)}: ${errorMessage(error)}`,
                { cause: error }
            );
        }
        // Idle connections report drops as events rather than rejections.
        opened.onError((error) => {
            console.error(`[db] connection error: ${errorMessage(error)}`);
            if (conn === opened) {
                conn = null;
            }
        });
        conn = opened;
        console.error(`[db] connected to ${describeConnection(config)}`);
        return opened;
    }

    function connection(): Promise<DbConnection> {
        if (conn) {
            return Promise.resolve(conn);
        }
        if (!pending) {
            pending = open().finally(() => {
                pending = null;
            });
        }
        return pending;
    }

    async function select(sql: string, params: SqlParam[] = []): Promise<Row[]> {
        const c = await connection();
        try {
            return await c.query(sql, params);
        } catch (error) {
            if (isFatal(error)) {
                console.error("[db] connection lost, will reconnect on next call");
                if (conn === c) {
                    conn = null;
                }
            }
            throw new QueryFailure(errorMessage(error), { cause: error });
        }
    }

    async function close(): Promise<void> {
        if (pending) {
            // A connect still in flight would otherwise outlive the close.
            await pending.catch((error: unknown) => {
                console.error(`[db] connect abandoned on close: ${errorMessage(error)}`);
            });
        }
        if (!conn) {
            return;
        }
        const c = conn;
        conn = null;
        await c.end();
    }

    return {
        select,
        describe: () => describeConnection(config),
        close
    };
}
