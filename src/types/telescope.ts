export const ENTRY_KINDS = [
    "request",
    "query",
    "job",
    "cache",
    "exception"
] as const;

/** Telescope `type` column values this server understands; anything else is "other". */
export type EntryKind = (typeof ENTRY_KINDS)[number] | "other";

export type JobStatus = "pending" | "processed" | "failed" | "unknown";

export type ExceptionLevel =
    | "critical"
    | "error"
    | "warning"
    | "info"
    | "debug"
    | "unknown";

export type CacheOperation = "hit" | "miss" | "write" | "forget" | "unknown";

/** Group-by selector for exception reports. Closed set; never a raw JSON path. */
export type ExceptionGroupBy = "class" | "file" | "message";

/** One row of the entries table as read by the repository. */
export type StoredEntry = {
    sequence: number | null;
    uuid: string;
    batchId: string | null;
    kind: EntryKind;
    content: string;
    createdAt: string;
};

export type JsonObject = Record<string, unknown>;

export type RequestRecord = {
    uuid: string;
    createdAt: string;
    method: string;
    uri: string;
    status: number | null;
    duration: number | null;
    ipAddress: string | null;
    userId: string | null;
    userAgent: string | null;
};

export type QueryRecord = {
    uuid: string;
    createdAt: string;
    sql: string;
    duration: number | null;
    connectionName: string | null;
    bindings: string[];
};

export type JobRecord = {
    uuid: string;
    createdAt: string;
    jobClass: string;
    jobName: string;
    queue: string;
    status: JobStatus;
    rawStatus: string;
    connection: string | null;
    tries: number | null;
    maxTries: number | null;
    timeout: number | null;
    failedAt: string | null;
    exception: string | null;
};

export type CacheRecord = {
    uuid: string;
    createdAt: string;
    operation: CacheOperation;
    rawOperation: string;
    key: string;
    value: unknown;
    result: unknown;
    expiration: number | null;
    tags: string[];
};

export type TraceFrame = {
    file: string;
    line: number | null;
    call: string | null;
};

export type ExceptionRecord = {
    uuid: string;
    sequence: number | null;
    batchId: string | null;
    createdAt: string;
    exceptionClass: string;
    message: string;
    file: string;
    line: number | null;
    level: ExceptionLevel;
    trace: TraceFrame[];
    context: JsonObject;
};

export type SuspicionReason = "client_error" | "sensitive_endpoint" | "slow_response";

export type ActivityRecord = RequestRecord & {
    suspicious: boolean;
    reasons: SuspicionReason[];
};

export type DecodedEntry =
    | { kind: "request"; record: RequestRecord }
    | { kind: "query"; record: QueryRecord }
    | { kind: "job"; record: JobRecord }
    | { kind: "cache"; record: CacheRecord }
    | { kind: "exception"; record: ExceptionRecord }
    | { kind: "other"; entry: StoredEntry };
