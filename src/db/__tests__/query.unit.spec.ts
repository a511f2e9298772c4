import {
  buildEntryQuery,
  buildWhere,
  clampLimit,
  jsonNumber,
  jsonText,
  parseGroupBy,
  requireHours,
} from "../query";
import { InvalidArgument } from "../../utils/errors";

const WINDOW = "created_at >= DATE_SUB(NOW(), INTERVAL ? HOUR)";
const text = (field: string) =>
  `NULLIF(JSON_UNQUOTE(JSON_EXTRACT(content, '$.${field}')), 'null')`;

describe("query builder", () => {
  describe("jsonText / jsonNumber", () => {
    it("reads a single path", () => {
      expect(jsonText(["queue"])).toBe(text("queue"));
    });

    it("coalesces a fallback chain in order", () => {
      expect(jsonText(["user_id", "user.id"])).toBe(
        `COALESCE(${text("user_id")}, ${text("user.id")})`
      );
    });

    it("casts numbers to decimals", () => {
      expect(jsonNumber(["duration"])).toBe(`CAST(${text("duration")} AS DECIMAL(12,2))`);
    });
  });

  describe("buildWhere", () => {
    it("is empty without a scope", () => {
      expect(buildWhere({})).toEqual({ sql: "", params: [] });
    });

    it("binds kind and window", () => {
      expect(buildWhere({ kind: "request", hours: 24 })).toEqual({
        sql: `WHERE type = ? AND ${WINDOW}`,
        params: ["request", 24],
      });
    });

    it("adds JSON_VALID before equality and IN filters", () => {
      const where = buildWhere({
        kind: "job",
        hours: 6,
        filters: { status: ["processed", "completed"], queue: "emails" },
      });
      expect(where.sql).toBe(
        `WHERE type = ? AND ${WINDOW} AND JSON_VALID(content) AND LOWER(TRIM(${text("status")})) IN (?, ?) AND ${text("queue")} = ?`
      );
      expect(where.params).toEqual(["job", 6, "processed", "completed", "emails"]);
    });

    it("folds the case of tag filters but not of names", () => {
      const where = buildWhere({
        kind: "exception",
        filters: { level: ["Critical"], queue: "Emails" },
      });
      expect(where.sql).toBe(
        `WHERE type = ? AND JSON_VALID(content) AND LOWER(TRIM(${text("level")})) = ? AND ${text("queue")} = ?`
      );
      expect(where.params).toEqual(["exception", "critical", "Emails"]);
    });

    it("never interpolates filter values", () => {
      const hostile = "x' OR 1=1 --";
      const where = buildWhere({ kind: "job", filters: { queue: hostile } });
      expect(where.sql).not.toContain(hostile);
      expect(where.params).toEqual(["job", hostile]);
    });

    it("skips empty filter lists", () => {
      expect(buildWhere({ kind: "job", filters: { status: [] } })).toEqual({
        sql: "WHERE type = ?",
        params: ["job"],
      });
    });

    it("filters authenticated users through the user id chain", () => {
      expect(buildWhere({ kind: "request", authenticatedOnly: true }).sql).toBe(
        `WHERE type = ? AND JSON_VALID(content) AND COALESCE(${text("user_id")}, ${text("user.id")}) IS NOT NULL`
      );
    });

    it("rejects negative hours", () => {
      expect(() => buildWhere({ kind: "request", hours: -1 })).toThrow(InvalidArgument);
    });
  });

  describe("buildEntryQuery", () => {
    it("orders by recency and binds the limit last", () => {
      expect(buildEntryQuery("telescope_entries", {}, { limit: 5 })).toEqual({
        sql: "SELECT sequence, uuid, batch_id, type, content, created_at FROM telescope_entries ORDER BY created_at DESC, sequence DESC LIMIT ?",
        params: [5],
      });
    });

    it("orders slow queries by duration", () => {
      const time = jsonNumber(["time", "duration"]);
      const q = buildEntryQuery(
        "telescope_entries",
        { kind: "query", slowerThanMs: 100 },
        { limit: 10, order: "slowest" }
      );
      expect(q.sql).toBe(
        `SELECT sequence, uuid, batch_id, type, content, created_at FROM telescope_entries WHERE type = ? AND JSON_VALID(content) AND ${time} > ? ORDER BY ${time} DESC, created_at DESC LIMIT ?`
      );
      expect(q.params).toEqual(["query", 100, 10]);
    });
  });

  describe("clampLimit", () => {
    it.each([0, -3, 1.5])("rejects %p", (limit) => {
      expect(() => clampLimit(limit)).toThrow(InvalidArgument);
    });

    it("caps at the maximum", () => {
      expect(clampLimit(500)).toBe(100);
      expect(clampLimit(60, 50)).toBe(50);
      expect(clampLimit(7)).toBe(7);
    });
  });

  describe("requireHours", () => {
    it("accepts zero and rejects fractions", () => {
      expect(requireHours(0)).toBe(0);
      expect(() => requireHours(2.5)).toThrow("hours must be a non-negative integer (got 2.5)");
    });
  });

  describe("parseGroupBy", () => {
    it("maps the allow-list", () => {
      expect(parseGroupBy("type")).toBe("class");
      expect(parseGroupBy(" File ")).toBe("file");
      expect(parseGroupBy("message")).toBe("message");
    });

    it.each(["constructor", "content->$.x", ""])("rejects %p", (raw) => {
      expect(() => parseGroupBy(raw)).toThrow(InvalidArgument);
    });
  });
});
