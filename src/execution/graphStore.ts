import neo4j, {
  isDate,
  isDateTime,
  isDuration,
  isInt,
  isLocalDateTime,
  isLocalTime,
  isNode,
  isPath,
  isPoint,
  isRelationship,
  isTime,
  type Driver,
} from "neo4j-driver";
import type { FailureKind, QueryRow } from "../types/pipeline";
import { errorField } from "../utils/errors";

// Graph query execution boundary. Implementations throw on backend failure.
export interface GraphStore {
  run(query: string): Promise<QueryRow[]>;
  explain(query: string): Promise<void>;
  close(): Promise<void>;
}

export type Neo4jConnection = {
  uri: string;
  user: string;
  password: string;
  database?: string;
};

export function createNeo4jDriver(conn: Neo4jConnection): Driver {
  return neo4j.driver(conn.uri, neo4j.auth.basic(conn.user, conn.password));
}

/** Converts driver values (integers, graph entities, temporal types) into JSON-safe values. */
export function toPlainValue(value: unknown): unknown {
  if (value === null || value === undefined) return null;
  if (typeof value === "bigint") return value.toString();
  if (typeof value !== "object") return value;
  if (isInt(value)) return value.inSafeRange() ? value.toNumber() : value.toString();
  if (isNode(value) || isRelationship(value)) return toPlainRow(value.properties);
  if (isPath(value)) {
    return [value.start, ...value.segments.map((s) => s.end)].map((n) => toPlainRow(n.properties));
  }
  if (
    isDate(value) ||
    isDateTime(value) ||
    isLocalDateTime(value) ||
    isTime(value) ||
    isLocalTime(value) ||
    isDuration(value) ||
    isPoint(value)
  ) {
    return value.toString();
  }
  if (Array.isArray(value)) return value.map(toPlainValue);
  return toPlainRow(value);
}

export function toPlainRow(obj: object): QueryRow {
  const row: QueryRow = {};
  for (const [key, v] of Object.entries(obj)) {
    row[key] = toPlainValue(v);
  }
  return row;
}

const UNAVAILABLE_CODES = new Set(["ServiceUnavailable", "SessionExpired", "ECONNREFUSED", "ENOTFOUND", "ECONNRESET", "ETIMEDOUT"]);

export function classifyGraphError(err: unknown): FailureKind {
  const code = errorField(err, "code");
  if (typeof code !== "string") return "unexpected";
  if (UNAVAILABLE_CODES.has(code)) return "backend_unavailable";
  if (code.startsWith("Neo.ClientError.Statement.")) return "malformed_query";
  if (code.startsWith("Neo.ClientError.Security.")) return "permission_denied";
  if (code.startsWith("Neo.TransientError.General.DatabaseUnavailable")) return "backend_unavailable";
  return "unexpected";
}

export class Neo4jGraphStore implements GraphStore {
  constructor(
    private readonly driver: Driver,
    private readonly database?: string
  ) {}

  private openSession() {
    return this.driver.session({ database: this.database, defaultAccessMode: neo4j.session.READ });
  }

  async run(query: string): Promise<QueryRow[]> {
    const session = this.openSession();
    try {
      const result = await session.run(query);
      return result.records.map((record) => toPlainRow(record.toObject()));
    } finally {
      await session.close();
    }
  }

  // EXPLAIN plans the statement without running it; syntax and schema errors surface here.
  async explain(query: string): Promise<void> {
    const session = this.openSession();
    try {
      await session.run(`EXPLAIN ${query}`);
    } finally {
      await session.close();
    }
  }

  async close(): Promise<void> {
    await this.driver.close();
  }
}
