// lib/testing/fakePostgrest.ts
// In-process stand-in for the PostgREST endpoint behind supabase-js, enough for the verdict cache table.

type Row = Record<string, unknown>;

type Filter = { column: string; op: string; value: string };

const RESERVED = new Set(["select", "limit", "order", "offset", "on_conflict", "columns"]);

function urlOf(input: string | URL | Request): URL {
  if (typeof input === "string") return new URL(input);
  if (input instanceof URL) return input;
  return new URL(input.url);
}

function filtersOf(url: URL): Filter[] {
  const out: Filter[] = [];
  for (const [column, raw] of url.searchParams.entries()) {
    if (RESERVED.has(column)) continue;
    const dot = raw.indexOf(".");
    out.push({ column, op: raw.slice(0, dot), value: raw.slice(dot + 1) });
  }
  return out;
}

function matches(row: Row, filters: Filter[]): boolean {
  return filters.every(({ column, op, value }) => {
    const cell = String(row[column] ?? "");
    switch (op) {
      case "eq":
        return cell === value;
      case "neq":
        return cell !== value;
      case "lte":
        return Date.parse(cell) <= Date.parse(value);
      case "gt":
        return Date.parse(cell) > Date.parse(value);
      default:
        throw new Error(`fakePostgrest: unsupported filter ${op}`);
    }
  });
}

function project(row: Row, select: string | null): Row {
  if (!select || select === "*") return { ...row };
  const out: Row = {};
  for (const col of select.split(",")) out[col.trim()] = row[col.trim()];
  return out;
}

function json(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json", ...headers },
  });
}

export type FakePostgrest = {
  fetch: typeof fetch;
  rows: Map<string, Row>;
  requests: Array<{ method: string; url: string }>;
  failNext(message: string): void;
};

export function createFakePostgrest(table: string, primaryKey = "key"): FakePostgrest {
  const rows = new Map<string, Row>();
  const requests: Array<{ method: string; url: string }> = [];
  let pendingFailure: string | null = null;

  const handler = async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const url = urlOf(input);
    const method = (init?.method ?? "GET").toUpperCase();
    requests.push({ method, url: url.toString() });

    if (pendingFailure) {
      const message = pendingFailure;
      pendingFailure = null;
      return json({ message, code: "XX000" }, 500);
    }

    if (!url.pathname.endsWith(`/rest/v1/${table}`)) {
      return json({ message: `relation "${url.pathname}" does not exist` }, 404);
    }

    const filters = filtersOf(url);
    const selected = Array.from(rows.values()).filter((r) => matches(r, filters));

    if (method === "GET") {
      const limit = Number(url.searchParams.get("limit") ?? Number.POSITIVE_INFINITY);
      return json(selected.slice(0, limit).map((r) => project(r, url.searchParams.get("select"))));
    }

    if (method === "POST") {
      const body: unknown = JSON.parse(typeof init?.body === "string" ? init.body : "[]");
      const incoming = Array.isArray(body) ? body : [body];
      for (const item of incoming) {
        if (item && typeof item === "object") {
          const row: Row = { ...item };
          rows.set(String(row[primaryKey]), row);
        }
      }
      return new Response(null, { status: 201 });
    }

    if (method === "DELETE") {
      if (filters.length === 0) return json({ message: "DELETE requires a WHERE clause" }, 400);
      for (const r of selected) rows.delete(String(r[primaryKey]));
      return new Response(null, { status: 204, headers: { "content-range": `*/${selected.length}` } });
    }

    return json({ message: `unsupported method ${method}` }, 405);
  };

  return {
    fetch: handler,
    rows,
    requests,
    failNext(message: string) {
      pendingFailure = message;
    },
  };
}
