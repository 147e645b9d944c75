import { vi } from 'vitest';

export interface RecordedQuery {
  sql: string;
  params: unknown[];
}

type Responder = (params: unknown[], sql: string) => unknown;

interface Route {
  pattern: RegExp;
  respond: Responder;
}

/**
 * Stand-in for the mysql2 pool. Queries are answered by the most recently
 * registered route whose pattern matches the SQL; unmatched SELECTs return no
 * rows and other statements report one affected row.
 */
export class FakeDatabase {
  readonly calls: RecordedQuery[] = [];
  private routes: Route[] = [];
  private nextInsertId = 100;

  readonly query = vi.fn(async (sql: string, params: unknown[] = []) => {
    this.calls.push({ sql, params });
    const route = [...this.routes].reverse().find((candidate) => candidate.pattern.test(sql));
    if (route) {
      const result = route.respond(params, sql);
      if (result instanceof Error) throw result;
      return [result, []];
    }
    if (/^\s*SELECT/i.test(sql)) return [[], []];
    return [{ affectedRows: 1, insertId: this.nextInsertId++ }, []];
  });

  readonly connection = {
    query: this.query,
    beginTransaction: vi.fn(async () => undefined),
    commit: vi.fn(async () => undefined),
    rollback: vi.fn(async () => undefined),
    release: vi.fn(),
  };

  readonly pool = {
    query: this.query,
    getConnection: vi.fn(async () => this.connection),
  };

  on(pattern: RegExp, respond: Responder | unknown): this {
    this.routes.push({
      pattern,
      respond: typeof respond === 'function' ? (params, sql) => respond(params, sql) : () => respond,
    });
    return this;
  }

  callsMatching(pattern: RegExp): RecordedQuery[] {
    return this.calls.filter((call) => pattern.test(call.sql));
  }

  reset(): void {
    this.calls.length = 0;
    this.routes = [];
    this.nextInsertId = 100;
    this.query.mockClear();
  }
}

export const fakeDb = new FakeDatabase();

export const duplicateEntryError = () => Object.assign(new Error('Duplicate entry'), { code: 'ER_DUP_ENTRY' });
