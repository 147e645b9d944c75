import fs from 'fs';
import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../src/db', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../src/db')>();
  const { fakeDb } = await import('./helpers/fakeDb');
  return { ...actual, default: fakeDb.pool };
});

import { ensureAdminExists } from '../src/initAdmin';
import { getLogPath, parseLogLine, readLogLines } from '../src/utils/adminLog';
import { fakeDb } from './helpers/fakeDb';

describe('ensureAdminExists', () => {
  beforeEach(async () => {
    fakeDb.reset();
    await fs.promises.rm(getLogPath(), { force: true });
  });

  it('leaves things alone when an admin exists', async () => {
    fakeDb.on(/SELECT id FROM students WHERE is_admin = true/, [{ id: 1 }]);

    expect(await ensureAdminExists()).toBeNull();
    expect(fakeDb.callsMatching(/AS user_type/)).toHaveLength(0);
    expect(fakeDb.callsMatching(/^UPDATE/)).toHaveLength(0);
    expect(await readLogLines()).toEqual([]);
  });

  it('does nothing before anyone has registered', async () => {
    expect(await ensureAdminExists()).toBeNull();
    expect(fakeDb.callsMatching(/^UPDATE/)).toHaveLength(0);
    expect(await readLogLines()).toEqual([]);
  });

  it('promotes the earliest user across both tables and logs it', async () => {
    const earliest = {
      id: 4,
      username: 'ravi',
      email: 'ravi@example.com',
      created_at: new Date(2026, 0, 5),
      user_type: 'recruiter',
    };
    fakeDb.on(/AS user_type/, [earliest]);

    expect(await ensureAdminExists()).toEqual(earliest);

    const [lookup] = fakeDb.callsMatching(/AS user_type/);
    expect(lookup.sql).toContain('UNION ALL');
    expect(lookup.sql).toContain('ORDER BY created_at ASC');
    expect(fakeDb.callsMatching(/UPDATE recruiters SET is_admin = true WHERE id = \?/)[0].params).toEqual([4]);
    expect(fakeDb.callsMatching(/UPDATE students/)).toHaveLength(0);

    const lines = await readLogLines();
    expect(lines).toHaveLength(1);
    expect(parseLogLine(lines[0])).toMatchObject({
      event_type: 'admin_creation',
      message: 'Earliest user ravi (recruiter) made admin',
      user_email: 'ravi@example.com',
    });
  });
});
