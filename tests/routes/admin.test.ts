import fs from 'fs';
import path from 'path';
import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';

vi.mock('../../src/db', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../src/db')>();
  const { fakeDb } = await import('../helpers/fakeDb');
  return { ...actual, default: fakeDb.pool };
});

import { getLogPath, parseLogLine, readLogLines } from '../../src/utils/adminLog';
import { duplicateEntryError, fakeDb } from '../helpers/fakeDb';
import { recruiterRow, studentRow } from '../helpers/fixtures';
import { bearer, jsonRequest, startServer, TestServer } from '../helpers/server';

describe('admin routes', () => {
  let server: TestServer;
  const admin = bearer('student', 1, 'asha@example.com');

  const lastLogEntry = async () => {
    const lines = await readLogLines();
    return parseLogLine(lines[lines.length - 1]);
  };

  beforeAll(async () => {
    server = await startServer();
  });

  afterAll(async () => {
    await server.close();
  });

  beforeEach(async () => {
    await fs.promises.rm(getLogPath(), { force: true });
    fakeDb.reset();
    fakeDb
      .on(/SELECT is_admin FROM students WHERE id = \?/, [{ is_admin: 1 }])
      .on(/SELECT \* FROM students WHERE id = \?/, [studentRow({ is_admin: 1 })])
      .on(/SELECT \* FROM recruiters WHERE id = \?/, [recruiterRow()]);
  });

  it('turns away users without admin privileges and logs the attempt', async () => {
    fakeDb.on(/SELECT is_admin FROM students WHERE id = \?/, [{ is_admin: 0 }]);

    const res = await fetch(`${server.baseUrl}/admin/users`, { headers: bearer('student', 5, 'dev@example.com') });

    expect(res.status).toBe(403);
    expect(await res.json()).toEqual({ message: 'Administrator privileges required.' });
    expect(fakeDb.callsMatching(/SELECT is_admin FROM students/)[0].params).toEqual([5]);
    expect(await lastLogEntry()).toMatchObject({
      event_type: 'unauthorized_access',
      message: 'Non-admin user attempted to access admin area',
      user_email: 'dev@example.com',
    });
  });

  it('lists students and recruiters together, newest first', async () => {
    fakeDb
      .on(/created_at FROM students$/, [{ id: 1, username: 'asha', created_at: '2026-09-01T10:00:00.000Z' }])
      .on(/created_at FROM recruiters$/, [{ id: 2, username: 'ravi', created_at: '2026-09-05T10:00:00.000Z' }]);

    const res = await fetch(`${server.baseUrl}/admin/users`, { headers: admin });

    expect(await res.json()).toEqual([
      { id: 2, username: 'ravi', created_at: '2026-09-05T10:00:00.000Z', user_type: 'recruiter' },
      { id: 1, username: 'asha', created_at: '2026-09-01T10:00:00.000Z', user_type: 'student' },
    ]);
    expect(await lastLogEntry()).toMatchObject({ event_type: 'admin_users_view', user_email: 'asha@example.com' });
  });

  describe('dashboard', () => {
    it('adds up totals across both user types', async () => {
      fakeDb
        .on(/AS total_students/, [
          {
            total_students: 3,
            total_recruiters: 2,
            admin_students: 1,
            admin_recruiters: 0,
            students_logged_in_today: 2,
            recruiters_logged_in_today: 1,
            students_never_logged_in: 1,
            recruiters_never_logged_in: 0,
            recent_students: 1,
            recent_recruiters: 1,
            total_jobs: 4,
            total_applications: 5,
            recent_jobs: 2,
            recent_applications: 3,
          },
        ])
        .on(/GROUP BY status/, [
          { status: 'Applied', count: 4 },
          { status: 'Selected', count: 1 },
        ]);

      const res = await fetch(`${server.baseUrl}/admin/dashboard`, { headers: admin });

      const body = await res.json();
      expect(body).toMatchObject({
        totals: { users: 5, students: 3, recruiters: 2, admins: 1, jobs: 4, applications: 5 },
        logged_in_today: { total: 3, students: 2, recruiters: 1 },
        never_logged_in: { total: 1, students: 1, recruiters: 0 },
        last_7_days: { users: 2, students: 1, recruiters: 1, jobs: 2, applications: 3 },
        application_statuses: { Applied: 4, Selected: 1 },
        recent_students: [],
        login_activities: [],
      });
      expect(body).toHaveProperty('user_activity.logins', [0, 0, 0, 0, 0, 0, 0]);
      expect(await lastLogEntry()).toMatchObject({ event_type: 'admin_dashboard_access' });
    });
  });

  describe('user management', () => {
    it('rejects unknown user types', async () => {
      const res = await fetch(`${server.baseUrl}/admin/users/teacher/3`, jsonRequest('DELETE', admin));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ message: 'Invalid user type.' });
    });

    it('reports missing users', async () => {
      fakeDb.on(/SELECT \* FROM recruiters WHERE id = \?/, []);

      const res = await fetch(`${server.baseUrl}/admin/users/recruiter/9/make-admin`, jsonRequest('POST', admin));

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ message: 'User not found.' });
    });

    it('does not let admins delete themselves', async () => {
      const res = await fetch(`${server.baseUrl}/admin/users/student/1`, jsonRequest('DELETE', admin));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ message: 'You cannot delete your own account.' });
      expect(fakeDb.callsMatching(/^DELETE/)).toHaveLength(0);
    });

    it('deletes a recruiter with the same id as a student admin', async () => {
      const res = await fetch(`${server.baseUrl}/admin/users/recruiter/1`, jsonRequest('DELETE', admin));

      expect(await res.json()).toEqual({ message: 'Recruiter user deleted successfully.' });
      expect(fakeDb.callsMatching(/DELETE FROM recruiters WHERE id = \?/)[0].params).toEqual([1]);
      expect(await lastLogEntry()).toMatchObject({
        event_type: 'admin_user_delete',
        message: 'Admin deleted recruiter ravi@example.com',
      });
    });

    it('grants admin privileges', async () => {
      const res = await fetch(`${server.baseUrl}/admin/users/recruiter/2/make-admin`, jsonRequest('POST', admin));

      expect(await res.json()).toEqual({ message: 'User has been granted admin privileges.' });
      expect(fakeDb.callsMatching(/UPDATE recruiters SET is_admin = true WHERE id = \?/)[0].params).toEqual([2]);
      expect(await lastLogEntry()).toMatchObject({
        event_type: 'admin_make_admin',
        message: 'Admin granted admin privileges to recruiter ravi@example.com',
      });
    });

    it('revokes admin privileges from others but not from the caller', async () => {
      const own = await fetch(`${server.baseUrl}/admin/users/student/1/revoke-admin`, jsonRequest('POST', admin));
      expect(own.status).toBe(400);
      expect(await own.json()).toEqual({ message: 'You cannot revoke your own admin privileges.' });

      const other = await fetch(`${server.baseUrl}/admin/users/recruiter/2/revoke-admin`, jsonRequest('POST', admin));
      expect(await other.json()).toEqual({ message: 'Admin privileges revoked from ravi.' });
      expect(await lastLogEntry()).toMatchObject({ event_type: 'admin_demotion' });
    });

    it('edits account details and hashes a new password', async () => {
      const res = await fetch(
        `${server.baseUrl}/admin/users/recruiter/2`,
        jsonRequest('PATCH', admin, {
          username: 'ravi.m',
          email: 'ravi.m@example.com',
          phone: '',
          is_admin: 'on',
          password: 'test-password',
        })
      );

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ message: 'User updated successfully.', user: { id: 2 } });

      const [update] = fakeDb.callsMatching(/UPDATE recruiters SET \?/);
      expect(update.params).toEqual([
        {
          username: 'ravi.m',
          email: 'ravi.m@example.com',
          phone: null,
          is_admin: true,
          password: expect.stringMatching(/^\$2b\$10\$/),
        },
        2,
      ]);
      expect(await lastLogEntry()).toMatchObject({ event_type: 'admin_user_edit' });
    });

    it('reports a username or email that is already taken', async () => {
      fakeDb.on(/UPDATE recruiters SET \?/, duplicateEntryError());

      const res = await fetch(
        `${server.baseUrl}/admin/users/recruiter/2`,
        jsonRequest('PATCH', admin, { username: 'ravi', email: 'asha@example.com' })
      );

      expect(res.status).toBe(409);
    });
  });

  it('returns audit entries newest first and keeps unreadable lines', async () => {
    await fs.promises.mkdir(path.dirname(getLogPath()), { recursive: true });
    await fs.promises.writeFile(
      getLogPath(),
      '[2026-10-01 09:00:00] LOGIN_SUCCESS: Successful student login | User: asha@example.com | IP: 127.0.0.1\n' +
        'garbled line\n'
    );

    const res = await fetch(`${server.baseUrl}/admin/logs`, { headers: admin });

    expect(await res.json()).toEqual([
      { timestamp: 'Unknown', event_type: 'PARSE_ERROR', message: 'garbled line', user_email: null, ip: null },
      {
        timestamp: '2026-10-01 09:00:00',
        event_type: 'LOGIN_SUCCESS',
        message: 'Successful student login',
        user_email: 'asha@example.com',
        ip: '127.0.0.1',
      },
    ]);
  });
});
