import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';

const { create } = vi.hoisted(() => ({ create: vi.fn() }));

vi.mock('twilio', () => ({ default: vi.fn(() => ({ messages: { create } })) }));

vi.mock('../../src/db', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../src/db')>();
  const { fakeDb } = await import('../helpers/fakeDb');
  return { ...actual, default: fakeDb.pool };
});

import { smsMessages } from '../../src/utils/notification';
import { fakeDb } from '../helpers/fakeDb';
import { applicationRow, interviewRow, jobRow, studentRow } from '../helpers/fixtures';
import { bearer, jsonRequest, startServer, TestServer } from '../helpers/server';

describe('interview routes', () => {
  let server: TestServer;
  const recruiter = bearer('recruiter', 2);

  beforeAll(async () => {
    server = await startServer();
  });

  afterAll(async () => {
    await server.close();
  });

  beforeEach(() => {
    fakeDb.reset();
    create.mockReset();
    create.mockResolvedValue({ sid: 'SM-test' });
    fakeDb
      .on(/SELECT \* FROM interviews WHERE id = \?/, [interviewRow()])
      .on(/SELECT \* FROM applications WHERE id = \?/, [applicationRow({ status: 'Interview Scheduled' })])
      .on(/SELECT \* FROM jobs WHERE id = \?/, [jobRow()])
      .on(/SELECT \* FROM students WHERE id = \?/, [studentRow()]);
  });

  describe('GET /interviews', () => {
    beforeEach(() => {
      fakeDb.on(/SELECT \* FROM interviews WHERE (student_id|recruiter_id) = \?/, [interviewRow()]);
    });

    it('gives students their interviews with job and application', async () => {
      const res = await fetch(`${server.baseUrl}/interviews`, { headers: bearer('student', 1) });

      const body = await res.json();
      expect(body).toMatchObject({ interviews: [{ id: 30, job: { id: 10 }, application: { id: 20 } }] });
      expect(body).not.toHaveProperty('interviews.0.student');
      expect(body).not.toHaveProperty('selected_applications');
      expect(fakeDb.callsMatching(/FROM interviews WHERE student_id = \? ORDER BY interview_datetime ASC/)[0].params).toEqual([1]);
    });

    it('gives recruiters the students and their selected applications', async () => {
      fakeDb.on(/a\.status = 'Selected'/, [applicationRow({ id: 22, status: 'Selected' })]);

      const res = await fetch(`${server.baseUrl}/interviews`, { headers: recruiter });

      const body = await res.json();
      expect(body).toMatchObject({
        interviews: [{ id: 30, student: { id: 1, user_type: 'student' } }],
        selected_applications: [{ id: 22 }],
      });
      expect(body).not.toHaveProperty('interviews.0.student.password');
    });
  });

  describe('GET /interviews/:id', () => {
    it('shows the interview to its student', async () => {
      const res = await fetch(`${server.baseUrl}/interviews/30`, { headers: bearer('student', 1) });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ id: 30, job: { id: 10 }, student: { id: 1 } });
    });

    it('hides the interview from other students', async () => {
      const res = await fetch(`${server.baseUrl}/interviews/30`, { headers: bearer('student', 5) });
      expect(res.status).toBe(403);
    });
  });

  describe('POST /interviews', () => {
    const interviewInput = {
      interview_date: '2026-11-05',
      interview_time: '14:30',
      interview_location: 'Room 204',
      interview_type: 'HR',
    };

    it('needs an application', async () => {
      const res = await fetch(`${server.baseUrl}/interviews`, jsonRequest('POST', recruiter, interviewInput));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ message: 'Student is required.' });
    });

    it('creates an interview without changing the application', async () => {
      const res = await fetch(
        `${server.baseUrl}/interviews`,
        jsonRequest('POST', recruiter, { ...interviewInput, application_id: 20 })
      );

      expect(res.status).toBe(201);
      expect(await res.json()).toEqual({ message: 'Interview created successfully!', interview_id: 100, sms_sent: true });
      expect(fakeDb.callsMatching(/UPDATE applications/)).toHaveLength(0);
      expect(fakeDb.callsMatching(/INSERT INTO notifications/)[0].params.slice(2)).toEqual([
        'Interview Created',
        'An interview has been created for your application to Graduate Engineer at Acme Systems. Date: 05 Nov, 2026, Time: 14:30',
      ]);
    });
  });

  describe('POST /interviews/:id/result', () => {
    const record = (body: unknown) =>
      fetch(`${server.baseUrl}/interviews/30/result`, jsonRequest('POST', recruiter, body));

    it('selects the candidate on a pass', async () => {
      const res = await record({ result: 'Pass', feedback: 'Great session' });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        message: 'Interview result updated successfully!',
        application_status: 'Selected',
        sms_sent: true,
      });
      expect(fakeDb.callsMatching(/UPDATE interviews SET status = 'Completed'/)[0].params).toEqual([
        'Pass',
        'Great session',
        2,
        30,
      ]);
      expect(fakeDb.callsMatching(/UPDATE applications SET status = \?/)[0].params).toEqual(['Selected', 2, 20]);
      expect(fakeDb.callsMatching(/INSERT INTO notifications/)[0].params.slice(2)).toEqual([
        'Interview Result: Pass',
        'Your interview for Graduate Engineer at Acme Systems has been marked as Pass. Great session',
      ]);
      expect(create.mock.calls.map(([message]) => message.body)).toEqual([
        smsMessages.interviewResult(jobRow(), 'Pass'),
        smsMessages.selected(jobRow()),
      ]);
    });

    it('rejects the candidate on a fail', async () => {
      const res = await record({ result: 'Fail' });

      expect(await res.json()).toMatchObject({ application_status: 'Rejected' });
      expect(fakeDb.callsMatching(/INSERT INTO notifications/)[0].params[3]).toBe(
        'Your interview for Graduate Engineer at Acme Systems has been marked as Fail.'
      );
      expect(create).toHaveBeenCalledTimes(1);
    });

    it('only records results for scheduled interviews', async () => {
      fakeDb.on(/SELECT \* FROM interviews WHERE id = \?/, [interviewRow({ status: 'Completed', result: 'Pass' })]);

      const res = await record({ result: 'Fail' });

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({ message: 'This interview has already been completed or cancelled.' });
    });

    it('answers 409 when the interview was completed while the result was being recorded', async () => {
      fakeDb.connection.rollback.mockClear();
      fakeDb.on(/UPDATE interviews SET status = 'Completed'/, { affectedRows: 0, insertId: 0 });

      const res = await record({ result: 'Fail' });

      expect(res.status).toBe(409);
      expect(await res.json()).toEqual({ message: 'This interview has already been completed or cancelled.' });
      expect(fakeDb.callsMatching(/UPDATE interviews SET status = 'Completed'/)[0].sql).toContain(
        "WHERE id = ? AND status = 'Scheduled'"
      );
      expect(fakeDb.connection.rollback).toHaveBeenCalledTimes(1);
      expect(fakeDb.callsMatching(/UPDATE applications/)).toHaveLength(0);
      expect(fakeDb.callsMatching(/INSERT INTO notifications/)).toHaveLength(0);
      expect(create).not.toHaveBeenCalled();
    });

    it('accepts only Pass or Fail', async () => {
      const res = await record({ result: 'Maybe' });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ message: 'Result must be Pass or Fail.' });
    });

    it('is limited to the recruiter who created the interview', async () => {
      const res = await fetch(
        `${server.baseUrl}/interviews/30/result`,
        jsonRequest('POST', bearer('recruiter', 3), { result: 'Pass' })
      );
      expect(res.status).toBe(403);
    });
  });
});
