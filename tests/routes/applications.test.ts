import fs from 'fs';
import path from 'path';
import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';

const { create, post, extractRawText } = vi.hoisted(() => ({
  create: vi.fn(),
  post: vi.fn(),
  extractRawText: vi.fn(),
}));

vi.mock('twilio', () => ({ default: vi.fn(() => ({ messages: { create } })) }));
vi.mock('axios', () => ({ default: { post, isAxiosError: () => false } }));
vi.mock('mammoth', () => ({ default: { extractRawText } }));

vi.mock('../../src/db', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../src/db')>();
  const { fakeDb } = await import('../helpers/fakeDb');
  return { ...actual, default: fakeDb.pool };
});

import config from '../../src/config';
import { smsMessages } from '../../src/utils/notification';
import { resumeDir } from '../../src/utils/uploads';
import { fakeDb } from '../helpers/fakeDb';
import { applicationRow, jobRow, studentRow } from '../helpers/fixtures';
import { bearer, jsonRequest, startServer, TestServer } from '../helpers/server';

const interviewInput = {
  interview_date: '2026-11-05',
  interview_time: '14:30',
  interview_location: 'Room 204',
  interview_type: 'Technical',
};

describe('application routes', () => {
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
    fakeDb.connection.beginTransaction.mockClear();
    fakeDb.connection.commit.mockClear();
    fakeDb.connection.rollback.mockClear();
    fakeDb.connection.release.mockClear();
    create.mockReset();
    create.mockResolvedValue({ sid: 'SM-test' });
    fakeDb
      .on(/SELECT \* FROM applications WHERE id = \?/, [applicationRow()])
      .on(/SELECT \* FROM jobs WHERE id = \?/, [jobRow()])
      .on(/SELECT \* FROM students WHERE id = \?/, [studentRow()]);
  });

  describe('GET /applications/job/:jobId', () => {
    it('lists applications with the resume file type', async () => {
      fakeDb.on(/FROM applications a JOIN students s/, [
        { ...applicationRow(), resume_url: 'abc123.pdf' },
        { ...applicationRow({ id: 21, student_id: 4 }), resume_url: null },
      ]);

      const res = await fetch(`${server.baseUrl}/applications/job/10`, { headers: recruiter });

      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body).toMatchObject({
        job: { id: 10 },
        applications: [
          { id: 20, resume_file_type: 'pdf' },
          { id: 21, resume_file_type: null },
        ],
      });
      expect(body).not.toHaveProperty('applications.0.resume_url');
    });

    it('is limited to the recruiter who owns the job', async () => {
      const res = await fetch(`${server.baseUrl}/applications/job/10`, { headers: bearer('recruiter', 3) });
      expect(res.status).toBe(403);
    });
  });

  it('GET /applications/:id returns the application, job and file type', async () => {
    fakeDb.on(/SELECT \* FROM students WHERE id = \?/, [studentRow({ resume_url: 'abc123.docx' })]);

    const res = await fetch(`${server.baseUrl}/applications/20`, { headers: recruiter });

    expect(await res.json()).toMatchObject({ application: { id: 20 }, job: { id: 10 }, file_type: 'docx' });
  });

  describe('PATCH /applications/:id/status', () => {
    const patch = (body: unknown, headers = recruiter) =>
      fetch(`${server.baseUrl}/applications/20/status`, jsonRequest('PATCH', headers, body));

    it('notifies the student in app and by SMS when shortlisted', async () => {
      const res = await patch({ status: 'Shortlisted' });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        message: 'Application status updated and SMS notification sent!',
        status: 'Shortlisted',
        sms_sent: true,
      });
      expect(fakeDb.callsMatching(/UPDATE applications SET status = \?/)[0].params).toEqual(['Shortlisted', 2, 20]);
      expect(fakeDb.callsMatching(/INSERT INTO notifications/)[0].params).toEqual([
        'student',
        1,
        'Application Status Updated',
        'Your application for Graduate Engineer at Acme Systems has been updated to: Shortlisted',
      ]);
      expect(create).toHaveBeenCalledWith({
        body: smsMessages.shortlisted(jobRow()),
        from: '+15005550006',
        to: '+919876543210',
      });
    });

    it('says when the SMS could not be sent', async () => {
      create.mockRejectedValue(new Error('Twilio is down'));

      const res = await patch({ status: 'Selected' });

      expect(await res.json()).toEqual({
        message: 'Application status updated, but SMS notification could not be sent.',
        status: 'Selected',
        sms_sent: false,
      });
    });

    it('does not text for other statuses', async () => {
      const res = await patch({ status: 'Under Review' });

      expect(await res.json()).toEqual({
        message: 'Application status updated successfully!',
        status: 'Under Review',
        sms_sent: false,
      });
      expect(create).not.toHaveBeenCalled();
    });

    it('validates the status', async () => {
      const missing = await patch({});
      expect(missing.status).toBe(400);
      expect(await missing.json()).toEqual({ message: 'Status is required.' });

      const unknown = await patch({ status: 'Hired' });
      expect(unknown.status).toBe(400);
      expect(await unknown.json()).toEqual({ message: 'Invalid status.' });
    });

    it('is limited to the job owner', async () => {
      const res = await patch({ status: 'Rejected' }, bearer('recruiter', 3));

      expect(res.status).toBe(403);
      expect(fakeDb.callsMatching(/UPDATE applications/)).toHaveLength(0);
    });
  });

  describe('POST /applications/:id/schedule-interview', () => {
    it('creates the interview and moves the application on', async () => {
      const res = await fetch(
        `${server.baseUrl}/applications/20/schedule-interview`,
        jsonRequest('POST', recruiter, interviewInput)
      );

      expect(res.status).toBe(201);
      expect(await res.json()).toEqual({
        message: 'Interview scheduled successfully!',
        interview_id: 100,
        sms_sent: true,
      });

      const [insert] = fakeDb.callsMatching(/INSERT INTO interviews/);
      expect(insert.params.slice(0, 4)).toEqual([20, 10, 1, 2]);
      expect(insert.params.slice(5)).toEqual(['Room 204', 'Technical', '']);
      expect(fakeDb.callsMatching(/SET status = 'Interview Scheduled'/)[0].params).toEqual([100, 2, 20]);
      expect(fakeDb.connection.commit).toHaveBeenCalledTimes(1);

      expect(fakeDb.callsMatching(/INSERT INTO notifications/)[0].params.slice(2)).toEqual([
        'Interview Scheduled',
        'An interview has been scheduled for your application to Graduate Engineer at Acme Systems. Date: 05 Nov, 2026, Time: 14:30',
      ]);
      expect(create).toHaveBeenCalledWith(
        expect.objectContaining({
          body: 'Interview Scheduled: Technical interview for Graduate Engineer at Acme Systems on 05 Nov, 2026 at 14:30. Location: Room 204. Log in to CareerBridge for details.',
        })
      );
    });

    it('rolls back when the interview cannot be stored', async () => {
      fakeDb.on(/INSERT INTO interviews/, new Error('connection lost'));

      const res = await fetch(
        `${server.baseUrl}/applications/20/schedule-interview`,
        jsonRequest('POST', recruiter, interviewInput)
      );

      expect(res.status).toBe(500);
      expect(fakeDb.connection.rollback).toHaveBeenCalledTimes(1);
      expect(fakeDb.connection.release).toHaveBeenCalledTimes(1);
      expect(fakeDb.callsMatching(/INSERT INTO notifications/)).toHaveLength(0);
    });

    it('validates the interview', async () => {
      const res = await fetch(
        `${server.baseUrl}/applications/20/schedule-interview`,
        jsonRequest('POST', recruiter, { ...interviewInput, interview_time: '2pm' })
      );

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ message: 'Interview date and time must be valid (YYYY-MM-DD and HH:MM).' });
    });
  });

  describe('POST /applications/:id/interviews', () => {
    it('is only for selected candidates', async () => {
      const res = await fetch(`${server.baseUrl}/applications/20/interviews`, jsonRequest('POST', recruiter, interviewInput));

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ message: 'Only selected candidates can have interviews created.' });
    });

    it('keeps the application status', async () => {
      fakeDb.on(/SELECT \* FROM applications WHERE id = \?/, [applicationRow({ status: 'Selected' })]);

      const res = await fetch(`${server.baseUrl}/applications/20/interviews`, jsonRequest('POST', recruiter, interviewInput));

      expect(res.status).toBe(201);
      expect(fakeDb.callsMatching(/UPDATE applications/)).toHaveLength(0);
      expect(fakeDb.callsMatching(/INSERT INTO notifications/)[0].params[2]).toBe('Interview Created');
    });
  });

  describe('GET /applications/:id/resume-summary', () => {
    const summaryUrl = () => `${server.baseUrl}/applications/20/resume-summary`;

    beforeEach(async () => {
      post.mockReset();
      extractRawText.mockReset();
      await fs.promises.mkdir(resumeDir(), { recursive: true });
    });

    it('summarises the resume against the job', async () => {
      await fs.promises.writeFile(path.join(resumeDir(), 'summary-test.docx'), 'placeholder');
      fakeDb.on(/SELECT \* FROM students WHERE id = \?/, [studentRow({ resume_url: 'summary-test.docx' })]);
      extractRawText.mockResolvedValue({ value: 'Skilled in SQL', messages: [] });
      post.mockResolvedValue({
        data: {
          candidates: [
            {
              content: {
                parts: [{ text: '{"candidate_summary": "<p>A</p>", "key_skills": "<p>SQL</p>", "job_fit": "<p>Good</p>"}' }],
              },
            },
          ],
        },
      });

      const res = await fetch(summaryUrl(), { headers: recruiter });

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ candidate_summary: '<p>A</p>', key_skills: '<p>SQL</p>', job_fit: '<p>Good</p>' });
      expect(extractRawText).toHaveBeenCalledWith({ path: path.join(resumeDir(), 'summary-test.docx') });
    });

    it('answers 404 when the student has no resume', async () => {
      const res = await fetch(summaryUrl(), { headers: recruiter });

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ message: 'Resume not found' });
    });

    it('rejects file types it cannot read', async () => {
      await fs.promises.writeFile(path.join(resumeDir(), 'summary-test.txt'), 'plain text');
      fakeDb.on(/SELECT \* FROM students WHERE id = \?/, [studentRow({ resume_url: 'summary-test.txt' })]);

      const res = await fetch(summaryUrl(), { headers: recruiter });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ message: 'Unsupported file type' });
    });

    it('answers 503 without a Gemini key', async () => {
      const apiKey = config.gemini.apiKey;
      config.gemini.apiKey = '';
      try {
        const res = await fetch(summaryUrl(), { headers: recruiter });
        expect(res.status).toBe(503);
        expect(await res.json()).toEqual({ message: 'Resume analysis is not configured' });
      } finally {
        config.gemini.apiKey = apiKey;
      }
    });
  });
});
