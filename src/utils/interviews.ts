import { ResultSetHeader } from 'mysql2';
import pool from '../db';
import { Application } from '../models/application';
import { InterviewResult } from '../models/interview';
import { Job } from '../models/job';
import { findStudent } from './lookups';
import {
  createNotification,
  formatInterviewDate,
  formatInterviewTime,
  notifyStudentInterviewResult,
  notifyStudentInterviewScheduled,
  notifyStudentSelected,
} from './notification';
import { InterviewInput } from './validation';

export interface ScheduleOptions {
  // Moves the application to "Interview Scheduled" and links the interview to it.
  markApplication: boolean;
}

/**
 * Creates a scheduled interview for an application and tells the student in
 * app and by SMS.
 */
export const scheduleInterview = async (
  application: Application,
  job: Job,
  recruiterId: number,
  input: InterviewInput,
  options: ScheduleOptions
) => {
  const connection = await pool.getConnection();
  let interviewId: number;

  try {
    await connection.beginTransaction();

    const [result] = await connection.query<ResultSetHeader>(
      `INSERT INTO interviews (application_id, job_id, student_id, recruiter_id, interview_datetime, interview_location, interview_type, interview_details, status, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, 'Scheduled', NOW())`,
      [
        application.id,
        job.id,
        application.student_id,
        recruiterId,
        input.interview_datetime,
        input.interview_location,
        input.interview_type,
        input.interview_details,
      ]
    );
    interviewId = result.insertId;

    if (options.markApplication) {
      await connection.query(
        "UPDATE applications SET status = 'Interview Scheduled', interview_id = ?, status_updated_at = NOW(), status_updated_by = ? WHERE id = ?",
        [interviewId, recruiterId, application.id]
      );
    }

    await connection.commit();
  } catch (error) {
    await connection.rollback();
    throw error;
  } finally {
    connection.release();
  }

  const when = input.interview_datetime;
  const verb = options.markApplication ? 'scheduled' : 'created';
  await createNotification(
    { userType: 'student', id: application.student_id },
    options.markApplication ? 'Interview Scheduled' : 'Interview Created',
    `An interview has been ${verb} for your application to ${job.title} at ${job.company_name}. Date: ${formatInterviewDate(when)}, Time: ${formatInterviewTime(when)}`
  );

  const student = await findStudent(application.student_id);
  const smsSent = student
    ? await notifyStudentInterviewScheduled(student, job, {
        interview_datetime: when,
        interview_type: input.interview_type,
        interview_location: input.interview_location,
      })
    : false;

  return { interviewId, smsSent };
};

export class InterviewClosedError extends Error {
  constructor() {
    super('This interview has already been completed or cancelled.');
  }
}

/**
 * Completes an interview, moves its application to Selected or Rejected and
 * notifies the student. Throws InterviewClosedError when the interview is no
 * longer scheduled at write time.
 */
export const recordInterviewResult = async (
  interviewId: number,
  application: Application,
  job: Job,
  recruiterId: number,
  result: InterviewResult,
  feedback: string
) => {
  const status = result === 'Pass' ? 'Selected' : 'Rejected';
  const connection = await pool.getConnection();

  try {
    await connection.beginTransaction();
    const [completed] = await connection.query<ResultSetHeader>(
      "UPDATE interviews SET status = 'Completed', result = ?, feedback = ?, completed_at = NOW(), completed_by = ? WHERE id = ? AND status = 'Scheduled'",
      [result, feedback, recruiterId, interviewId]
    );
    if (completed.affectedRows === 0) {
      throw new InterviewClosedError();
    }
    await connection.query(
      'UPDATE applications SET status = ?, status_updated_at = NOW(), status_updated_by = ? WHERE id = ?',
      [status, recruiterId, application.id]
    );
    await connection.commit();
  } catch (error) {
    await connection.rollback();
    throw error;
  } finally {
    connection.release();
  }

  await createNotification(
    { userType: 'student', id: application.student_id },
    `Interview Result: ${result}`,
    `Your interview for ${job.title} at ${job.company_name} has been marked as ${result}. ${feedback}`.trim()
  );

  const student = await findStudent(application.student_id);
  let smsSent = false;
  if (student) {
    smsSent = await notifyStudentInterviewResult(student, job, result);
    if (result === 'Pass') {
      await notifyStudentSelected(student, job);
    }
  }

  return { status, smsSent };
};
