import { RowDataPacket } from 'mysql2';
import pool from '../db';
import { StudentRow, RecruiterRow, toPublicRecruiter, toPublicStudent, UserType, USER_TABLES } from '../models/user';
import { JobRow } from '../models/job';
import { ApplicationRow } from '../models/application';
import { InterviewRow } from '../models/interview';

const findById = async <T extends RowDataPacket>(table: string, id: number): Promise<T | null> => {
  const [rows] = await pool.query<T[]>(`SELECT * FROM ${table} WHERE id = ?`, [id]);
  return rows[0] ?? null;
};

export const findStudent = (id: number) => findById<StudentRow>('students', id);
export const findRecruiter = (id: number) => findById<RecruiterRow>('recruiters', id);
export const findJob = (id: number) => findById<JobRow>('jobs', id);
export const findApplication = (id: number) => findById<ApplicationRow>('applications', id);
export const findInterview = (id: number) => findById<InterviewRow>('interviews', id);

export const findUser = (userType: UserType, id: number) =>
  userType === 'student' ? findStudent(id) : findRecruiter(id);

export const findUserByEmail = async (userType: UserType, email: string) => {
  const [rows] = await pool.query<(StudentRow | RecruiterRow)[]>(
    `SELECT * FROM ${USER_TABLES[userType]} WHERE email = ?`,
    [email]
  );
  return rows[0] ?? null;
};

export const countUsers = async (): Promise<number> => {
  const [rows] = await pool.query<RowDataPacket[]>(
    'SELECT (SELECT COUNT(*) FROM students) + (SELECT COUNT(*) FROM recruiters) AS total'
  );
  return Number(rows[0]?.total ?? 0);
};

// The user without the password hash, tagged with its type.
export const loadPublicUser = async (userType: UserType, id: number) => {
  if (userType === 'student') {
    const student = await findStudent(id);
    return student ? toPublicStudent(student) : null;
  }
  const recruiter = await findRecruiter(id);
  return recruiter ? toPublicRecruiter(recruiter) : null;
};

export type OwnedApplication =
  | { ok: true; application: ApplicationRow; job: JobRow }
  | { ok: false; status: number; message: string };

/** An application together with its job, when the job belongs to the recruiter. */
export const findOwnedApplication = async (applicationId: number, recruiterId: number): Promise<OwnedApplication> => {
  const application = await findApplication(applicationId);
  if (!application) return { ok: false, status: 404, message: 'Application not found' };

  const job = await findJob(application.job_id);
  if (!job) return { ok: false, status: 404, message: 'Job not found' };
  if (job.recruiter_id !== recruiterId) {
    return { ok: false, status: 403, message: 'You do not have permission to manage this application.' };
  }
  return { ok: true, application, job };
};
