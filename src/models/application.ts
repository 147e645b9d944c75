import { RowDataPacket } from 'mysql2';

export const APPLICATION_STATUSES = [
  'Applied',
  'Under Review',
  'Shortlisted',
  'Interview Scheduled',
  'Selected',
  'Rejected',
] as const;

export type ApplicationStatus = (typeof APPLICATION_STATUSES)[number];

export const isApplicationStatus = (value: unknown): value is ApplicationStatus =>
  APPLICATION_STATUSES.some((status) => status === value);

export interface Application {
  id: number;
  job_id: number;
  student_id: number;
  student_name: string;
  student_email: string;
  student_phone: string | null;
  student_cgpa: number;
  student_branch: string;
  job_title: string;
  company_name: string;
  status: ApplicationStatus;
  interview_id: number | null;
  status_updated_at: Date | null;
  status_updated_by: number | null;
  created_at: Date;
}

export type ApplicationRow = RowDataPacket & Application;
