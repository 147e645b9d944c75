import { RowDataPacket } from 'mysql2';

export const BRANCHES = [
  'Computer Science',
  'Information Technology',
  'Electronics',
  'Electrical',
  'Mechanical',
  'Civil',
  'Chemical',
  'Biotechnology',
  'Other',
] as const;

export const JOB_TYPES = ['Full-time', 'Part-time', 'Internship', 'Contract', 'Remote'] as const;

export interface Job {
  id: number;
  title: string;
  description: string;
  company_name: string;
  location: string;
  job_type: string;
  salary_range: string | null;
  min_cgpa: number;
  eligible_branches: string[] | null;
  application_deadline: Date;
  recruiter_id: number;
  recruiter_name: string;
  created_at: Date;
  updated_at: Date | null;
}

export type JobRow = RowDataPacket & Job;
