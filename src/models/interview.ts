import { RowDataPacket } from 'mysql2';

export const INTERVIEW_TYPES = ['In-person', 'Phone', 'Video', 'Technical', 'HR', 'Group Discussion'] as const;

export type InterviewStatus = 'Scheduled' | 'Completed' | 'Cancelled';
export type InterviewResult = 'Pass' | 'Fail';

export interface Interview {
  id: number;
  application_id: number;
  job_id: number;
  student_id: number;
  recruiter_id: number;
  interview_datetime: Date;
  interview_location: string;
  interview_type: string;
  interview_details: string | null;
  status: InterviewStatus;
  result: InterviewResult | null;
  feedback: string | null;
  completed_at: Date | null;
  completed_by: number | null;
  created_at: Date;
}

export type InterviewRow = RowDataPacket & Interview;
