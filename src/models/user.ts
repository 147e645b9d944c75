import { RowDataPacket } from 'mysql2';

export type UserType = 'student' | 'recruiter';

export const USER_TABLES: Record<UserType, 'students' | 'recruiters'> = {
  student: 'students',
  recruiter: 'recruiters',
};

export const isUserType = (value: unknown): value is UserType => value === 'student' || value === 'recruiter';

interface BaseUser {
  id: number;
  username: string;
  email: string;
  password: string;
  full_name: string | null;
  phone: string | null;
  profile_photo_url: string | null;
  photo_updated_at: Date | null;
  profile_complete: 0 | 1;
  is_admin: 0 | 1;
  last_login: Date | null;
  created_at: Date;
  updated_at: Date;
}

export interface Student extends BaseUser {
  dob: Date | null;
  gender: string | null;
  address: string | null;
  college: string | null;
  branch: string | null;
  degree: string | null;
  current_year: string | null;
  graduation_year: number | null;
  cgpa: number | null;
  tenth_marks: number | null;
  twelfth_marks: number | null;
  backlogs: number;
  technical_skills: string | null;
  soft_skills: string | null;
  certifications: string | null;
  resume_url: string | null;
  resume_filename: string | null;
  resume_updated_at: Date | null;
}

export interface Recruiter extends BaseUser {
  company_name: string | null;
  company_website: string | null;
  linkedin_url: string | null;
  industry: string | null;
  designation: string | null;
  verified: 0 | 1;
}

export type StudentRow = RowDataPacket & Student;
export type RecruiterRow = RowDataPacket & Recruiter;

export type PublicStudent = Omit<Student, 'password'> & { user_type: 'student' };
export type PublicRecruiter = Omit<Recruiter, 'password'> & { user_type: 'recruiter' };

export const toPublicStudent = ({ password, ...student }: Student): PublicStudent => ({
  ...student,
  user_type: 'student',
});

export const toPublicRecruiter = ({ password, ...recruiter }: Recruiter): PublicRecruiter => ({
  ...recruiter,
  user_type: 'recruiter',
});
