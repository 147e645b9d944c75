import { Student, Recruiter } from '../../src/models/user';
import { Job } from '../../src/models/job';
import { Application } from '../../src/models/application';
import { Interview } from '../../src/models/interview';

const created = new Date(2026, 8, 1, 10, 0, 0);

export const studentRow = (overrides: Partial<Student> = {}): Student => ({
  id: 1,
  username: 'asha',
  email: 'asha@example.com',
  password: 'not-a-real-hash',
  full_name: 'Asha Rao',
  phone: '+919876543210',
  profile_photo_url: null,
  photo_updated_at: null,
  profile_complete: 1,
  is_admin: 0,
  last_login: null,
  created_at: created,
  updated_at: created,
  dob: new Date(2003, 3, 15),
  gender: 'Female',
  address: '12 Lake Road',
  college: 'City Engineering College',
  branch: 'Computer Science',
  degree: 'B.Tech',
  current_year: '4',
  graduation_year: 2026,
  cgpa: 8.4,
  tenth_marks: 91,
  twelfth_marks: 88,
  backlogs: 0,
  technical_skills: 'TypeScript, SQL',
  soft_skills: 'Teamwork',
  certifications: null,
  resume_url: null,
  resume_filename: null,
  resume_updated_at: null,
  ...overrides,
});

export const recruiterRow = (overrides: Partial<Recruiter> = {}): Recruiter => ({
  id: 2,
  username: 'ravi',
  email: 'ravi@example.com',
  password: 'not-a-real-hash',
  full_name: 'Ravi Menon',
  phone: '+919123456780',
  profile_photo_url: null,
  photo_updated_at: null,
  profile_complete: 1,
  is_admin: 0,
  last_login: null,
  created_at: created,
  updated_at: created,
  company_name: 'Acme Systems',
  company_website: null,
  linkedin_url: null,
  industry: 'Software',
  designation: 'Talent Lead',
  verified: 1,
  ...overrides,
});

export const jobRow = (overrides: Partial<Job> = {}): Job => ({
  id: 10,
  title: 'Graduate Engineer',
  description: 'Build and maintain internal services.',
  company_name: 'Acme Systems',
  location: 'Pune',
  job_type: 'Full-time',
  salary_range: '6-8 LPA',
  min_cgpa: 7,
  eligible_branches: ['Computer Science', 'Electronics'],
  application_deadline: new Date(2099, 0, 31),
  recruiter_id: 2,
  recruiter_name: 'Ravi Menon',
  created_at: created,
  updated_at: null,
  ...overrides,
});

export const applicationRow = (overrides: Partial<Application> = {}): Application => ({
  id: 20,
  job_id: 10,
  student_id: 1,
  student_name: 'Asha Rao',
  student_email: 'asha@example.com',
  student_phone: '+919876543210',
  student_cgpa: 8.4,
  student_branch: 'Computer Science',
  job_title: 'Graduate Engineer',
  company_name: 'Acme Systems',
  status: 'Applied',
  interview_id: null,
  status_updated_at: null,
  status_updated_by: null,
  created_at: created,
  ...overrides,
});

export const interviewRow = (overrides: Partial<Interview> = {}): Interview => ({
  id: 30,
  application_id: 20,
  job_id: 10,
  student_id: 1,
  recruiter_id: 2,
  interview_datetime: new Date(2026, 10, 5, 14, 30),
  interview_location: 'Room 204',
  interview_type: 'Technical',
  interview_details: null,
  status: 'Scheduled',
  result: null,
  feedback: null,
  completed_at: null,
  completed_by: null,
  created_at: created,
  ...overrides,
});
