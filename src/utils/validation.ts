import { BRANCHES, JOB_TYPES } from '../models/job';
import { INTERVIEW_TYPES } from '../models/interview';

export const EMAIL_REGEX = /^[\w.-]+@[\w.-]+\.\w+$/;
export const PASSWORD_REGEX = /^(?=.*[a-z])(?=.*[A-Z])(?=.*\d).{8,}$/;
export const PHONE_REGEX = /^[6-9]\d{9}$/;
const DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_REGEX = /^([01]\d|2[0-3]):([0-5]\d)$/;
const CONTROL_CHARS_REGEX = /[\u0000-\u001f\u007f]/;

export const PASSWORD_RULE_MESSAGE =
  'Password must be at least 8 characters long, contain an uppercase letter, a lowercase letter, and a digit.';

export type Validated<T> = { ok: true; value: T } | { ok: false; error: string };

const fail = <T>(error: string): Validated<T> => ({ ok: false, error });

const oneOf = (allowed: readonly string[], value: string) => allowed.includes(value);

export const readString = (value: unknown, trim = true): string => {
  if (typeof value !== 'string') return '';
  return trim ? value.trim() : value;
};

// Accepts a JSON array or a single form value.
export const readStringList = (value: unknown): string[] => {
  const values = Array.isArray(value) ? value : [value];
  return values.map((item) => readString(item)).filter((item) => item !== '');
};

export const parseId = (value: string | undefined): number | null =>
  value !== undefined && /^\d+$/.test(value) ? Number(value) : null;

export const parseNumber = (value: string): number | null => {
  if (value === '') return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
};

/** Parses `YYYY-MM-DD` as a local calendar date, rejecting impossible days. */
export const parseDate = (value: string): Date | null => {
  const match = DATE_REGEX.exec(value);
  if (!match) return null;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(year, month - 1, day);
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) return null;
  return date;
};

export const parseDateTime = (dateValue: string, timeValue: string): Date | null => {
  const date = parseDate(dateValue);
  const time = TIME_REGEX.exec(timeValue);
  if (!date || !time) return null;
  date.setHours(Number(time[1]), Number(time[2]), 0, 0);
  return date;
};

export interface RegistrationInput {
  username: string;
  email: string;
  password: string;
}

export const validateRegistration = (body: Record<string, unknown>): Validated<RegistrationInput> => {
  const username = readString(body.username);
  const email = readString(body.email);
  const password = readString(body.password, false);
  const confirmPassword = readString(body.confirm_password, false);

  if (!username) return fail('Username is required.');
  if (CONTROL_CHARS_REGEX.test(username)) return fail('Username cannot contain line breaks or control characters.');
  if (!email) return fail('Email is required.');
  if (!EMAIL_REGEX.test(email)) return fail('Please enter a valid email address.');
  if (!password) return fail('Password is required.');
  if (!confirmPassword) return fail('Please confirm your password.');
  if (password !== confirmPassword) return fail('Passwords do not match.');
  if (!PASSWORD_REGEX.test(password)) return fail(PASSWORD_RULE_MESSAGE);

  return { ok: true, value: { username, email, password } };
};

export const validateLogin = (body: Record<string, unknown>): Validated<{ email: string; password: string }> => {
  const email = readString(body.email);
  const password = readString(body.password, false);

  if (!email) return fail('Email is required.');
  if (!EMAIL_REGEX.test(email)) return fail('Please enter a valid email address.');
  if (!password) return fail('Password is required.');

  return { ok: true, value: { email, password } };
};

export interface StudentProfileInput {
  full_name: string;
  phone: string;
  dob: Date;
  gender: string;
  address: string;
  college: string;
  branch: string;
  degree: string;
  current_year: string;
  graduation_year: number;
  cgpa: number;
  tenth_marks: number | null;
  twelfth_marks: number | null;
  backlogs: number;
  technical_skills: string;
  soft_skills: string;
  certifications: string;
}

export const validateStudentProfile = (
  body: Record<string, unknown>,
  resume: { stored: boolean; uploaded: boolean }
): Validated<StudentProfileInput> => {
  const field = (name: string) => readString(body[name]);
  const phone = field('phone');
  const dob = field('dob');
  const graduationYear = field('graduation_year');
  const cgpa = field('cgpa');

  const required: [string, string][] = [
    ['full_name', 'Full name is required.'],
    ['phone', 'Phone number is required.'],
  ];
  for (const [name, message] of required) {
    if (!field(name)) return fail(message);
  }
  if (!PHONE_REGEX.test(phone)) {
    return fail('Please enter a valid 10-digit phone number starting with 6, 7, 8, or 9.');
  }

  const remaining: [string, string][] = [
    ['dob', 'Date of birth is required.'],
    ['gender', 'Gender is required.'],
    ['address', 'Address is required.'],
    ['college', 'College name is required.'],
    ['branch', 'Branch is required.'],
    ['degree', 'Degree is required.'],
    ['current_year', 'Current year is required.'],
    ['graduation_year', 'Graduation year is required.'],
    ['cgpa', 'CGPA is required.'],
  ];
  for (const [name, message] of remaining) {
    if (!field(name)) return fail(message);
  }
  if (!resume.stored && !resume.uploaded) {
    return fail('Resume is required. Please upload your resume in PDF, Word (doc/docx), or JPEG format.');
  }

  const dobDate = parseDate(dob);
  if (!dobDate) return fail('Date of birth must be a valid date (YYYY-MM-DD).');

  const year = parseNumber(graduationYear);
  if (year === null || !Number.isInteger(year)) return fail('Graduation year must be a whole number.');

  const cgpaValue = parseNumber(cgpa);
  if (cgpaValue === null || cgpaValue < 0 || cgpaValue > 10) return fail('CGPA must be a number between 0 and 10.');

  const optionalNumber = (name: string, message: string): Validated<number | null> => {
    const raw = field(name);
    if (!raw) return { ok: true, value: null };
    const parsed = parseNumber(raw);
    return parsed === null ? fail(message) : { ok: true, value: parsed };
  };

  const tenth = optionalNumber('tenth_marks', '10th marks must be a number.');
  if (!tenth.ok) return tenth;
  const twelfth = optionalNumber('twelfth_marks', '12th marks must be a number.');
  if (!twelfth.ok) return twelfth;
  const backlogs = optionalNumber('backlogs', 'Backlogs must be a whole number.');
  if (!backlogs.ok) return backlogs;
  if (backlogs.value !== null && (!Number.isInteger(backlogs.value) || backlogs.value < 0)) {
    return fail('Backlogs must be a whole number.');
  }

  return {
    ok: true,
    value: {
      full_name: field('full_name'),
      phone: `+91${phone}`,
      dob: dobDate,
      gender: field('gender'),
      address: field('address'),
      college: field('college'),
      branch: field('branch'),
      degree: field('degree'),
      current_year: field('current_year'),
      graduation_year: year,
      cgpa: cgpaValue,
      tenth_marks: tenth.value,
      twelfth_marks: twelfth.value,
      backlogs: backlogs.value ?? 0,
      technical_skills: field('technical_skills'),
      soft_skills: field('soft_skills'),
      certifications: field('certifications'),
    },
  };
};

export interface RecruiterProfileInput {
  full_name: string;
  phone: string;
  company_name: string;
  company_website: string;
  linkedin_url: string;
  industry: string;
  designation: string;
}

export const validateRecruiterProfile = (body: Record<string, unknown>): Validated<RecruiterProfileInput> => {
  const field = (name: string) => readString(body[name]);
  const phone = field('phone');

  if (!field('full_name')) return fail('Full name is required.');
  if (!phone) return fail('Phone number is required.');
  if (!PHONE_REGEX.test(phone)) {
    if (phone.length !== 10) return fail('Please enter a valid 10-digit phone number.');
    if (!['6', '7', '8', '9'].includes(phone[0])) return fail('Phone number must start with 6, 7, 8, or 9.');
    return fail('Please enter a valid 10-digit phone number.');
  }
  if (!field('company_name')) return fail('Company name is required.');
  if (!field('industry')) return fail('Industry is required.');
  if (!field('designation')) return fail('Your designation is required.');

  return {
    ok: true,
    value: {
      full_name: field('full_name'),
      phone: `+91${phone}`,
      company_name: field('company_name'),
      company_website: field('company_website'),
      linkedin_url: field('linkedin_url'),
      industry: field('industry'),
      designation: field('designation'),
    },
  };
};

export interface JobInput {
  title: string;
  description: string;
  company_name: string;
  location: string;
  job_type: string;
  salary_range: string;
  min_cgpa: number;
  eligible_branches: string[];
  application_deadline: Date;
}

/** Job fields as posted by a recruiter. Updates keep the stored company name. */
export const validateJob = (
  body: Record<string, unknown>,
  options: { requireCompany: boolean }
): Validated<JobInput> => {
  const field = (name: string) => readString(body[name]);
  const minCgpa = typeof body.min_cgpa === 'number' ? String(body.min_cgpa) : field('min_cgpa');
  const branches = readStringList(body.eligible_branches);
  const deadline = field('application_deadline');

  if (!field('title')) return fail('Title is required.');
  if (!field('description')) return fail('Description is required.');
  if (options.requireCompany && !field('company_name')) return fail('Company name is required.');
  if (!field('location')) return fail('Location is required.');
  if (!field('job_type')) return fail('Job type is required.');
  if (!minCgpa) return fail('Minimum CGPA is required.');
  if (!branches.length) return fail('At least one eligible branch is required.');
  if (!deadline) return fail('Application deadline is required.');

  if (!oneOf(JOB_TYPES, field('job_type'))) return fail('Invalid job type.');

  const cgpa = parseNumber(minCgpa);
  if (cgpa === null || cgpa < 0 || cgpa > 10) return fail('Minimum CGPA must be a number between 0 and 10.');

  const unknownBranch = branches.find((branch) => !oneOf(BRANCHES, branch));
  if (unknownBranch) return fail(`Invalid branch: ${unknownBranch}.`);

  const deadlineDate = parseDate(deadline);
  if (!deadlineDate) return fail('Application deadline must be a valid date (YYYY-MM-DD).');

  return {
    ok: true,
    value: {
      title: field('title'),
      description: field('description'),
      company_name: field('company_name'),
      location: field('location'),
      job_type: field('job_type'),
      salary_range: field('salary_range'),
      min_cgpa: cgpa,
      eligible_branches: branches,
      application_deadline: deadlineDate,
    },
  };
};

export interface InterviewInput {
  interview_datetime: Date;
  interview_date: string;
  interview_time: string;
  interview_location: string;
  interview_type: string;
  interview_details: string;
}

export const validateInterview = (body: Record<string, unknown>): Validated<InterviewInput> => {
  const field = (name: string) => readString(body[name]);

  if (!field('interview_date')) return fail('Interview date is required.');
  if (!field('interview_time')) return fail('Interview time is required.');
  if (!field('interview_location')) return fail('Interview location is required.');
  if (!field('interview_type')) return fail('Interview type is required.');

  if (!oneOf(INTERVIEW_TYPES, field('interview_type'))) {
    return fail('Invalid interview type.');
  }

  const when = parseDateTime(field('interview_date'), field('interview_time'));
  if (!when) return fail('Interview date and time must be valid (YYYY-MM-DD and HH:MM).');

  return {
    ok: true,
    value: {
      interview_datetime: when,
      interview_date: field('interview_date'),
      interview_time: field('interview_time'),
      interview_location: field('interview_location'),
      interview_type: field('interview_type'),
      interview_details: field('interview_details'),
    },
  };
};
