import { Router, Response } from 'express';
import { ResultSetHeader, RowDataPacket } from 'mysql2';
import pool, { isDuplicateEntryError } from '../db';
import {
  AuthenticatedRequest,
  currentUser,
  optionalAuth,
  requireRecruiter,
  requireStudent,
} from '../middleware/authenticateToken';
import { BRANCHES, JOB_TYPES, Job, JobRow } from '../models/job';
import { ApplicationRow } from '../models/application';
import { isDeadlinePassed, isEligible } from '../utils/eligibility';
import { findJob, findRecruiter, findStudent } from '../utils/lookups';
import { isEmailConfigured, sendApplicationConfirmationEmail } from '../utils/notification';
import { parseId, parseNumber, readString, validateJob } from '../utils/validation';

const router = Router();

/**
 * @swagger
 * components:
 *   schemas:
 *     Job:
 *       type: object
 *       required:
 *         - title
 *         - description
 *         - company_name
 *         - location
 *         - job_type
 *         - min_cgpa
 *         - eligible_branches
 *         - application_deadline
 *       properties:
 *         title:
 *           type: string
 *           example: "Graduate Software Engineer"
 *         description:
 *           type: string
 *           example: "Build and maintain internal web services."
 *         company_name:
 *           type: string
 *           example: "Acme Systems"
 *         location:
 *           type: string
 *           example: "Pune"
 *         job_type:
 *           type: string
 *           enum: ['Full-time', 'Part-time', 'Internship', 'Contract', 'Remote']
 *         salary_range:
 *           type: string
 *           example: "6-8 LPA"
 *         min_cgpa:
 *           type: number
 *           example: 7.5
 *         eligible_branches:
 *           type: array
 *           items:
 *             type: string
 *             example: "Computer Science"
 *         application_deadline:
 *           type: string
 *           format: date
 *           example: "2026-12-31"
 */

interface JobFilters {
  min_cgpa: string;
  branch: string;
  company: string;
  location: string;
  job_type: string;
}

const distinctSorted = (values: (string | null)[]) =>
  [...new Set(values.filter((value): value is string => Boolean(value)))].sort();

/**
 * @swagger
 * /api/v1/jobs:
 *   get:
 *     summary: List jobs, newest first
 *     tags: [Jobs]
 *     parameters:
 *       - in: query
 *         name: min_cgpa
 *         schema:
 *           type: number
 *         description: Jobs whose minimum CGPA is at most this value
 *       - in: query
 *         name: branch
 *         schema:
 *           type: string
 *       - in: query
 *         name: company
 *         schema:
 *           type: string
 *       - in: query
 *         name: location
 *         schema:
 *           type: string
 *       - in: query
 *         name: job_type
 *         schema:
 *           type: string
 *     responses:
 *       200:
 *         description: Jobs, the applied filters and the filter options
 */
router.get('/', optionalAuth, async (req: AuthenticatedRequest, res: Response) => {
  const filters: JobFilters = {
    min_cgpa: readString(req.query.min_cgpa),
    branch: readString(req.query.branch),
    company: readString(req.query.company),
    location: readString(req.query.location),
    job_type: readString(req.query.job_type),
  };

  const conditions: string[] = [];
  const params: (string | number)[] = [];

  const minCgpa = parseNumber(filters.min_cgpa);
  if (minCgpa !== null) {
    conditions.push('min_cgpa <= ?');
    params.push(minCgpa);
  }
  if (filters.branch) {
    conditions.push('JSON_CONTAINS(eligible_branches, ?)');
    params.push(JSON.stringify(filters.branch));
  }
  if (filters.company) {
    conditions.push('LOWER(company_name) LIKE ?');
    params.push(`%${filters.company.toLowerCase()}%`);
  }
  if (filters.location) {
    conditions.push('LOWER(location) LIKE ?');
    params.push(`%${filters.location.toLowerCase()}%`);
  }
  if (filters.job_type) {
    conditions.push('job_type = ?');
    params.push(filters.job_type);
  }

  const where = conditions.length ? `WHERE ${conditions.join(' AND ')}` : '';

  try {
    const [jobs] = await pool.query<JobRow[]>(`SELECT * FROM jobs ${where} ORDER BY created_at DESC`, params);
    const [optionRows] = await pool.query<RowDataPacket[]>('SELECT company_name, location FROM jobs');

    const options = {
      branches: BRANCHES,
      companies: distinctSorted(optionRows.map((row) => row.company_name)),
      job_types: JOB_TYPES,
      locations: distinctSorted(optionRows.map((row) => row.location)),
    };

    let listed: (Job & { is_eligible?: boolean })[] = jobs;
    const user = req.user;
    if (user?.userType === 'student') {
      const student = await findStudent(user.id);
      if (student) {
        listed = jobs.map((job) => ({ ...job, is_eligible: isEligible(student, job) }));
      }
    }

    res.json({ jobs: listed, filters, options });
  } catch (error) {
    console.error('Error fetching jobs:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/jobs/options:
 *   get:
 *     summary: Branches and job types accepted on job postings
 *     tags: [Jobs]
 *     responses:
 *       200:
 *         description: Allowed values
 */
router.get('/options', (_req, res) => {
  res.json({ branches: BRANCHES, job_types: JOB_TYPES });
});

/**
 * @swagger
 * /api/v1/jobs:
 *   post:
 *     summary: Post a job
 *     tags: [Jobs]
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/Job'
 *     responses:
 *       201:
 *         description: Job created
 *       400:
 *         description: Validation failed
 */
router.post('/', requireRecruiter, async (req: AuthenticatedRequest, res: Response) => {
  const { id } = currentUser(req);
  const validated = validateJob(req.body, { requireCompany: true });
  if (!validated.ok) {
    return res.status(400).json({ message: validated.error });
  }
  const job = validated.value;

  try {
    const recruiter = await findRecruiter(id);

    const [result] = await pool.query<ResultSetHeader>(
      'INSERT INTO jobs (title, description, company_name, location, job_type, salary_range, min_cgpa, eligible_branches, application_deadline, recruiter_id, recruiter_name, created_at) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, NOW())',
      [
        job.title,
        job.description,
        job.company_name,
        job.location,
        job.job_type,
        job.salary_range,
        job.min_cgpa,
        JSON.stringify(job.eligible_branches),
        job.application_deadline,
        id,
        recruiter?.full_name || 'Recruiter',
      ]
    );

    res.status(201).json({ message: 'Job posted successfully!', job: await findJob(result.insertId) });
  } catch (error) {
    console.error('Error creating job:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/jobs/mine:
 *   get:
 *     summary: Jobs posted by the signed-in recruiter
 *     tags: [Jobs]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Jobs with their application counts
 */
router.get('/mine', requireRecruiter, async (req: AuthenticatedRequest, res: Response) => {
  const { id } = currentUser(req);

  try {
    const [jobs] = await pool.query<JobRow[]>(
      `SELECT j.*, (SELECT COUNT(*) FROM applications a WHERE a.job_id = j.id) AS application_count
       FROM jobs j WHERE j.recruiter_id = ? ORDER BY j.created_at DESC`,
      [id]
    );
    res.json(jobs);
  } catch (error) {
    console.error('Error fetching recruiter jobs:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/jobs/applications/mine:
 *   get:
 *     summary: Applications of the signed-in student
 *     tags: [Jobs]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Applications with their job details, newest first
 */
router.get('/applications/mine', requireStudent, async (req: AuthenticatedRequest, res: Response) => {
  const { id } = currentUser(req);

  try {
    const [applications] = await pool.query<ApplicationRow[]>(
      `SELECT a.*, j.location AS job_location, j.job_type, j.salary_range, j.application_deadline
       FROM applications a JOIN jobs j ON j.id = a.job_id
       WHERE a.student_id = ? ORDER BY a.created_at DESC`,
      [id]
    );
    res.json(applications);
  } catch (error) {
    console.error('Error fetching student applications:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/jobs/{id}:
 *   get:
 *     summary: Job details
 *     tags: [Jobs]
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema:
 *           type: integer
 *     responses:
 *       200:
 *         description: The job; students also get is_eligible and has_applied
 *       404:
 *         description: Job not found
 */
router.get('/:id', optionalAuth, async (req: AuthenticatedRequest, res: Response) => {
  const jobId = parseId(req.params.id);
  if (jobId === null) {
    return res.status(400).json({ message: 'Invalid id' });
  }

  try {
    const job = await findJob(jobId);
    if (!job) {
      return res.status(404).json({ message: 'Job not found' });
    }

    const user = req.user;
    if (user?.userType === 'student') {
      const student = await findStudent(user.id);
      const [applied] = await pool.query<RowDataPacket[]>(
        'SELECT id FROM applications WHERE job_id = ? AND student_id = ?',
        [jobId, user.id]
      );
      return res.json({
        ...job,
        is_eligible: student ? isEligible(student, job) : false,
        has_applied: applied.length > 0,
      });
    }

    res.json(job);
  } catch (error) {
    console.error('Error fetching job:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/jobs/{id}:
 *   put:
 *     summary: Update a job (owner only; the company name is kept)
 *     tags: [Jobs]
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema:
 *           type: integer
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/Job'
 *     responses:
 *       200:
 *         description: Job updated
 *       403:
 *         description: Not the owner
 *       404:
 *         description: Job not found
 */
router.put('/:id', requireRecruiter, async (req: AuthenticatedRequest, res: Response) => {
  const { id } = currentUser(req);
  const jobId = parseId(req.params.id);
  if (jobId === null) {
    return res.status(400).json({ message: 'Invalid id' });
  }

  try {
    const existing = await findJob(jobId);
    if (!existing) {
      return res.status(404).json({ message: 'Job not found' });
    }
    if (existing.recruiter_id !== id) {
      return res.status(403).json({ message: 'You do not have permission to edit this job.' });
    }

    const validated = validateJob(req.body, { requireCompany: false });
    if (!validated.ok) {
      return res.status(400).json({ message: validated.error });
    }
    const job = validated.value;

    await pool.query(
      'UPDATE jobs SET title = ?, description = ?, location = ?, job_type = ?, salary_range = ?, min_cgpa = ?, eligible_branches = ?, application_deadline = ?, updated_at = NOW() WHERE id = ?',
      [
        job.title,
        job.description,
        job.location,
        job.job_type,
        job.salary_range,
        job.min_cgpa,
        JSON.stringify(job.eligible_branches),
        job.application_deadline,
        jobId,
      ]
    );

    res.json({ message: 'Job updated successfully!', job: await findJob(jobId) });
  } catch (error) {
    console.error('Error updating job:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/jobs/{id}:
 *   delete:
 *     summary: Delete a job with its applications and interviews (owner only)
 *     tags: [Jobs]
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema:
 *           type: integer
 *     responses:
 *       200:
 *         description: Job deleted
 *       403:
 *         description: Not the owner
 *       404:
 *         description: Job not found
 */
router.delete('/:id', requireRecruiter, async (req: AuthenticatedRequest, res: Response) => {
  const { id } = currentUser(req);
  const jobId = parseId(req.params.id);
  if (jobId === null) {
    return res.status(400).json({ message: 'Invalid id' });
  }

  try {
    const job = await findJob(jobId);
    if (!job) {
      return res.status(404).json({ message: 'Job not found' });
    }
    if (job.recruiter_id !== id) {
      return res.status(403).json({ message: 'You do not have permission to delete this job.' });
    }

    // Applications and interviews go with it (ON DELETE CASCADE)
    await pool.query('DELETE FROM jobs WHERE id = ?', [jobId]);
    res.json({ message: 'Job deleted successfully!' });
  } catch (error) {
    console.error('Error deleting job:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/jobs/{id}/apply:
 *   post:
 *     summary: Apply for a job
 *     tags: [Jobs]
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: path
 *         name: id
 *         required: true
 *         schema:
 *           type: integer
 *     responses:
 *       201:
 *         description: Application submitted
 *       400:
 *         description: Profile incomplete or deadline passed
 *       403:
 *         description: Eligibility criteria not met
 *       409:
 *         description: Already applied
 */
router.post('/:id/apply', requireStudent, async (req: AuthenticatedRequest, res: Response) => {
  const { id } = currentUser(req);
  const jobId = parseId(req.params.id);
  if (jobId === null) {
    return res.status(400).json({ message: 'Invalid id' });
  }

  try {
    const job = await findJob(jobId);
    if (!job) {
      return res.status(404).json({ message: 'Job not found' });
    }

    const student = await findStudent(id);
    if (!student) {
      return res.status(404).json({ message: 'User not found.' });
    }
    if (!student.profile_complete) {
      return res.status(400).json({ message: 'Please complete your profile before applying for jobs.' });
    }
    if (isDeadlinePassed(job.application_deadline)) {
      return res.status(400).json({ message: 'The application deadline for this job has passed.' });
    }

    const [existing] = await pool.query<RowDataPacket[]>(
      'SELECT id FROM applications WHERE job_id = ? AND student_id = ?',
      [jobId, id]
    );
    if (existing.length) {
      return res.status(409).json({ message: 'You have already applied for this job.' });
    }

    if (!isEligible(student, job)) {
      return res.status(403).json({ message: 'You do not meet the eligibility criteria for this job.' });
    }

    const studentName = student.full_name || student.username;
    const [result] = await pool.query<ResultSetHeader>(
      `INSERT INTO applications (job_id, student_id, student_name, student_email, student_phone, student_cgpa, student_branch, job_title, company_name, status, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, 'Applied', NOW())`,
      [
        jobId,
        id,
        studentName,
        student.email,
        student.phone,
        student.cgpa ?? 0,
        student.branch ?? '',
        job.title,
        job.company_name,
      ]
    );

    if (isEmailConfigured()) {
      await sendApplicationConfirmationEmail(student.email, studentName, job.title, job.company_name);
    }

    res.status(201).json({ message: 'Application submitted successfully!', application_id: result.insertId });
  } catch (error) {
    if (isDuplicateEntryError(error)) {
      return res.status(409).json({ message: 'You have already applied for this job.' });
    }
    console.error('Error applying for job:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

export default router;
