import path from 'path';
import { Router, Response } from 'express';
import pool from '../db';
import { AuthenticatedRequest, currentUser, requireRecruiter } from '../middleware/authenticateToken';
import { ApplicationRow, isApplicationStatus } from '../models/application';
import { scheduleInterview } from '../utils/interviews';
import { findJob, findOwnedApplication, findStudent } from '../utils/lookups';
import { createNotification, notifyStudentSelected, notifyStudentShortlisted } from '../utils/notification';
import { extractResumeText, UnsupportedResumeTypeError } from '../utils/resumeText';
import { generateResumeSummary, isResumeAnalysisConfigured } from '../utils/resumeAnalysis';
import { fileExists, fileExtension, resumeDir } from '../utils/uploads';
import { parseId, readString, validateInterview } from '../utils/validation';

const router = Router();

/**
 * @swagger
 * components:
 *   schemas:
 *     InterviewInput:
 *       type: object
 *       required:
 *         - interview_date
 *         - interview_time
 *         - interview_location
 *         - interview_type
 *       properties:
 *         interview_date:
 *           type: string
 *           format: date
 *           example: "2026-11-05"
 *         interview_time:
 *           type: string
 *           example: "14:30"
 *         interview_location:
 *           type: string
 *           example: "Room 204"
 *         interview_type:
 *           type: string
 *           enum: ['In-person', 'Phone', 'Video', 'Technical', 'HR', 'Group Discussion']
 *         interview_details:
 *           type: string
 */

const resumeFileType = (resumeUrl: string | null | undefined) => (resumeUrl ? fileExtension(resumeUrl) : null);

/**
 * @swagger
 * /api/v1/applications/job/{jobId}:
 *   get:
 *     summary: Applications for one of the recruiter's jobs
 *     tags: [Applications]
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: path
 *         name: jobId
 *         required: true
 *         schema:
 *           type: integer
 *     responses:
 *       200:
 *         description: The job and its applications, newest first
 *       403:
 *         description: Not the owner of the job
 *       404:
 *         description: Job not found
 */
router.get('/job/:jobId', requireRecruiter, async (req: AuthenticatedRequest, res: Response) => {
  const { id } = currentUser(req);
  const jobId = parseId(req.params.jobId);
  if (jobId === null) {
    return res.status(400).json({ message: 'Invalid id' });
  }

  try {
    const job = await findJob(jobId);
    if (!job) {
      return res.status(404).json({ message: 'Job not found' });
    }
    if (job.recruiter_id !== id) {
      return res.status(403).json({ message: 'You do not have permission to view these applications.' });
    }

    const [applications] = await pool.query<(ApplicationRow & { resume_url: string | null })[]>(
      `SELECT a.*, s.resume_url FROM applications a JOIN students s ON s.id = a.student_id
       WHERE a.job_id = ? ORDER BY a.created_at DESC`,
      [jobId]
    );

    res.json({
      job,
      applications: applications.map(({ resume_url, ...application }) => ({
        ...application,
        resume_file_type: resumeFileType(resume_url),
      })),
    });
  } catch (error) {
    console.error('Error fetching job applications:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/applications/{id}:
 *   get:
 *     summary: Application details
 *     tags: [Applications]
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
 *         description: Application, job and the resume file type
 */
router.get('/:id', requireRecruiter, async (req: AuthenticatedRequest, res: Response) => {
  const { id } = currentUser(req);
  const applicationId = parseId(req.params.id);
  if (applicationId === null) {
    return res.status(400).json({ message: 'Invalid id' });
  }

  try {
    const owned = await findOwnedApplication(applicationId, id);
    if (!owned.ok) {
      return res.status(owned.status).json({ message: owned.message });
    }

    const student = await findStudent(owned.application.student_id);
    res.json({
      application: owned.application,
      job: owned.job,
      file_type: resumeFileType(student?.resume_url),
    });
  } catch (error) {
    console.error('Error fetching application:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/applications/{id}/status:
 *   patch:
 *     summary: Change an application's status
 *     tags: [Applications]
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
 *             type: object
 *             properties:
 *               status:
 *                 type: string
 *                 enum: ['Applied', 'Under Review', 'Shortlisted', 'Interview Scheduled', 'Selected', 'Rejected']
 *     responses:
 *       200:
 *         description: Status updated; sms_sent tells whether the student got an SMS
 *       400:
 *         description: Missing or unknown status
 */
router.patch('/:id/status', requireRecruiter, async (req: AuthenticatedRequest, res: Response) => {
  const { id } = currentUser(req);
  const applicationId = parseId(req.params.id);
  if (applicationId === null) {
    return res.status(400).json({ message: 'Invalid id' });
  }

  const status = readString(req.body?.status);
  if (!status) {
    return res.status(400).json({ message: 'Status is required.' });
  }
  if (!isApplicationStatus(status)) {
    return res.status(400).json({ message: 'Invalid status.' });
  }

  try {
    const owned = await findOwnedApplication(applicationId, id);
    if (!owned.ok) {
      return res.status(owned.status).json({ message: owned.message });
    }
    const { application, job } = owned;

    await pool.query(
      'UPDATE applications SET status = ?, status_updated_at = NOW(), status_updated_by = ? WHERE id = ?',
      [status, id, applicationId]
    );

    await createNotification(
      { userType: 'student', id: application.student_id },
      'Application Status Updated',
      `Your application for ${job.title} at ${job.company_name} has been updated to: ${status}`
    );

    let smsSent = false;
    let smsAttempted = false;
    if (status === 'Shortlisted' || status === 'Selected') {
      const student = await findStudent(application.student_id);
      if (student) {
        smsAttempted = true;
        smsSent =
          status === 'Shortlisted'
            ? await notifyStudentShortlisted(student, job)
            : await notifyStudentSelected(student, job);
      }
    }

    let message = 'Application status updated successfully!';
    if (smsAttempted) {
      message = smsSent
        ? 'Application status updated and SMS notification sent!'
        : 'Application status updated, but SMS notification could not be sent.';
    }

    res.json({ message, status, sms_sent: smsSent });
  } catch (error) {
    console.error('Error updating application status:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/applications/{id}/schedule-interview:
 *   post:
 *     summary: Schedule an interview and move the application to Interview Scheduled
 *     tags: [Applications]
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
 *             $ref: '#/components/schemas/InterviewInput'
 *     responses:
 *       201:
 *         description: Interview scheduled
 */
router.post('/:id/schedule-interview', requireRecruiter, async (req: AuthenticatedRequest, res: Response) => {
  const { id } = currentUser(req);
  const applicationId = parseId(req.params.id);
  if (applicationId === null) {
    return res.status(400).json({ message: 'Invalid id' });
  }

  const validated = validateInterview(req.body ?? {});
  if (!validated.ok) {
    return res.status(400).json({ message: validated.error });
  }

  try {
    const owned = await findOwnedApplication(applicationId, id);
    if (!owned.ok) {
      return res.status(owned.status).json({ message: owned.message });
    }

    const { interviewId, smsSent } = await scheduleInterview(owned.application, owned.job, id, validated.value, {
      markApplication: true,
    });
    res.status(201).json({ message: 'Interview scheduled successfully!', interview_id: interviewId, sms_sent: smsSent });
  } catch (error) {
    console.error('Error scheduling interview:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/applications/{id}/interviews:
 *   post:
 *     summary: Create an interview for a selected candidate
 *     tags: [Applications]
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
 *             $ref: '#/components/schemas/InterviewInput'
 *     responses:
 *       201:
 *         description: Interview created
 *       400:
 *         description: Application is not Selected
 */
router.post('/:id/interviews', requireRecruiter, async (req: AuthenticatedRequest, res: Response) => {
  const { id } = currentUser(req);
  const applicationId = parseId(req.params.id);
  if (applicationId === null) {
    return res.status(400).json({ message: 'Invalid id' });
  }

  try {
    const owned = await findOwnedApplication(applicationId, id);
    if (!owned.ok) {
      return res.status(owned.status).json({ message: owned.message });
    }
    if (owned.application.status !== 'Selected') {
      return res.status(400).json({ message: 'Only selected candidates can have interviews created.' });
    }

    const validated = validateInterview(req.body ?? {});
    if (!validated.ok) {
      return res.status(400).json({ message: validated.error });
    }

    const { interviewId, smsSent } = await scheduleInterview(owned.application, owned.job, id, validated.value, {
      markApplication: false,
    });
    res.status(201).json({ message: 'Interview created successfully!', interview_id: interviewId, sms_sent: smsSent });
  } catch (error) {
    console.error('Error creating interview:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/applications/{id}/resume-summary:
 *   get:
 *     summary: AI summary of the applicant's resume against the job
 *     tags: [Applications]
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
 *         description: candidate_summary, key_skills and job_fit as HTML
 *       404:
 *         description: Application, job or resume not found
 *       503:
 *         description: Resume analysis is not configured
 */
router.get('/:id/resume-summary', requireRecruiter, async (req: AuthenticatedRequest, res: Response) => {
  const { id } = currentUser(req);
  const applicationId = parseId(req.params.id);
  if (applicationId === null) {
    return res.status(400).json({ message: 'Invalid id' });
  }
  if (!isResumeAnalysisConfigured()) {
    return res.status(503).json({ message: 'Resume analysis is not configured' });
  }

  try {
    const owned = await findOwnedApplication(applicationId, id);
    if (!owned.ok) {
      return res.status(owned.status).json({ message: owned.message });
    }

    const student = await findStudent(owned.application.student_id);
    if (!student?.resume_url) {
      return res.status(404).json({ message: 'Resume not found' });
    }

    const filePath = path.join(resumeDir(), path.basename(student.resume_url));
    if (!(await fileExists(filePath))) {
      return res.status(404).json({ message: 'Resume file not found' });
    }

    const text = await extractResumeText(filePath, fileExtension(student.resume_url));
    const summary = await generateResumeSummary(text, {
      title: owned.job.title,
      description: owned.job.description,
    });
    res.json(summary);
  } catch (error) {
    if (error instanceof UnsupportedResumeTypeError) {
      return res.status(400).json({ message: 'Unsupported file type' });
    }
    console.error('Error generating resume summary:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

export default router;
