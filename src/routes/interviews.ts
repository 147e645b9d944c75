import { Router, Response } from 'express';
import pool from '../db';
import {
  authenticateToken,
  AuthenticatedRequest,
  currentUser,
  requireRecruiter,
} from '../middleware/authenticateToken';
import { ApplicationRow } from '../models/application';
import { InterviewRow, InterviewResult } from '../models/interview';
import { toPublicStudent } from '../models/user';
import { InterviewClosedError, recordInterviewResult, scheduleInterview } from '../utils/interviews';
import { findApplication, findInterview, findJob, findOwnedApplication, findStudent } from '../utils/lookups';
import { parseId, readString, validateInterview } from '../utils/validation';

const router = Router();

const isInterviewResult = (value: string): value is InterviewResult => value === 'Pass' || value === 'Fail';

// Interview with its job, application and (for recruiters) the student.
const withDetails = async (interview: InterviewRow, includeStudent: boolean) => {
  const [job, application] = await Promise.all([
    findJob(interview.job_id),
    findApplication(interview.application_id),
  ]);
  const student = includeStudent ? await findStudent(interview.student_id) : null;
  return {
    ...interview,
    job,
    application,
    ...(includeStudent ? { student: student ? toPublicStudent(student) : null } : {}),
  };
};

/**
 * @swagger
 * /api/v1/interviews:
 *   get:
 *     summary: Interviews of the signed-in student or recruiter
 *     tags: [Interviews]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Interviews in date order; recruiters also get their selected applications
 */
router.get('/', authenticateToken, async (req: AuthenticatedRequest, res: Response) => {
  const { id, userType } = currentUser(req);
  const column = userType === 'student' ? 'student_id' : 'recruiter_id';

  try {
    const [interviews] = await pool.query<InterviewRow[]>(
      `SELECT * FROM interviews WHERE ${column} = ? ORDER BY interview_datetime ASC`,
      [id]
    );
    const detailed = await Promise.all(interviews.map((interview) => withDetails(interview, userType === 'recruiter')));

    if (userType === 'student') {
      return res.json({ interviews: detailed });
    }

    const [selected] = await pool.query<ApplicationRow[]>(
      `SELECT a.* FROM applications a JOIN jobs j ON j.id = a.job_id
       WHERE j.recruiter_id = ? AND a.status = 'Selected' ORDER BY a.created_at DESC`,
      [id]
    );
    res.json({ interviews: detailed, selected_applications: selected });
  } catch (error) {
    console.error('Error fetching interviews:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/interviews:
 *   post:
 *     summary: Create an interview for one of the recruiter's applications
 *     tags: [Interviews]
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             allOf:
 *               - $ref: '#/components/schemas/InterviewInput'
 *               - type: object
 *                 required:
 *                   - application_id
 *                 properties:
 *                   application_id:
 *                     type: integer
 *     responses:
 *       201:
 *         description: Interview created
 *       400:
 *         description: Validation failed
 */
router.post('/', requireRecruiter, async (req: AuthenticatedRequest, res: Response) => {
  const { id } = currentUser(req);
  const body: Record<string, unknown> = req.body ?? {};
  const applicationId =
    typeof body.application_id === 'number' && Number.isInteger(body.application_id)
      ? body.application_id
      : parseId(readString(body.application_id) || undefined);

  if (applicationId === null) {
    return res.status(400).json({ message: 'Student is required.' });
  }

  const validated = validateInterview(body);
  if (!validated.ok) {
    return res.status(400).json({ message: validated.error });
  }

  try {
    const owned = await findOwnedApplication(applicationId, id);
    if (!owned.ok) {
      return res.status(owned.status).json({ message: owned.message });
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
 * /api/v1/interviews/{id}:
 *   get:
 *     summary: Interview details (participants only)
 *     tags: [Interviews]
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
 *         description: Interview with job, application and student
 *       403:
 *         description: Not a participant
 *       404:
 *         description: Interview not found
 */
router.get('/:id', authenticateToken, async (req: AuthenticatedRequest, res: Response) => {
  const user = currentUser(req);
  const interviewId = parseId(req.params.id);
  if (interviewId === null) {
    return res.status(400).json({ message: 'Invalid id' });
  }

  try {
    const interview = await findInterview(interviewId);
    if (!interview) {
      return res.status(404).json({ message: 'Interview not found' });
    }

    const participant = user.userType === 'student' ? interview.student_id : interview.recruiter_id;
    if (participant !== user.id) {
      return res.status(403).json({ message: 'You do not have permission to view this interview.' });
    }

    res.json(await withDetails(interview, true));
  } catch (error) {
    console.error('Error fetching interview:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/interviews/{id}/result:
 *   post:
 *     summary: Record the outcome of a scheduled interview
 *     tags: [Interviews]
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
 *               result:
 *                 type: string
 *                 enum: ['Pass', 'Fail']
 *               feedback:
 *                 type: string
 *     responses:
 *       200:
 *         description: Result recorded, application moved to Selected or Rejected
 *       409:
 *         description: Interview already completed or cancelled
 */
router.post('/:id/result', requireRecruiter, async (req: AuthenticatedRequest, res: Response) => {
  const { id } = currentUser(req);
  const interviewId = parseId(req.params.id);
  if (interviewId === null) {
    return res.status(400).json({ message: 'Invalid id' });
  }

  const result = readString(req.body?.result);
  const feedback = readString(req.body?.feedback);

  try {
    const interview = await findInterview(interviewId);
    if (!interview) {
      return res.status(404).json({ message: 'Interview not found' });
    }
    if (interview.recruiter_id !== id) {
      return res.status(403).json({ message: 'You do not have permission to update this interview.' });
    }
    if (interview.status !== 'Scheduled') {
      return res.status(409).json({ message: 'This interview has already been completed or cancelled.' });
    }

    if (!result) {
      return res.status(400).json({ message: 'Result is required.' });
    }
    if (!isInterviewResult(result)) {
      return res.status(400).json({ message: 'Result must be Pass or Fail.' });
    }

    const application = await findApplication(interview.application_id);
    if (!application) {
      return res.status(404).json({ message: 'Application not found' });
    }
    const job = await findJob(interview.job_id);
    if (!job) {
      return res.status(404).json({ message: 'Job not found' });
    }

    const outcome = await recordInterviewResult(interviewId, application, job, id, result, feedback);
    res.json({
      message: 'Interview result updated successfully!',
      application_status: outcome.status,
      sms_sent: outcome.smsSent,
    });
  } catch (error) {
    if (error instanceof InterviewClosedError) {
      return res.status(409).json({ message: error.message });
    }
    console.error('Error recording interview result:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

export default router;
