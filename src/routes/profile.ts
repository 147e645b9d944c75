import path from 'path';
import { Router, Response } from 'express';
import { RowDataPacket } from 'mysql2';
import pool, { isDuplicateEntryError } from '../db';
import {
  authenticateToken,
  AuthenticatedRequest,
  currentUser,
  requireRecruiter,
  requireStudent,
} from '../middleware/authenticateToken';
import { findRecruiter, findStudent, loadPublicUser } from '../utils/lookups';
import {
  fileExists,
  fileExtension,
  photoDir,
  recruiterProfileUpload,
  removeStoredFile,
  removeUploadedFiles,
  resumeDir,
  resumeMimeType,
  secureFilename,
  studentProfileUpload,
  uploadedFile,
} from '../utils/uploads';
import { parseId, validateRecruiterProfile, validateStudentProfile } from '../utils/validation';

const router = Router();

/**
 * @swagger
 * /api/v1/profile:
 *   get:
 *     summary: Own profile
 *     tags: [Profile]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Profile of the signed-in user
 */
router.get('/', authenticateToken, async (req: AuthenticatedRequest, res: Response) => {
  const { id, userType } = currentUser(req);

  try {
    const user = await loadPublicUser(userType, id);
    if (!user) {
      return res.status(404).json({ message: 'User not found.' });
    }
    res.json(user);
  } catch (error) {
    console.error('Error fetching profile:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/profile/student:
 *   put:
 *     summary: Complete or update the student profile
 *     tags: [Profile]
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         multipart/form-data:
 *           schema:
 *             type: object
 *             properties:
 *               full_name:
 *                 type: string
 *               phone:
 *                 type: string
 *                 example: "9876543210"
 *               dob:
 *                 type: string
 *                 format: date
 *               gender:
 *                 type: string
 *               address:
 *                 type: string
 *               college:
 *                 type: string
 *               branch:
 *                 type: string
 *               degree:
 *                 type: string
 *               current_year:
 *                 type: string
 *               graduation_year:
 *                 type: integer
 *               cgpa:
 *                 type: number
 *               tenth_marks:
 *                 type: number
 *               twelfth_marks:
 *                 type: number
 *               backlogs:
 *                 type: integer
 *               technical_skills:
 *                 type: string
 *               soft_skills:
 *                 type: string
 *               certifications:
 *                 type: string
 *               resume:
 *                 type: string
 *                 format: binary
 *               profile_photo:
 *                 type: string
 *                 format: binary
 *     responses:
 *       200:
 *         description: Profile updated
 *       400:
 *         description: Validation failed or file rejected
 *       409:
 *         description: Phone number belongs to another student
 */
router.put('/student', requireStudent, studentProfileUpload, async (req: AuthenticatedRequest, res: Response) => {
  const { id } = currentUser(req);
  const resumeFile = uploadedFile(req, 'resume');
  const photoFile = uploadedFile(req, 'profile_photo');

  try {
    const student = await findStudent(id);
    if (!student) {
      await removeUploadedFiles(req);
      return res.status(404).json({ message: 'User not found.' });
    }

    const validated = validateStudentProfile(req.body, {
      stored: Boolean(student.resume_url),
      uploaded: Boolean(resumeFile),
    });
    if (!validated.ok) {
      await removeUploadedFiles(req);
      return res.status(400).json({ message: validated.error });
    }

    const [phoneOwners] = await pool.query<RowDataPacket[]>('SELECT id FROM students WHERE phone = ? AND id <> ?', [
      validated.value.phone,
      id,
    ]);
    if (phoneOwners.length) {
      await removeUploadedFiles(req);
      return res.status(409).json({ message: 'This phone number is already registered with another account.' });
    }

    const updates: Record<string, unknown> = { ...validated.value, profile_complete: true };
    if (resumeFile) {
      updates.resume_url = resumeFile.filename;
      updates.resume_filename = secureFilename(resumeFile.originalname);
      updates.resume_updated_at = new Date();
    }
    if (photoFile) {
      updates.profile_photo_url = photoFile.filename;
      updates.photo_updated_at = new Date();
    }

    await pool.query('UPDATE students SET ?, updated_at = NOW() WHERE id = ?', [updates, id]);

    if (resumeFile) await removeStoredFile(resumeDir(), student.resume_url);
    if (photoFile) await removeStoredFile(photoDir(), student.profile_photo_url);

    res.json({ message: 'Profile updated successfully!', user: await loadPublicUser('student', id) });
  } catch (error) {
    await removeUploadedFiles(req);
    if (isDuplicateEntryError(error)) {
      return res.status(409).json({ message: 'This phone number is already registered with another account.' });
    }
    console.error('Error updating student profile:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/profile/recruiter:
 *   put:
 *     summary: Complete or update the recruiter profile
 *     tags: [Profile]
 *     security:
 *       - bearerAuth: []
 *     requestBody:
 *       required: true
 *       content:
 *         multipart/form-data:
 *           schema:
 *             type: object
 *             properties:
 *               full_name:
 *                 type: string
 *               phone:
 *                 type: string
 *               company_name:
 *                 type: string
 *               company_website:
 *                 type: string
 *               linkedin_url:
 *                 type: string
 *               industry:
 *                 type: string
 *               designation:
 *                 type: string
 *               profile_photo:
 *                 type: string
 *                 format: binary
 *     responses:
 *       200:
 *         description: Profile updated
 *       400:
 *         description: Validation failed or file rejected
 *       409:
 *         description: Phone number belongs to another recruiter
 */
router.put('/recruiter', requireRecruiter, recruiterProfileUpload, async (req: AuthenticatedRequest, res: Response) => {
  const { id } = currentUser(req);
  const photoFile = uploadedFile(req, 'profile_photo');

  try {
    const recruiter = await findRecruiter(id);
    if (!recruiter) {
      await removeUploadedFiles(req);
      return res.status(404).json({ message: 'User not found.' });
    }

    const validated = validateRecruiterProfile(req.body);
    if (!validated.ok) {
      await removeUploadedFiles(req);
      return res.status(400).json({ message: validated.error });
    }

    const [phoneOwners] = await pool.query<RowDataPacket[]>(
      'SELECT id FROM recruiters WHERE phone = ? AND id <> ?',
      [validated.value.phone, id]
    );
    if (phoneOwners.length) {
      await removeUploadedFiles(req);
      return res.status(409).json({ message: 'This phone number is already registered by another recruiter.' });
    }

    const updates: Record<string, unknown> = { ...validated.value, profile_complete: true };
    if (photoFile) {
      updates.profile_photo_url = photoFile.filename;
      updates.photo_updated_at = new Date();
    }

    await pool.query('UPDATE recruiters SET ?, updated_at = NOW() WHERE id = ?', [updates, id]);
    if (photoFile) await removeStoredFile(photoDir(), recruiter.profile_photo_url);

    res.json({ message: 'Profile updated successfully!', user: await loadPublicUser('recruiter', id) });
  } catch (error) {
    await removeUploadedFiles(req);
    if (isDuplicateEntryError(error)) {
      return res.status(409).json({ message: 'This phone number is already registered by another recruiter.' });
    }
    console.error('Error updating recruiter profile:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/profile/students/{id}:
 *   get:
 *     summary: A student's profile (recruiters, or the student themself)
 *     tags: [Profile]
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
 *         description: Student profile
 *       403:
 *         description: Another student's profile
 *       404:
 *         description: Student not found
 */
router.get('/students/:id', authenticateToken, async (req: AuthenticatedRequest, res: Response) => {
  const user = currentUser(req);
  const studentId = parseId(req.params.id);
  if (studentId === null) {
    return res.status(400).json({ message: 'Invalid id' });
  }
  if (user.userType === 'student' && user.id !== studentId) {
    return res.status(403).json({ message: 'You do not have permission to view this profile.' });
  }

  try {
    const student = await loadPublicUser('student', studentId);
    if (!student) {
      return res.status(404).json({ message: 'Student not found' });
    }
    res.json(student);
  } catch (error) {
    console.error('Error fetching student profile:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

type ResumeLookup =
  | { ok: true; filePath: string; extension: string; downloadName: string }
  | { ok: false; status: number; message: string };

const locateResume = async (req: AuthenticatedRequest): Promise<ResumeLookup> => {
  const user = currentUser(req);
  const studentId = parseId(req.params.studentId);
  if (studentId === null) return { ok: false, status: 400, message: 'Invalid id' };
  if (user.userType === 'student' && user.id !== studentId) {
    return { ok: false, status: 403, message: 'You do not have permission to access this resume.' };
  }

  const student = await findStudent(studentId);
  if (!student) return { ok: false, status: 404, message: 'Student not found' };
  if (!student.resume_url) return { ok: false, status: 404, message: 'Resume not found' };

  const filePath = path.join(resumeDir(), path.basename(student.resume_url));
  if (!(await fileExists(filePath))) return { ok: false, status: 404, message: 'Resume file not found' };

  const extension = fileExtension(student.resume_url);
  const owner = secureFilename((student.full_name || student.username).replace(/\s+/g, '_')) || 'Student';
  return { ok: true, filePath, extension, downloadName: `${owner}_Resume.${extension}` };
};

/**
 * @swagger
 * /api/v1/profile/resume/{studentId}:
 *   get:
 *     summary: Download a student's resume
 *     tags: [Profile]
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: path
 *         name: studentId
 *         required: true
 *         schema:
 *           type: integer
 *     responses:
 *       200:
 *         description: The resume as an attachment
 *       404:
 *         description: No resume on file
 */
router.get('/resume/:studentId', authenticateToken, async (req: AuthenticatedRequest, res: Response) => {
  try {
    const resume = await locateResume(req);
    if (!resume.ok) {
      return res.status(resume.status).json({ message: resume.message });
    }
    res.download(resume.filePath, resume.downloadName);
  } catch (error) {
    console.error('Error downloading resume:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/profile/resume/{studentId}/view:
 *   get:
 *     summary: View a student's resume inline (Word documents are downloaded)
 *     tags: [Profile]
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: path
 *         name: studentId
 *         required: true
 *         schema:
 *           type: integer
 *     responses:
 *       200:
 *         description: The resume file
 *       404:
 *         description: No resume on file
 */
router.get('/resume/:studentId/view', authenticateToken, async (req: AuthenticatedRequest, res: Response) => {
  try {
    const resume = await locateResume(req);
    if (!resume.ok) {
      return res.status(resume.status).json({ message: resume.message });
    }

    // Browsers cannot render Word documents
    if (resume.extension === 'doc' || resume.extension === 'docx') {
      return res.download(resume.filePath, resume.downloadName);
    }

    res.setHeader('Content-Type', resumeMimeType(resume.extension));
    res.setHeader('Content-Disposition', `inline; filename="${resume.downloadName}"`);
    res.sendFile(resume.filePath);
  } catch (error) {
    console.error('Error viewing resume:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/profile/photos/{filename}:
 *   get:
 *     summary: A stored profile photo
 *     tags: [Profile]
 *     parameters:
 *       - in: path
 *         name: filename
 *         required: true
 *         schema:
 *           type: string
 *     responses:
 *       200:
 *         description: The photo
 *       404:
 *         description: Photo not found
 */
router.get('/photos/:filename', async (req, res) => {
  const filePath = path.join(photoDir(), path.basename(req.params.filename));

  try {
    if (!(await fileExists(filePath))) {
      return res.status(404).json({ message: 'Photo not found' });
    }
    res.sendFile(filePath);
  } catch (error) {
    console.error('Error serving profile photo:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

export default router;
