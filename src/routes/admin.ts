import { Router, Response } from 'express';
import bcrypt from 'bcrypt';
import { RowDataPacket } from 'mysql2';
import pool, { isDuplicateEntryError } from '../db';
import { AuthenticatedRequest, currentUser, requireAdmin } from '../middleware/authenticateToken';
import { isUserType, UserType, USER_TABLES } from '../models/user';
import { getUserActivityData, logAdminEvent, parseLogLine, readLogLines } from '../utils/adminLog';
import { findStudent, findUser, loadPublicUser } from '../utils/lookups';
import { photoDir, removeStoredFile, resumeDir } from '../utils/uploads';
import { EMAIL_REGEX, parseId, readString } from '../utils/validation';

const router = Router();

router.use(requireAdmin);

const auditOptions = (req: AuthenticatedRequest) => ({ userEmail: currentUser(req).email, ip: req.ip });

const readFlag = (value: unknown) =>
  value === true || value === 1 || (typeof value === 'string' && ['true', '1', 'on'].includes(value.toLowerCase()));

const capitalize = (value: string) => value.charAt(0).toUpperCase() + value.slice(1);

type TargetLookup =
  | { ok: true; userType: UserType; id: number; email: string; username: string }
  | { ok: false; status: number; message: string };

const findTarget = async (req: AuthenticatedRequest): Promise<TargetLookup> => {
  const userType = req.params.type;
  if (!isUserType(userType)) return { ok: false, status: 400, message: 'Invalid user type.' };

  const id = parseId(req.params.id);
  if (id === null) return { ok: false, status: 400, message: 'Invalid id' };

  const user = await findUser(userType, id);
  if (!user) return { ok: false, status: 404, message: 'User not found.' };
  return { ok: true, userType, id, email: user.email, username: user.username };
};

const isSelf = (req: AuthenticatedRequest, userType: UserType, id: number) => {
  const admin = currentUser(req);
  return admin.userType === userType && admin.id === id;
};

/**
 * @swagger
 * /api/v1/admin/dashboard:
 *   get:
 *     summary: Platform statistics for administrators
 *     tags: [Admin]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Totals, login statistics, recent activity and the 7-day user activity chart
 *       403:
 *         description: Administrator privileges required
 */
router.get('/dashboard', async (req: AuthenticatedRequest, res: Response) => {
  try {
    const [countRows] = await pool.query<RowDataPacket[]>(
      `SELECT
        (SELECT COUNT(*) FROM students) AS total_students,
        (SELECT COUNT(*) FROM recruiters) AS total_recruiters,
        (SELECT COUNT(*) FROM students WHERE is_admin = true) AS admin_students,
        (SELECT COUNT(*) FROM recruiters WHERE is_admin = true) AS admin_recruiters,
        (SELECT COUNT(*) FROM students WHERE last_login >= NOW() - INTERVAL 1 DAY) AS students_logged_in_today,
        (SELECT COUNT(*) FROM recruiters WHERE last_login >= NOW() - INTERVAL 1 DAY) AS recruiters_logged_in_today,
        (SELECT COUNT(*) FROM students WHERE last_login IS NULL) AS students_never_logged_in,
        (SELECT COUNT(*) FROM recruiters WHERE last_login IS NULL) AS recruiters_never_logged_in,
        (SELECT COUNT(*) FROM students WHERE created_at >= NOW() - INTERVAL 7 DAY) AS recent_students,
        (SELECT COUNT(*) FROM recruiters WHERE created_at >= NOW() - INTERVAL 7 DAY) AS recent_recruiters,
        (SELECT COUNT(*) FROM jobs) AS total_jobs,
        (SELECT COUNT(*) FROM applications) AS total_applications,
        (SELECT COUNT(*) FROM jobs WHERE created_at >= NOW() - INTERVAL 7 DAY) AS recent_jobs,
        (SELECT COUNT(*) FROM applications WHERE created_at >= NOW() - INTERVAL 7 DAY) AS recent_applications`
    );
    const counts: RowDataPacket | undefined = countRows[0];
    const count = (key: string) => Number(counts?.[key] ?? 0);

    const [statusRows] = await pool.query<RowDataPacket[]>(
      'SELECT status, COUNT(*) AS count FROM applications GROUP BY status'
    );
    const applicationStatuses: Record<string, number> = {};
    for (const row of statusRows) {
      applicationStatuses[String(row.status)] = Number(row.count);
    }

    const [recentStudents] = await pool.query<RowDataPacket[]>(
      'SELECT id, username, email, full_name, created_at, last_login FROM students ORDER BY created_at DESC LIMIT 5'
    );
    const [recentRecruiters] = await pool.query<RowDataPacket[]>(
      'SELECT id, username, email, full_name, company_name, created_at, last_login FROM recruiters ORDER BY created_at DESC LIMIT 5'
    );

    const loginActivities = (await readLogLines()).slice(-50).filter((line) => line.includes('LOGIN_'));
    const userActivity = await getUserActivityData(7);

    await logAdminEvent('admin_dashboard_access', 'Admin accessed dashboard', auditOptions(req));

    res.json({
      totals: {
        users: count('total_students') + count('total_recruiters'),
        students: count('total_students'),
        recruiters: count('total_recruiters'),
        admins: count('admin_students') + count('admin_recruiters'),
        jobs: count('total_jobs'),
        applications: count('total_applications'),
      },
      logged_in_today: {
        total: count('students_logged_in_today') + count('recruiters_logged_in_today'),
        students: count('students_logged_in_today'),
        recruiters: count('recruiters_logged_in_today'),
      },
      never_logged_in: {
        total: count('students_never_logged_in') + count('recruiters_never_logged_in'),
        students: count('students_never_logged_in'),
        recruiters: count('recruiters_never_logged_in'),
      },
      last_7_days: {
        users: count('recent_students') + count('recent_recruiters'),
        students: count('recent_students'),
        recruiters: count('recent_recruiters'),
        jobs: count('recent_jobs'),
        applications: count('recent_applications'),
      },
      application_statuses: applicationStatuses,
      recent_students: recentStudents,
      recent_recruiters: recentRecruiters,
      login_activities: loginActivities,
      user_activity: userActivity,
    });
  } catch (error) {
    console.error('Error building admin dashboard:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/admin/users:
 *   get:
 *     summary: All students and recruiters, newest first
 *     tags: [Admin]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Users tagged with user_type
 */
router.get('/users', async (req: AuthenticatedRequest, res: Response) => {
  try {
    const [students] = await pool.query<RowDataPacket[]>(
      'SELECT id, username, email, phone, full_name, is_admin, profile_complete, last_login, created_at FROM students'
    );
    const [recruiters] = await pool.query<RowDataPacket[]>(
      'SELECT id, username, email, phone, full_name, company_name, is_admin, profile_complete, last_login, created_at FROM recruiters'
    );

    const users = [
      ...students.map((student) => ({ ...student, user_type: 'student' })),
      ...recruiters.map((recruiter) => ({ ...recruiter, user_type: 'recruiter' })),
    ].sort((a: RowDataPacket, b: RowDataPacket) => new Date(b.created_at).getTime() - new Date(a.created_at).getTime());

    await logAdminEvent('admin_users_view', 'Admin viewed user list', auditOptions(req));
    res.json(users);
  } catch (error) {
    console.error('Error listing users:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/admin/users/{type}/{id}:
 *   patch:
 *     summary: Edit a user's account details
 *     tags: [Admin]
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: path
 *         name: type
 *         required: true
 *         schema:
 *           type: string
 *           enum: [student, recruiter]
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
 *               username:
 *                 type: string
 *               email:
 *                 type: string
 *               phone:
 *                 type: string
 *               is_admin:
 *                 type: boolean
 *               password:
 *                 type: string
 *     responses:
 *       200:
 *         description: User updated
 *       400:
 *         description: Invalid user type or input
 *       404:
 *         description: User not found
 */
router.patch('/users/:type/:id', async (req: AuthenticatedRequest, res: Response) => {
  const body: Record<string, unknown> = req.body ?? {};
  const username = readString(body.username);
  const email = readString(body.email);
  const phone = readString(body.phone);
  const password = readString(body.password, false);

  try {
    const target = await findTarget(req);
    if (!target.ok) {
      return res.status(target.status).json({ message: target.message });
    }

    if (!username) return res.status(400).json({ message: 'Username is required.' });
    if (!email) return res.status(400).json({ message: 'Email is required.' });
    if (!EMAIL_REGEX.test(email)) return res.status(400).json({ message: 'Please enter a valid email address.' });

    const updates: Record<string, unknown> = {
      username,
      email,
      phone: phone || null,
      is_admin: readFlag(body.is_admin),
    };
    if (password) {
      updates.password = await bcrypt.hash(password, 10);
    }

    await pool.query(`UPDATE ${USER_TABLES[target.userType]} SET ?, updated_at = NOW() WHERE id = ?`, [
      updates,
      target.id,
    ]);
    await logAdminEvent('admin_user_edit', `Admin edited user ${email}`, auditOptions(req));

    res.json({ message: 'User updated successfully.', user: await loadPublicUser(target.userType, target.id) });
  } catch (error) {
    if (isDuplicateEntryError(error)) {
      return res.status(409).json({ message: 'Username, email or phone number is already in use.' });
    }
    console.error('Error updating user:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/admin/users/{type}/{id}:
 *   delete:
 *     summary: Delete a user and everything that belongs to them
 *     tags: [Admin]
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: path
 *         name: type
 *         required: true
 *         schema:
 *           type: string
 *           enum: [student, recruiter]
 *       - in: path
 *         name: id
 *         required: true
 *         schema:
 *           type: integer
 *     responses:
 *       200:
 *         description: User deleted
 *       400:
 *         description: Invalid user type, or the admin's own account
 */
router.delete('/users/:type/:id', async (req: AuthenticatedRequest, res: Response) => {
  try {
    const target = await findTarget(req);
    if (!target.ok) {
      return res.status(target.status).json({ message: target.message });
    }
    if (isSelf(req, target.userType, target.id)) {
      return res.status(400).json({ message: 'You cannot delete your own account.' });
    }

    const student = target.userType === 'student' ? await findStudent(target.id) : null;

    await pool.query(`DELETE FROM ${USER_TABLES[target.userType]} WHERE id = ?`, [target.id]);

    if (student) {
      await removeStoredFile(resumeDir(), student.resume_url);
      await removeStoredFile(photoDir(), student.profile_photo_url);
    }

    await logAdminEvent('admin_user_delete', `Admin deleted ${target.userType} ${target.email}`, auditOptions(req));
    res.json({ message: `${capitalize(target.userType)} user deleted successfully.` });
  } catch (error) {
    console.error('Error deleting user:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/admin/users/{type}/{id}/make-admin:
 *   post:
 *     summary: Grant admin privileges
 *     tags: [Admin]
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: path
 *         name: type
 *         required: true
 *         schema:
 *           type: string
 *           enum: [student, recruiter]
 *       - in: path
 *         name: id
 *         required: true
 *         schema:
 *           type: integer
 *     responses:
 *       200:
 *         description: User promoted
 */
router.post('/users/:type/:id/make-admin', async (req: AuthenticatedRequest, res: Response) => {
  try {
    const target = await findTarget(req);
    if (!target.ok) {
      return res.status(target.status).json({ message: target.message });
    }

    await pool.query(`UPDATE ${USER_TABLES[target.userType]} SET is_admin = true WHERE id = ?`, [target.id]);
    await logAdminEvent(
      'admin_make_admin',
      `Admin granted admin privileges to ${target.userType} ${target.email}`,
      auditOptions(req)
    );
    res.json({ message: 'User has been granted admin privileges.' });
  } catch (error) {
    console.error('Error granting admin privileges:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/admin/users/{type}/{id}/revoke-admin:
 *   post:
 *     summary: Revoke admin privileges
 *     tags: [Admin]
 *     security:
 *       - bearerAuth: []
 *     parameters:
 *       - in: path
 *         name: type
 *         required: true
 *         schema:
 *           type: string
 *           enum: [student, recruiter]
 *       - in: path
 *         name: id
 *         required: true
 *         schema:
 *           type: integer
 *     responses:
 *       200:
 *         description: User demoted
 *       400:
 *         description: The admin's own account
 */
router.post('/users/:type/:id/revoke-admin', async (req: AuthenticatedRequest, res: Response) => {
  try {
    const target = await findTarget(req);
    if (!target.ok) {
      return res.status(target.status).json({ message: target.message });
    }
    if (isSelf(req, target.userType, target.id)) {
      return res.status(400).json({ message: 'You cannot revoke your own admin privileges.' });
    }

    await pool.query(`UPDATE ${USER_TABLES[target.userType]} SET is_admin = false WHERE id = ?`, [target.id]);
    await logAdminEvent(
      'admin_demotion',
      `Admin privileges revoked from ${target.userType} ${target.email}`,
      auditOptions(req)
    );
    res.json({ message: `Admin privileges revoked from ${target.username}.` });
  } catch (error) {
    console.error('Error revoking admin privileges:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/admin/logs:
 *   get:
 *     summary: Audit log entries, newest first
 *     tags: [Admin]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Parsed log entries
 */
router.get('/logs', async (req: AuthenticatedRequest, res: Response) => {
  try {
    const entries = (await readLogLines()).map(parseLogLine).reverse();
    await logAdminEvent('admin_logs_view', 'Admin viewed logs', auditOptions(req));
    res.json(entries);
  } catch (error) {
    console.error('Error reading admin logs:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

export default router;
