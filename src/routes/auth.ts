import { Router, Request, Response } from 'express';
import bcrypt from 'bcrypt';
import { ResultSetHeader, RowDataPacket } from 'mysql2';
import pool, { isDuplicateEntryError } from '../db';
import {
  authenticateToken,
  AuthenticatedRequest,
  currentUser,
  signToken,
} from '../middleware/authenticateToken';
import { UserType, USER_TABLES } from '../models/user';
import { logAdminEvent } from '../utils/adminLog';
import { loginAttempts } from '../utils/loginAttempts';
import { countUsers, findUserByEmail, loadPublicUser } from '../utils/lookups';
import { validateLogin, validateRegistration } from '../utils/validation';

const router = Router();

const SALT_ROUNDS = 10;

/**
 * @swagger
 * components:
 *   securitySchemes:
 *     bearerAuth:
 *       type: http
 *       scheme: bearer
 *       bearerFormat: JWT
 *   schemas:
 *     Registration:
 *       type: object
 *       required:
 *         - username
 *         - email
 *         - password
 *         - confirm_password
 *       properties:
 *         username:
 *           type: string
 *           example: "asha"
 *         email:
 *           type: string
 *           example: "asha@example.com"
 *         password:
 *           type: string
 *           example: "Password1"
 *         confirm_password:
 *           type: string
 *           example: "Password1"
 *     Login:
 *       type: object
 *       required:
 *         - email
 *         - password
 *       properties:
 *         email:
 *           type: string
 *           example: "asha@example.com"
 *         password:
 *           type: string
 *           example: "Password1"
 */

const register = (userType: UserType) => async (req: Request, res: Response) => {
  const validated = validateRegistration(req.body);
  if (!validated.ok) {
    return res.status(400).json({ message: validated.error });
  }
  const { username, email, password } = validated.value;
  const table = USER_TABLES[userType];

  try {
    const [emailRows] = await pool.query<RowDataPacket[]>(`SELECT id FROM ${table} WHERE email = ?`, [email]);
    if (emailRows.length) {
      return res.status(409).json({ message: `Email ${email} is already registered.` });
    }

    const [usernameRows] = await pool.query<RowDataPacket[]>(`SELECT id FROM ${table} WHERE username = ?`, [
      username,
    ]);
    if (usernameRows.length) {
      return res.status(409).json({ message: `Username ${username} is already taken.` });
    }

    // The very first account on the platform administers it
    const isFirstUser = (await countUsers()) === 0;
    const hashedPassword = await bcrypt.hash(password, SALT_ROUNDS);

    const [result] =
      userType === 'student'
        ? await pool.query<ResultSetHeader>(
            'INSERT INTO students (username, email, password, is_admin, profile_complete, created_at, updated_at) VALUES (?, ?, ?, ?, false, NOW(), NOW())',
            [username, email, hashedPassword, isFirstUser]
          )
        : await pool.query<ResultSetHeader>(
            'INSERT INTO recruiters (username, email, password, is_admin, verified, profile_complete, created_at, updated_at) VALUES (?, ?, ?, ?, true, false, NOW(), NOW())',
            [username, email, hashedPassword, isFirstUser]
          );

    if (isFirstUser) {
      await logAdminEvent('admin_creation', `First user ${username} (${userType}) automatically made admin`, {
        userEmail: email,
        ip: req.ip,
      });
    }
    await logAdminEvent(`${userType}_registration`, `New ${userType} registered: ${username}`, {
      userEmail: email,
      ip: req.ip,
    });

    const user = await loadPublicUser(userType, result.insertId);
    const token = signToken({ id: result.insertId, userType, email });

    res.status(201).json({
      message: 'Registration successful! Please complete your profile.',
      token,
      user,
    });
  } catch (error) {
    if (isDuplicateEntryError(error)) {
      return res.status(409).json({ message: 'An account with these details already exists.' });
    }
    console.error(`Error registering ${userType}:`, error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
};

const login = (userType: UserType) => async (req: Request, res: Response) => {
  const attemptKey = `${userType}:${req.ip}`;
  if (loginAttempts.isBlocked(attemptKey)) {
    return res.status(429).json({ message: 'Too many login attempts. Please try again in a minute.' });
  }

  const validated = validateLogin(req.body);
  if (!validated.ok) {
    return res.status(400).json({ message: validated.error });
  }
  const { email, password } = validated.value;

  try {
    const user = await findUserByEmail(userType, email);

    if (!user) {
      loginAttempts.recordFailure(attemptKey);
      await logAdminEvent('LOGIN_FAILED', `Failed ${userType} login: no account for ${email}`, {
        userEmail: email,
        ip: req.ip,
      });
      return res.status(401).json({ message: `No ${userType} account found with this email.` });
    }

    if (!(await bcrypt.compare(password, user.password))) {
      loginAttempts.recordFailure(attemptKey);
      await logAdminEvent('LOGIN_FAILED', `Failed ${userType} login: incorrect password`, {
        userEmail: email,
        ip: req.ip,
      });
      return res.status(401).json({ message: 'Incorrect password.' });
    }

    loginAttempts.reset(attemptKey);
    await pool.query(`UPDATE ${USER_TABLES[userType]} SET last_login = NOW() WHERE id = ?`, [user.id]);
    await logAdminEvent('LOGIN_SUCCESS', `${userType} logged in: ${user.username}`, {
      userEmail: email,
      ip: req.ip,
    });

    const token = signToken({ id: user.id, userType, email: user.email });
    res.json({ token, user: await loadPublicUser(userType, user.id) });
  } catch (error) {
    console.error(`Error logging in ${userType}:`, error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
};

/**
 * @swagger
 * /api/v1/auth/students/register:
 *   post:
 *     summary: Register a student account
 *     tags: [Auth]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/Registration'
 *     responses:
 *       201:
 *         description: Student registered, token issued
 *       400:
 *         description: Validation failed
 *       409:
 *         description: Email or username already in use
 */
router.post('/students/register', register('student'));

/**
 * @swagger
 * /api/v1/auth/recruiters/register:
 *   post:
 *     summary: Register a recruiter account
 *     tags: [Auth]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/Registration'
 *     responses:
 *       201:
 *         description: Recruiter registered, token issued
 *       400:
 *         description: Validation failed
 *       409:
 *         description: Email or username already in use
 */
router.post('/recruiters/register', register('recruiter'));

/**
 * @swagger
 * /api/v1/auth/students/login:
 *   post:
 *     summary: Log in as a student
 *     tags: [Auth]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/Login'
 *     responses:
 *       200:
 *         description: Token and user
 *       401:
 *         description: Unknown email or wrong password
 *       429:
 *         description: Too many failed attempts
 */
router.post('/students/login', login('student'));

/**
 * @swagger
 * /api/v1/auth/recruiters/login:
 *   post:
 *     summary: Log in as a recruiter
 *     tags: [Auth]
 *     requestBody:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             $ref: '#/components/schemas/Login'
 *     responses:
 *       200:
 *         description: Token and user
 *       401:
 *         description: Unknown email or wrong password
 *       429:
 *         description: Too many failed attempts
 */
router.post('/recruiters/login', login('recruiter'));

/**
 * @swagger
 * /api/v1/auth/me:
 *   get:
 *     summary: Current user
 *     tags: [Auth]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: The signed-in user and the next onboarding step
 *       404:
 *         description: User no longer exists
 */
router.get('/me', authenticateToken, async (req: AuthenticatedRequest, res: Response) => {
  const { id, userType } = currentUser(req);

  try {
    const user = await loadPublicUser(userType, id);
    if (!user) {
      return res.status(404).json({ message: 'User not found.' });
    }
    res.json({ user, next_step: user.profile_complete ? null : 'complete_profile' });
  } catch (error) {
    console.error('Error fetching current user:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

/**
 * @swagger
 * /api/v1/auth/logout:
 *   post:
 *     summary: Log out (the client discards its token)
 *     tags: [Auth]
 *     responses:
 *       200:
 *         description: Logged out
 */
router.post('/logout', (_req, res) => {
  res.json({ message: 'Logged out' });
});

export default router;
