import { Request, Response, NextFunction } from 'express';
import jwt, { JwtPayload, VerifyErrors } from 'jsonwebtoken';
import { RowDataPacket } from 'mysql2';
import pool from '../db';
import config from '../config';
import { isUserType, USER_TABLES, UserType } from '../models/user';
import { logAdminEvent } from '../utils/adminLog';

export interface AuthUser {
  id: number;
  userType: UserType;
  email: string;
}

export interface AuthenticatedRequest extends Request {
  user?: AuthUser;
}

export const signToken = (user: AuthUser): string =>
  jwt.sign({ userId: user.id, userType: user.userType, email: user.email }, config.secretKey, {
    expiresIn: config.tokenExpiresInSeconds,
  });

const toAuthUser = (payload: JwtPayload | string | undefined): AuthUser | null => {
  if (!payload || typeof payload !== 'object') return null;
  const { userId, userType, email } = payload;
  if (typeof userId !== 'number' || !isUserType(userType) || typeof email !== 'string') return null;
  return { id: userId, userType, email };
};

export const verifyToken = (token: string): Promise<AuthUser | null> =>
  new Promise((resolve) => {
    jwt.verify(token, config.secretKey, (err: VerifyErrors | null, payload: JwtPayload | string | undefined) => {
      resolve(err ? null : toAuthUser(payload));
    });
  });

const bearerToken = (req: Request) => {
  const authHeader = req.headers['authorization'];
  return authHeader && authHeader.split(' ')[1];
};

export const authenticateToken = (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
  const token = bearerToken(req);

  if (!token) {
    res.sendStatus(401);
    return;
  }

  verifyToken(token)
    .then((user) => {
      if (!user) {
        res.sendStatus(403); // Token is invalid or carries an unknown payload
        return;
      }
      req.user = user;
      next();
    })
    .catch(next);
};

// Public routes that show extra fields (eligibility) to signed-in students.
export const optionalAuth = (req: AuthenticatedRequest, _res: Response, next: NextFunction): void => {
  const token = bearerToken(req);
  if (!token) {
    next();
    return;
  }

  verifyToken(token)
    .then((user) => {
      if (user) req.user = user;
      next();
    })
    .catch(next);
};

const requireUserType = (userType: UserType) => (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
  authenticateToken(req, res, () => {
    if (req.user?.userType !== userType) {
      res.status(403).json({ message: `You must be logged in as a ${userType} to access this resource.` });
      return;
    }
    next();
  });
};

export const requireStudent = requireUserType('student');
export const requireRecruiter = requireUserType('recruiter');

export const requireAdmin = (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
  authenticateToken(req, res, async () => {
    const user = req.user;
    if (!user) {
      res.sendStatus(401);
      return;
    }

    try {
      const [rows] = await pool.query<RowDataPacket[]>(
        `SELECT is_admin FROM ${USER_TABLES[user.userType]} WHERE id = ?`,
        [user.id]
      );

      if (!rows.length || !rows[0].is_admin) {
        await logAdminEvent('unauthorized_access', 'Non-admin user attempted to access admin area', {
          userEmail: user.email,
          ip: req.ip,
        });
        res.status(403).json({ message: 'Administrator privileges required.' });
        return;
      }
      next();
    } catch (error) {
      console.error('Error checking admin privileges:', error);
      res.status(500).json({ message: 'Internal Server Error' });
    }
  });
};

export const currentUser = (req: AuthenticatedRequest): AuthUser => {
  if (!req.user) {
    throw new Error('Route is missing its authentication middleware');
  }
  return req.user;
};
