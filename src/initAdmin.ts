import { RowDataPacket } from 'mysql2';
import pool from './db';
import { UserType, USER_TABLES } from './models/user';
import { logAdminEvent } from './utils/adminLog';

interface Candidate extends RowDataPacket {
  id: number;
  username: string;
  email: string;
  created_at: Date;
  user_type: UserType;
}

/**
 * Promotes the earliest registered user when neither table has an admin.
 * Returns the promoted user, or null when nothing changed.
 */
export const ensureAdminExists = async (): Promise<Candidate | null> => {
  const [admins] = await pool.query<RowDataPacket[]>(
    `SELECT id FROM students WHERE is_admin = true
     UNION ALL
     SELECT id FROM recruiters WHERE is_admin = true
     LIMIT 1`
  );
  if (admins.length) {
    console.log('Admin user already exists');
    return null;
  }

  const [candidates] = await pool.query<Candidate[]>(
    `SELECT id, username, email, created_at, 'student' AS user_type FROM students
     UNION ALL
     SELECT id, username, email, created_at, 'recruiter' AS user_type FROM recruiters
     ORDER BY created_at ASC
     LIMIT 1`
  );
  const candidate = candidates[0];
  if (!candidate) {
    console.log('No users yet; the first registered user will become admin');
    return null;
  }

  await pool.query(`UPDATE ${USER_TABLES[candidate.user_type]} SET is_admin = true WHERE id = ?`, [candidate.id]);
  await logAdminEvent('admin_creation', `Earliest user ${candidate.username} (${candidate.user_type}) made admin`, {
    userEmail: candidate.email,
  });
  console.log(`Made ${candidate.user_type} ${candidate.email} an admin`);
  return candidate;
};
