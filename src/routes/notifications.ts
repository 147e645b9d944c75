import { Router, Response } from 'express';
import pool from '../db';
import { authenticateToken, AuthenticatedRequest, currentUser } from '../middleware/authenticateToken';
import { NotificationRow } from '../models/notification';

const router = Router();

/**
 * @swagger
 * /api/v1/notifications:
 *   get:
 *     summary: The user's notifications, newest first; unread ones are marked read
 *     tags: [Notifications]
 *     security:
 *       - bearerAuth: []
 *     responses:
 *       200:
 *         description: Notifications as they were before this call marked them read
 */
router.get('/', authenticateToken, async (req: AuthenticatedRequest, res: Response) => {
  const { id, userType } = currentUser(req);

  try {
    const [notifications] = await pool.query<NotificationRow[]>(
      'SELECT * FROM notifications WHERE user_type = ? AND user_id = ? ORDER BY created_at DESC',
      [userType, id]
    );

    // Only what this response shows; anything inserted since stays unread.
    const unreadIds = notifications.filter((notification) => !notification.read).map((notification) => notification.id);
    if (unreadIds.length) {
      await pool.query('UPDATE notifications SET `read` = true WHERE id IN (?)', [unreadIds]);
    }

    res.json({ notifications, unread_count: unreadIds.length });
  } catch (error) {
    console.error('Error fetching notifications:', error);
    res.status(500).json({ message: 'Internal Server Error' });
  }
});

export default router;
