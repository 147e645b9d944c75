import { RowDataPacket } from 'mysql2';
import { UserType } from './user';

export interface Notification {
  id: number;
  user_type: UserType;
  user_id: number;
  title: string;
  message: string;
  read: 0 | 1;
  created_at: Date;
}

export type NotificationRow = RowDataPacket & Notification;
