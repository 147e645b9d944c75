import fs from 'fs';
import path from 'path';
import config from '../config';

export interface AdminLogOptions {
  userEmail?: string | null;
  ip?: string | null;
}

export interface AdminLogEntry {
  timestamp: string;
  event_type: string;
  message: string;
  user_email: string | null;
  ip: string | null;
}

export interface UserActivity {
  labels: string[];
  registrations: number[];
  logins: number[];
}

const pad = (value: number) => String(value).padStart(2, '0');

export const formatDay = (date: Date) => `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;

export const formatTimestamp = (date: Date) =>
  `${formatDay(date)} ${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

export const getLogPath = () => config.adminLogPath;

// One event per line; `|` separates the user and IP parts.
const singleLine = (value: string) => value.replace(/[\r\n]+/g, ' ');

export const formatLogLine = (eventType: string, message: string, options: AdminLogOptions = {}, date = new Date()) => {
  let line = `[${formatTimestamp(date)}] ${eventType}: ${singleLine(message).replace(/\|/g, '/')}`;
  if (options.userEmail) line += ` | User: ${singleLine(options.userEmail)}`;
  if (options.ip) line += ` | IP: ${singleLine(options.ip)}`;
  return line;
};

/**
 * Appends an audit event to the admin log. A failed write is reported on the
 * console and never fails the request that triggered it.
 */
export const logAdminEvent = async (eventType: string, message: string, options: AdminLogOptions = {}) => {
  const logPath = getLogPath();
  try {
    await fs.promises.mkdir(path.dirname(logPath), { recursive: true });
    await fs.promises.appendFile(logPath, `${formatLogLine(eventType, message, options)}\n`, 'utf8');
  } catch (error) {
    console.error(`Failed to write admin log event ${eventType}:`, error);
  }
};

export const readLogLines = async (): Promise<string[]> => {
  try {
    const content = await fs.promises.readFile(getLogPath(), 'utf8');
    return content.split('\n').filter((line) => line.trim() !== '');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
    throw error;
  }
};

const parseError = (line: string): AdminLogEntry => ({
  timestamp: 'Unknown',
  event_type: 'PARSE_ERROR',
  message: line.trim(),
  user_email: null,
  ip: null,
});

export const parseLogLine = (line: string): AdminLogEntry => {
  const trimmed = line.trim();
  const close = trimmed.indexOf(']');
  if (close === -1) return parseError(line);

  const rest = trimmed.slice(close + 1);
  const colon = rest.indexOf(':');
  if (colon === -1) return parseError(line);

  const [message, ...extras] = rest.slice(colon + 1).split('|');
  let userEmail: string | null = null;
  let ip: string | null = null;
  for (const part of extras) {
    if (part.includes('User:')) {
      userEmail = part.split('User:')[1].trim();
    } else if (part.includes('IP:')) {
      ip = part.split('IP:')[1].trim();
    }
  }

  return {
    timestamp: trimmed.slice(0, close).replace(/^\[+/, ''),
    event_type: rest.slice(0, colon).trim(),
    message: message.trim(),
    user_email: userEmail,
    ip,
  };
};

// Daily registration and login counts, oldest day first.
export const getUserActivityData = async (days = 7, now = new Date()): Promise<UserActivity> => {
  const labels: string[] = [];
  for (let offset = days - 1; offset >= 0; offset--) {
    const day = new Date(now.getFullYear(), now.getMonth(), now.getDate() - offset);
    labels.push(formatDay(day));
  }

  const registrations = labels.map(() => 0);
  const logins = labels.map(() => 0);

  for (const line of await readLogLines()) {
    const entry = parseLogLine(line);
    const index = labels.indexOf(entry.timestamp.slice(0, 10));
    if (index === -1) continue;

    if (entry.event_type === 'LOGIN_SUCCESS') {
      logins[index] += 1;
    } else if (entry.event_type.endsWith('_registration')) {
      registrations[index] += 1;
    }
  }

  return { labels, registrations, logins };
};
