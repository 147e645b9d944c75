import { escape } from 'lodash';
import nodemailer from 'nodemailer';
import { WebSocketServer, WebSocket } from 'ws';
import { ResultSetHeader } from 'mysql2';
import pool from '../db';
import config from '../config';
import { UserType } from '../models/user';
import { sendSMS } from './twilio';

interface CustomWebSocket extends WebSocket {
  userKey: string;
}

export interface Recipient {
  userType: UserType;
  id: number;
}

export interface SmsStudent {
  id: number;
  phone: string | null;
}

export interface SmsJob {
  title?: string | null;
  company_name?: string | null;
}

export interface SmsInterview {
  interview_datetime: Date;
  interview_type?: string | null;
  interview_location?: string | null;
}

const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const pad = (value: number) => String(value).padStart(2, '0');

export const recipientKey = (recipient: Recipient) => `${recipient.userType}:${recipient.id}`;

let notificationServer: WebSocketServer | null = null;

export const registerNotificationServer = (wss: WebSocketServer | null) => {
  notificationServer = wss;
};

export const tagClient = (client: WebSocket, recipient: Recipient): void => {
  Object.assign(client, { userKey: recipientKey(recipient) });
};

function isCustomWebSocket(client: WebSocket): client is CustomWebSocket {
  return 'userKey' in client;
}

// Send a WebSocket message to every open connection of one user
export const sendAppNotification = (message: string, recipient: Recipient): number => {
  if (!notificationServer) return 0;

  const key = recipientKey(recipient);
  let delivered = 0;
  notificationServer.clients.forEach((client) => {
    if (isCustomWebSocket(client) && client.readyState === WebSocket.OPEN && client.userKey === key) {
      client.send(message);
      delivered += 1;
    }
  });
  return delivered;
};

/** Stores an in-app notification and pushes it to the user's open sockets. */
export const createNotification = async (recipient: Recipient, title: string, message: string) => {
  const [result] = await pool.query<ResultSetHeader>(
    'INSERT INTO notifications (user_type, user_id, title, message, `read`, created_at) VALUES (?, ?, ?, ?, false, NOW())',
    [recipient.userType, recipient.id, title, message]
  );

  sendAppNotification(
    JSON.stringify({ type: 'notification', id: result.insertId, title, message }),
    recipient
  );
  return result.insertId;
};

export const isEmailConfigured = () => Boolean(config.email.user && config.email.pass);

// Send an email notification to multiple recipients
export const sendEmailNotification = async (emails: string[], subject: string, html: string): Promise<boolean> => {
  if (!isEmailConfigured()) {
    console.log(`Email is not configured, skipping "${subject}" to ${emails.join(', ')}`);
    return false;
  }

  const transporter = nodemailer.createTransport({
    host: config.email.host,
    port: config.email.port,
    secure: false,
    auth: {
      user: config.email.user,
      pass: config.email.pass,
    },
  });

  try {
    await transporter.sendMail({
      from: config.email.user,
      to: emails.join(','),
      subject,
      html,
    });
    console.log(`Email sent successfully to: ${emails.join(', ')}`);
    return true;
  } catch (error) {
    console.error('Error sending email:', error);
    return false;
  }
};

export const sendApplicationConfirmationEmail = (email: string, fullName: string, jobTitle: string, companyName: string) =>
  sendEmailNotification(
    [email],
    'Job Application Confirmation',
    `<p>Dear ${escape(fullName)},</p>
     <p>Thank you for applying for the position of <strong>${escape(jobTitle)}</strong> at ${escape(companyName)}. Your application has been received and the recruiter will review it shortly.</p>
     <p>Best regards,</p>
     <p>${escape(config.appName)}</p>`
  );

export const formatInterviewDate = (date: Date) =>
  `${pad(date.getDate())} ${MONTHS[date.getMonth()]}, ${date.getFullYear()}`;

export const formatInterviewTime = (date: Date) => `${pad(date.getHours())}:${pad(date.getMinutes())}`;

const jobLabel = (job: SmsJob) => ({
  title: job.title || 'a position',
  company: job.company_name || 'A company',
});

export const smsMessages = {
  shortlisted: (job: SmsJob) => {
    const { title, company } = jobLabel(job);
    return `Congratulations! You have been shortlisted for ${title} at ${company}. Log in to ${config.appName} to check the details and next steps.`;
  },
  selected: (job: SmsJob) => {
    const { title, company } = jobLabel(job);
    return `Great news! You have been SELECTED for ${title} at ${company}. Congratulations on your success! Log in to ${config.appName} for more details.`;
  },
  interviewScheduled: (job: SmsJob, interview: SmsInterview) => {
    const { title, company } = jobLabel(job);
    const when = interview.interview_datetime;
    return `Interview Scheduled: ${interview.interview_type || 'an interview'} interview for ${title} at ${company} on ${formatInterviewDate(when)} at ${formatInterviewTime(when)}. Location: ${interview.interview_location || 'to be confirmed'}. Log in to ${config.appName} for details.`;
  },
  interviewResult: (job: SmsJob, result: string) => {
    const { title, company } = jobLabel(job);
    return result === 'Pass'
      ? `Congratulations! You have passed the interview for ${title} at ${company}. Log in to ${config.appName} for next steps.`
      : `Interview Result: Your interview for ${title} at ${company} has been completed. Please log in to ${config.appName} to check the details.`;
  },
};

const smsToStudent = async (student: SmsStudent, message: string) => {
  if (!student.phone) {
    console.warn(`Cannot send SMS notification: Student ${student.id} has no phone number`);
    return false;
  }
  return sendSMS(student.phone, message);
};

export const notifyStudentShortlisted = (student: SmsStudent, job: SmsJob) =>
  smsToStudent(student, smsMessages.shortlisted(job));

export const notifyStudentSelected = (student: SmsStudent, job: SmsJob) =>
  smsToStudent(student, smsMessages.selected(job));

export const notifyStudentInterviewScheduled = (student: SmsStudent, job: SmsJob, interview: SmsInterview) =>
  smsToStudent(student, smsMessages.interviewScheduled(job, interview));

export const notifyStudentInterviewResult = (student: SmsStudent, job: SmsJob, result: string) =>
  smsToStudent(student, smsMessages.interviewResult(job, result));
