import dotenv from 'dotenv';
import path from 'path';
import { CommonConfig } from './types';

// Environment-specific values first, then shared defaults from .env
dotenv.config({ path: `.env.${process.env.NODE_ENV || 'development'}` });
dotenv.config();

const isEnabled = (value: string | undefined) => ['true', '1', 't'].includes((value ?? 'false').toLowerCase());

export const commonConfig: CommonConfig = {
  appName: process.env.APP_NAME || 'CareerBridge',
  port: process.env.PORT || 3000,
  secretKey: process.env.SECRET_KEY || 'default-secret-key',
  tokenExpiresInSeconds: parseInt(process.env.TOKEN_EXPIRES_IN_SECONDS || '36000', 10),
  uploadDir: path.resolve(process.env.UPLOAD_DIR || 'uploads'),
  adminLogPath: path.resolve(process.env.ADMIN_LOG_PATH || path.join('logs', 'admin.log')),
  email: {
    host: process.env.EMAIL_HOST || 'smtp-mail.outlook.com',
    port: parseInt(process.env.EMAIL_PORT || '587', 10),
    user: process.env.EMAIL_USER || '',
    pass: process.env.EMAIL_PASS || '',
  },
  twilio: {
    enabled: isEnabled(process.env.TWILIO_ENABLED),
    accountSid: process.env.TWILIO_ACCOUNT_SID || '',
    authToken: process.env.TWILIO_AUTH_TOKEN || '',
    phoneNumber: process.env.TWILIO_PHONE_NUMBER || '',
    defaultCountryCode: process.env.SMS_DEFAULT_COUNTRY_CODE || '+91',
  },
  gemini: {
    apiKey: process.env.GEMINI_API_KEY || '',
    model: process.env.GEMINI_MODEL || 'gemini-2.0-flash',
    fallbackModel: process.env.GEMINI_FALLBACK_MODEL || 'gemini-1.5-pro',
  },
};
