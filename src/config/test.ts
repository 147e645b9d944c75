import os from 'os';
import path from 'path';
import { commonConfig } from './common';
import { Config } from './types';

// Tests never reach a database, mail server, Twilio or Gemini.
export const config: Config = {
  ...commonConfig,
  environment: 'test',
  uploadDir: path.join(os.tmpdir(), `careerbridge-test-${process.pid}`, 'uploads'),
  adminLogPath: path.join(os.tmpdir(), `careerbridge-test-${process.pid}`, 'logs', 'admin.log'),
  email: { ...commonConfig.email, user: '', pass: '' },
  twilio: {
    enabled: true,
    accountSid: 'ACtest-account-sid',
    authToken: 'test-auth-token',
    phoneNumber: '+15005550006',
    defaultCountryCode: '+91',
  },
  gemini: { apiKey: 'test-gemini-key', model: 'primary-model', fallbackModel: 'fallback-model' },
  database: {
    host: 'localhost',
    user: 'test',
    password: '',
    database: 'careerbridge_test',
    port: 3306,
  },
};
