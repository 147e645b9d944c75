export interface DatabaseConfig {
  host: string;
  user: string;
  password: string;
  database: string;
  port: number;
}

export interface EmailConfig {
  host: string;
  port: number;
  user: string;
  pass: string;
}

export interface TwilioConfig {
  enabled: boolean;
  accountSid: string;
  authToken: string;
  phoneNumber: string;
  defaultCountryCode: string;
}

export interface GeminiConfig {
  apiKey: string;
  model: string;
  fallbackModel: string;
}

export interface CommonConfig {
  appName: string;
  port: number | string;
  secretKey: string;
  tokenExpiresInSeconds: number;
  uploadDir: string;
  adminLogPath: string;
  email: EmailConfig;
  twilio: TwilioConfig;
  gemini: GeminiConfig;
}

export interface Config extends CommonConfig {
  environment: string;
  database: DatabaseConfig;
}
