import twilio from 'twilio';
import config from '../config';

const E164_REGEX = /^\+[1-9]\d{1,14}$/;

const PLACEHOLDERS = {
  accountSid: 'your_account_sid_here',
  authToken: 'your_auth_token_here',
  phoneNumber: 'your_twilio_phone_number_here',
};

/**
 * Brings a stored phone number to E.164. Numbers without a `+` are taken as
 * national numbers unless they already carry the default country digits in
 * front of a full 10-digit number.
 */
export const normalizePhoneNumber = (
  phone: string,
  defaultCountryCode = config.twilio.defaultCountryCode
): string | null => {
  let number = phone.trim();

  if (!number.startsWith('+')) {
    const countryDigits = defaultCountryCode.replace(/^\+/, '');
    number =
      number.startsWith(countryDigits) && number.length > 10
        ? `+${number}`
        : `${defaultCountryCode}${number.replace(/^0+/, '')}`;
  }

  return E164_REGEX.test(number) ? number : null;
};

export const maskSecret = (value: string, visible: number) =>
  value.length > visible * 2 ? `${value.slice(0, visible)}****${value.slice(-visible)}` : '****';

export const credentialProblem = (credentials = config.twilio): string | null => {
  const missing = (value: string, placeholder: string) => !value.trim() || value === placeholder;

  if (missing(credentials.accountSid, PLACEHOLDERS.accountSid)) return 'Twilio Account SID is missing or invalid';
  if (missing(credentials.authToken, PLACEHOLDERS.authToken)) return 'Twilio Auth Token is missing or invalid';
  if (missing(credentials.phoneNumber, PLACEHOLDERS.phoneNumber)) return 'Twilio Phone Number is missing or invalid';
  return null;
};

// Resolves to whether the message was handed to Twilio; never rejects.
export const sendSMS = async (to: string, body: string): Promise<boolean> => {
  const { enabled, accountSid, authToken, phoneNumber } = config.twilio;
  console.log(`Sending SMS to: ${to}`);

  const recipient = normalizePhoneNumber(to);
  if (!recipient) {
    console.error(`Invalid phone number format: ${to}`);
    return false;
  }

  if (!enabled) {
    console.log('Twilio is disabled (TWILIO_ENABLED). SMS will not be sent.');
    return false;
  }

  const problem = credentialProblem();
  if (problem) {
    console.error(`ERROR: ${problem}`);
    return false;
  }

  console.log(`Using Twilio Account SID: ${maskSecret(accountSid, 4)}, Auth Token: ${maskSecret(authToken, 2)}`);

  try {
    const client = twilio(accountSid, authToken);
    const message = await client.messages.create({
      body,
      from: phoneNumber,
      to: recipient,
    });
    console.log(`SMS sent successfully: ${message.sid}`);
    return true;
  } catch (error) {
    console.error('Failed to send SMS:', error);
    return false;
  }
};
