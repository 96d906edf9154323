import { z } from 'zod';

const parseBoolean = (v: unknown, fallback: boolean): boolean => {
  if (typeof v !== 'string' || v.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(v.trim().toLowerCase());
};

const parseList = (v: unknown): string[] => {
  if (typeof v !== 'string' || v.trim() === '') return [];
  return v
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
};

/** Empty env values count as unset. */
const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() !== '' ? v.trim() : undefined));

const hour = z.coerce.number().int().min(0).max(23);

const rawSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  // Zone provider (GraphQL)
  ZONE_API_URL: z.string().url().default('https://api.soundtrackyourbrand.com/v2'),
  ZONE_API_TOKEN: optionalString,
  ZONE_IDS: z.string().optional(),
  DISCOVERY_INTERVAL_MS: z.coerce.number().int().positive().default(3_600_000),
  DISCOVERY_PAGE_SIZE: z.coerce.number().int().min(1).max(100).default(50),

  // Zone status monitor
  POLLING_INTERVAL: z.coerce.number().int().positive().default(60),
  OFFLINE_THRESHOLD: z.coerce.number().int().nonnegative().default(600),

  DASHBOARD_URL: z.string().url().default('https://app.soundtrackyourbrand.com'),
  SUPPORT_CONTACT: z.string().default('your support team'),
  ALERT_COOLDOWN_MINUTES: z.coerce.number().nonnegative().default(30),

  WHATSAPP_ENABLED: z.string().optional(),
  WHATSAPP_PHONE_NUMBER_ID: optionalString,
  WHATSAPP_ACCESS_TOKEN: optionalString,
  WHATSAPP_API_VERSION: z.string().default('v17.0'),
  WHATSAPP_RECIPIENT: optionalString,

  SMTP_HOST: z.string().default('smtp.gmail.com'),
  SMTP_PORT: z.coerce.number().int().positive().default(587),
  SMTP_USERNAME: optionalString,
  SMTP_PASSWORD: optionalString,
  EMAIL_FROM: optionalString,
  EMAIL_SUBJECT: z.string().default('Zone Alert'),
  EMAIL_TO: z.string().optional(),

  SMS_ENABLED: z.string().optional(),
  TWILIO_ACCOUNT_SID: optionalString,
  TWILIO_AUTH_TOKEN: optionalString,
  TWILIO_PHONE_NUMBER: optionalString,
  SMS_CRITICAL_THRESHOLD: z.coerce.number().int().nonnegative().default(1800),
  SMS_QUIET_HOURS_START: hour.default(22),
  SMS_QUIET_HOURS_END: hour.default(7),
  SMS_DEFAULT_COUNTRY_CODE: z.string().regex(/^\d{1,3}$/).default('1'),
  SMS_RECIPIENT: optionalString,

  PUSHOVER_TOKEN: optionalString,
  PUSHOVER_USER_KEY: optionalString,
});

export const configSchema = rawSchema.transform((raw) => {
  const whatsappRequested = parseBoolean(raw.WHATSAPP_ENABLED, false);
  const smsRequested = parseBoolean(raw.SMS_ENABLED, false);

  return {
    nodeEnv: raw.NODE_ENV,
    logLevel: raw.LOG_LEVEL,
    requestTimeoutMs: raw.REQUEST_TIMEOUT_MS,
    dashboardUrl: raw.DASHBOARD_URL,
    supportContact: raw.SUPPORT_CONTACT,

    zoneApi: {
      url: raw.ZONE_API_URL,
      token: raw.ZONE_API_TOKEN,
      zoneIds: parseList(raw.ZONE_IDS),
      discoveryIntervalMs: raw.DISCOVERY_INTERVAL_MS,
      pageSize: raw.DISCOVERY_PAGE_SIZE,
    },

    monitor: {
      pollIntervalMs: raw.POLLING_INTERVAL * 1000,
      offlineThresholdSeconds: raw.OFFLINE_THRESHOLD,
    },

    alerts: {
      cooldownMs: raw.ALERT_COOLDOWN_MINUTES * 60_000,
    },

    whatsapp: {
      requested: whatsappRequested,
      enabled: whatsappRequested && Boolean(raw.WHATSAPP_PHONE_NUMBER_ID && raw.WHATSAPP_ACCESS_TOKEN),
      phoneNumberId: raw.WHATSAPP_PHONE_NUMBER_ID,
      accessToken: raw.WHATSAPP_ACCESS_TOKEN,
      apiVersion: raw.WHATSAPP_API_VERSION,
      recipient: raw.WHATSAPP_RECIPIENT,
    },

    email: {
      enabled: Boolean(raw.SMTP_HOST && raw.SMTP_USERNAME && raw.SMTP_PASSWORD),
      host: raw.SMTP_HOST,
      port: raw.SMTP_PORT,
      username: raw.SMTP_USERNAME,
      password: raw.SMTP_PASSWORD,
      from: raw.EMAIL_FROM ?? raw.SMTP_USERNAME,
      subject: raw.EMAIL_SUBJECT,
      recipients: parseList(raw.EMAIL_TO),
    },

    sms: {
      requested: smsRequested,
      enabled: smsRequested && Boolean(raw.TWILIO_ACCOUNT_SID && raw.TWILIO_AUTH_TOKEN && raw.TWILIO_PHONE_NUMBER),
      accountSid: raw.TWILIO_ACCOUNT_SID,
      authToken: raw.TWILIO_AUTH_TOKEN,
      fromNumber: raw.TWILIO_PHONE_NUMBER,
      criticalThresholdSeconds: raw.SMS_CRITICAL_THRESHOLD,
      quietHoursStart: raw.SMS_QUIET_HOURS_START,
      quietHoursEnd: raw.SMS_QUIET_HOURS_END,
      defaultCountryCode: raw.SMS_DEFAULT_COUNTRY_CODE,
      recipient: raw.SMS_RECIPIENT,
    },

    pushover: {
      enabled: Boolean(raw.PUSHOVER_TOKEN && raw.PUSHOVER_USER_KEY),
      token: raw.PUSHOVER_TOKEN,
      userKey: raw.PUSHOVER_USER_KEY,
    },
  };
});
