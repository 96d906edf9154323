import type { z } from 'zod';
import type { configSchema } from './schema.js';

export type AppConfig = z.infer<typeof configSchema>;
export type WhatsAppConfig = AppConfig['whatsapp'];
export type EmailConfig = AppConfig['email'];
export type SmsConfig = AppConfig['sms'];
export type PushoverConfig = AppConfig['pushover'];
