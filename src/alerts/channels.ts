import type { AppConfig } from '../config/types.js';
import type { Logger } from '../core/logger.js';
import { EmailClient } from './email.js';
import type { ChannelClient } from './interface.js';
import { NotificationChain, type ChainTarget } from './notificationChain.js';
import { PushoverClient } from './pushover.js';
import { SmsClient } from './sms.js';
import type { NotificationRequest, NotificationResult } from './types.js';
import { WhatsAppClient } from './whatsapp.js';

export interface ChannelClients {
  whatsapp: WhatsAppClient;
  email: EmailClient;
  sms: SmsClient;
  pushover: PushoverClient;
}

/** Builds every channel client once from the loaded config; callers pass them down explicitly. */
export const createChannelClients = (config: AppConfig, logger: Logger): ChannelClients => {
  const timeoutMs = config.requestTimeoutMs;
  const clients: ChannelClients = {
    whatsapp: new WhatsAppClient(config.whatsapp, logger.child({ channel: 'whatsapp' }), {
      timeoutMs,
      supportContact: config.supportContact,
    }),
    email: new EmailClient(config.email, logger.child({ channel: 'email' }), {
      timeoutMs,
      supportContact: config.supportContact,
    }),
    sms: new SmsClient(config.sms, logger.child({ channel: 'sms' }), { timeoutMs }),
    pushover: new PushoverClient(config.pushover, logger.child({ channel: 'pushover' }), {
      timeoutMs,
      dashboardUrl: config.dashboardUrl,
    }),
  };

  if (config.whatsapp.requested && !config.whatsapp.enabled) {
    logger.warn('whatsapp enabled but WHATSAPP_PHONE_NUMBER_ID or WHATSAPP_ACCESS_TOKEN missing');
  }
  if (config.sms.requested && !config.sms.enabled) {
    logger.warn('sms enabled but Twilio credentials not fully configured');
  }
  logger.info('notification channels ready', {
    whatsapp: clients.whatsapp.enabled,
    email: clients.email.enabled,
    sms: clients.sms.enabled,
    pushover: clients.pushover.enabled,
  });
  return clients;
};

/** Push first, then WhatsApp, SMS and email; only targets with a recipient are included. */
export const buildAlertChain = (config: AppConfig, clients: ChannelClients, logger: Logger): NotificationChain => {
  const targets: ChainTarget[] = [];
  if (config.pushover.userKey) targets.push({ client: clients.pushover, recipient: config.pushover.userKey });
  if (config.whatsapp.recipient) targets.push({ client: clients.whatsapp, recipient: config.whatsapp.recipient });
  if (config.sms.recipient) targets.push({ client: clients.sms, recipient: config.sms.recipient });
  for (const address of config.email.recipients) {
    targets.push({ client: clients.email, recipient: address });
  }
  return new NotificationChain(targets, logger.child({ component: 'alert-chain' }), config.alerts.cooldownMs);
};

/** Routes a single request to the client for its channel. */
export const sendNotification = (clients: ChannelClients, request: NotificationRequest): Promise<NotificationResult> => {
  const client: ChannelClient = clients[request.channel];
  return client.send(request.recipient, request.message);
};
