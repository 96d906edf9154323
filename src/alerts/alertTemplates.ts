/**
 * Alert templates — per-channel renderings of a zone status summary.
 *
 * Pure functions: no I/O, output depends only on the arguments.
 * Length limits are applied by the channel clients, not here.
 */

import { formatCompactDuration, formatDuration } from '../core/text.js';
import type { ZoneAlertEntry, ZoneAlertType, ZoneStatusSummary } from './types.js';

const WHATSAPP_LIST_LIMIT = 5;
const SMS_LIST_LIMIT = 3;
const SMS_NAME_LIMIT = 20;
const RULE = '-'.repeat(40);

export interface EmailTemplate {
  subject: string;
  body: string;
}

const shortName = (name: string): string =>
  name.length > SMS_NAME_LIMIT ? `${name.slice(0, SMS_NAME_LIMIT)}...` : name;

const pad2 = (n: number): string => String(n).padStart(2, '0');

const emailSection = (heading: string, zones: ZoneAlertEntry[], withDuration: boolean): string[] => {
  if (zones.length === 0) return [];
  const lines = [`⚠️ ${heading} (${zones.length}):`, RULE];
  for (const zone of zones) {
    lines.push(`• ${zone.name}`);
    if (withDuration && zone.offlineSeconds) {
      lines.push(`  Offline for: ${formatDuration(zone.offlineSeconds)}`);
    }
  }
  lines.push('');
  return lines;
};

export const alertTemplates = {
  whatsapp(entityName: string, status: ZoneStatusSummary, supportContact: string): string {
    const lines = [`🚨 *Zone Alert - ${entityName}*`, ''];
    const offline = status.offline;

    if (offline.length > 0) {
      lines.push(`⚠️ *${offline.length} zones offline:*`);
      for (const zone of offline.slice(0, WHATSAPP_LIST_LIMIT)) {
        lines.push(`• ${zone.name}`);
      }
      if (offline.length > WHATSAPP_LIST_LIMIT) {
        lines.push(`• ... and ${offline.length - WHATSAPP_LIST_LIMIT} more`);
      }
    }
    if (status.expired.length > 0) {
      lines.push(`⏳ *${status.expired.length} subscription(s) expired*`);
    }
    if (status.unpaired.length > 0) {
      lines.push(`📱 *${status.unpaired.length} zone(s) need device pairing*`);
    }

    lines.push('', `📞 Need help? Contact ${supportContact}`);
    return lines.join('\n');
  },

  /** Concise SMS for one alert type; empty when there is nothing of that type to report. */
  sms(entityName: string, status: ZoneStatusSummary, alertType: ZoneAlertType): string {
    switch (alertType) {
      case 'offline': {
        const offline = status.offline;
        if (offline.length === 0) return '';
        const lines = [`🚨 ZONE ALERT: ${entityName}`, `${offline.length} zone(s) offline:`];
        for (const zone of offline.slice(0, SMS_LIST_LIMIT)) {
          lines.push(`• ${shortName(zone.name)} (${formatCompactDuration(zone.offlineSeconds ?? 0)})`);
        }
        if (offline.length > SMS_LIST_LIMIT) {
          lines.push(`...and ${offline.length - SMS_LIST_LIMIT} more`);
        }
        lines.push('', 'Check dashboard for details');
        return lines.join('\n');
      }
      case 'expired':
        if (status.expired.length === 0) return '';
        return [`⚠️ ${entityName}`, `${status.expired.length} subscription(s) expired.`, 'Contact support to renew.'].join('\n');
      case 'unpaired':
        if (status.unpaired.length === 0) return '';
        return [`📱 ${entityName}`, `${status.unpaired.length} zone(s) need device pairing.`, 'Setup required to play music.'].join('\n');
    }
  },

  email(entityName: string, status: ZoneStatusSummary, supportContact: string): EmailTemplate {
    const lines = [
      `Zone Alert for ${entityName}`,
      '',
      'This is an automated notification from the zone monitoring system.',
      '',
      ...emailSection('OFFLINE ZONES', status.offline, true),
      ...emailSection('EXPIRED SUBSCRIPTIONS', status.expired, false),
      ...emailSection('NO PAIRED DEVICE', status.unpaired, false),
      `Need assistance? Contact ${supportContact}.`,
    ];
    return {
      subject: `🚨 Zone Alert - ${entityName}`,
      body: lines.join('\n'),
    };
  },

  /** Single-zone push message: offline-since time is local wall-clock time. */
  zoneOffline(zoneName: string, offlineSeconds: number, dashboardUrl: string, now: Date): string {
    const minutes = Math.floor(offlineSeconds / 60);
    const since = new Date(now.getTime() - offlineSeconds * 1000);
    const time = `${pad2(since.getHours())}:${pad2(since.getMinutes())}`;
    return `🌐 Zone "${zoneName}" offline since ${time} (>${minutes} min)\nDashboard: ${dashboardUrl}`;
  },

  summary(entityName: string, status: ZoneStatusSummary, dashboardUrl: string): string {
    const counts = [
      `${status.offline.length} offline`,
      `${status.expired.length} expired`,
      `${status.unpaired.length} unpaired`,
    ].join(', ');
    const lines = [`${entityName}: ${counts}`];
    for (const zone of status.offline.slice(0, WHATSAPP_LIST_LIMIT)) {
      lines.push(`• ${zone.name}`);
    }
    lines.push(`Dashboard: ${dashboardUrl}`);
    return lines.join('\n');
  },
};
