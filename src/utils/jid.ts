export const USER_SERVER = 's.whatsapp.net';
export const GROUP_SERVER = 'g.us';
export const BROADCAST_SERVER = 'broadcast';

export function isGroupJid(jid: string): boolean {
  return jid.endsWith(`@${GROUP_SERVER}`);
}

export function isJid(value: string): boolean {
  return value.includes('@');
}

/**
 * Turn a phone number (any formatting) into a user JID; JIDs pass through.
 */
export function toJid(numberOrJid: string): string {
  if (isJid(numberOrJid)) {
    return numberOrJid;
  }
  return `${numberOrJid.replace(/[^0-9]/g, '')}@${USER_SERVER}`;
}
