export type MediaType = 'text'|'image'|'video'|'audio'|'voice'|'document'|'unknown';

export interface Message {
  time: Date;
  sender: string;
  content: string;
  isFromMe: boolean;
  mediaType: MediaType;
  filename?: string;
  chatId: string;
  messageId: string;
}

export interface Chat {
  id: string;
  displayName: string;
  lastMessage: string;
  lastMessageTime: Date;
  isGroup: boolean;
}

export interface Contact {
  id: string;
  displayName: string;
  pushName: string;
  isGroup: boolean;
  isBlocked: boolean;
}

/**
 * Contact entry as reported by the live protocol directory.
 */
export interface DirectoryContact {
  id: string;
  fullName?: string;
  pushName?: string;
  businessName?: string;
}

export const VOICE_MESSAGE_CONTENT = '[Voice Message]';
export const AUDIO_MESSAGE_CONTENT = '[Audio Message]';
export const UNKNOWN_MESSAGE_CONTENT = '[Unknown Message Type]';
