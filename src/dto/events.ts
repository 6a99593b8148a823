/**
 * Protocol events as delivered by the session, modelled as closed unions so
 * the dispatcher can match them exhaustively.
 */

export type MediaKind = 'image' | 'video' | 'audio' | 'document';

/**
 * Everything the transport needs to fetch and decrypt a media blob.
 */
export interface MediaReference {
  kind: MediaKind;
  url?: string;
  directPath?: string;
  mediaKey?: Uint8Array;
  fileSha256?: Uint8Array;
  fileEncSha256?: Uint8Array;
  fileLength?: number;
  mimetype?: string;
}

export interface MessageInfo {
  id: string;
  chatId: string;
  sender: string;
  timestamp: Date;
  isFromMe: boolean;
  isGroup: boolean;
  pushName?: string;
}

export type MessagePayload =
  | { type: 'text'; text: string }
  | { type: 'extendedText'; text: string }
  | { type: 'image'; caption?: string; media: MediaReference }
  | { type: 'video'; caption?: string; media: MediaReference }
  | { type: 'audio'; ptt: boolean; seconds?: number; media: MediaReference }
  | { type: 'document'; fileName?: string; caption?: string; media: MediaReference }
  | { type: 'unknown'; raw?: unknown };

export interface MessageEvent {
  kind: 'message';
  info: MessageInfo;
  payload: MessagePayload;
}

export interface ReceiptEvent {
  kind: 'receipt';
  receiptType: string;
  chatId: string;
  sender: string;
  messageIds: string[];
  timestamp: Date;
}

export interface PresenceEvent {
  kind: 'presence';
  from: string;
  unavailable: boolean;
  lastSeen?: Date;
}

export interface OtherEvent {
  kind: 'other';
  name: string;
}

export type ProtocolEvent = MessageEvent | ReceiptEvent | PresenceEvent | OtherEvent;
