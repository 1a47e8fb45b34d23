export type PushType =
  | 'alert'
  | 'background'
  | 'location'
  | 'voip'
  | 'complication'
  | 'fileprovider'
  | 'mdm'
  | 'liveactivity'
  | 'pushtotalk';

export const PUSH_TYPES: readonly PushType[] = [
  'alert',
  'background',
  'location',
  'voip',
  'complication',
  'fileprovider',
  'mdm',
  'liveactivity',
  'pushtotalk',
];

/**
 * Per-request options. Each field maps to one `apns-*` request header.
 */
export interface PushOptions {
  pushType?: PushType;
  /** Canonical UUID chosen by the caller, echoed back as the receipt id */
  id?: string;
  /** Unix seconds after which APNs stops retrying delivery; 0 means deliver once */
  expiration?: number;
  priority?: number;
  /** Bundle ID of the target app, plus a suffix for voip/complication/liveactivity pushes */
  topic: string;
  collapseId?: string;
}

export interface PushReceipt {
  id: string;
  uniqueId?: string;
}

export interface ServiceErrorBody {
  reason: string;
  timestamp?: number;
}

export const isPushType = (value: unknown): value is PushType =>
  PUSH_TYPES.some(type => type === value);
