/**
 * Body of POST /api/push/send. Alert text is literal; localized alerts,
 * critical sounds and Live Activity fields are only reachable through the client API.
 */
export interface PushRequest {
  deviceTokens: string[];
  title?: string;
  subtitle?: string;
  body?: string;
  sound?: string;
  badge?: number;
  threadId?: string;
  category?: string;
  interruptionLevel?: string;
  mutableContent?: boolean;
  contentAvailable?: boolean;
  /** Custom top-level keys delivered next to `aps` */
  data?: unknown;
  pushType?: string;
  priority?: number;
  expiration?: number;
  collapseId?: string;
  /** Overrides APNS_TOPIC */
  topic?: string;
}

export interface PushResult {
  success: Array<{ deviceToken: string; id: string; uniqueId?: string }>;
  failed: Array<{ deviceToken: string; reason: string; status?: number }>;
  summary: {
    totalTargeted: number;
    successful: number;
    failed: number;
  };
}
