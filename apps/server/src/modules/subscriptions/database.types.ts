export interface SubscriptionsTable {
  id: string;
  user_id: string | null;
  endpoint: string;
  expiration_time: number | null;
  p256dh: string;
  auth: string;
  vapid_key: string;
  /**
   * ISO 8601
   */
  created_at: string;
  updated_at: string;
}

export interface PushDatabase {
  subscriptions: SubscriptionsTable;
}
