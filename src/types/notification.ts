export interface NotificationInput {
  to: string;
  from: string;
  message: string;
  taskId?: string;
  link?: string;
}

export interface Notification extends NotificationInput {
  time: string;
}

export interface DeliveredNotification extends Notification {
  delivered: string;
}

export interface LedgerDocument {
  pending: Notification[];
  delivered: DeliveredNotification[];
}

// Field names follow the on-disk subscriptions.json format
export interface SubscriptionEntry {
  subscribed_at: string;
  reason: string;
}

export type SubscriptionMap = Record<string, SubscriptionEntry>;
