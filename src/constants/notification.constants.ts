/**
 * Issue lifecycle event kinds carried on the notification topic
 */
export const NOTIFICATION_KIND = {
  CREATED: 'CREATED',
  UPDATED: 'UPDATED',
  RESOLVED: 'RESOLVED',
} as const;

export type NotificationKind = typeof NOTIFICATION_KIND[keyof typeof NOTIFICATION_KIND];

// Single shared pub/sub topic; every connected client receives every event
export const NOTIFICATION_TOPIC = 'notifications';
